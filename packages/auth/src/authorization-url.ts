export interface AuthorizationUrlParams {
  authorizationUrl: string;
  clientId: string;
  redirectUri: string;
  challenge: string;
  state: string;
  scopes: readonly string[];
}

/**
 * Build the provider's authorize URL for an S256 PKCE request.
 * Values are percent-encoded; scopes are space-joined.
 */
export function buildAuthorizationUrl(params: AuthorizationUrlParams): string {
  const query: Array<[string, string]> = [
    ['client_id', params.clientId],
    ['code_challenge', params.challenge],
    ['code_challenge_method', 'S256'],
    ['redirect_uri', params.redirectUri],
    ['scope', params.scopes.join(' ')],
    ['response_type', 'code'],
    ['state', params.state],
  ];

  const separator = params.authorizationUrl.includes('?') ? '&' : '?';
  const encoded = query
    .map(([name, value]) => `${name}=${encodeURIComponent(value)}`)
    .join('&');

  return `${params.authorizationUrl}${separator}${encoded}`;
}
