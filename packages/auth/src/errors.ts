/**
 * Link flow error types
 *
 * Every error carries a stable `code` and the HTTP status the callback
 * boundary answers with. Group and role errors never reach that boundary;
 * they are collected per tenant in the role sync result.
 */

export class LinkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'LinkError';
  }
}

export class MissingParametersError extends LinkError {
  constructor(message = 'Missing code or state') {
    super(message, 'missing_parameters', 400);
    this.name = 'MissingParametersError';
  }
}

export class SessionInvalidOrExpiredError extends LinkError {
  constructor(message = 'Link session expired or invalid') {
    super(message, 'invalid_state', 400);
    this.name = 'SessionInvalidOrExpiredError';
  }
}

export class TokenExchangeError extends LinkError {
  constructor(message: string, details?: unknown) {
    super(message, 'token_exchange_failed', 500, details);
    this.name = 'TokenExchangeError';
  }
}

export class ProfileFetchError extends LinkError {
  constructor(message: string, details?: unknown) {
    super(message, 'profile_fetch_failed', 500, details);
    this.name = 'ProfileFetchError';
  }
}

export class LinkagePersistError extends LinkError {
  constructor(message: string, details?: unknown) {
    super(message, 'linkage_persist_failed', 500, details);
    this.name = 'LinkagePersistError';
  }
}

export class GroupMembershipCheckError extends LinkError {
  constructor(message: string, public readonly groupId: string, details?: unknown) {
    super(message, 'group_check_failed', 502, details);
    this.name = 'GroupMembershipCheckError';
  }
}

export class RoleApplicationError extends LinkError {
  constructor(message: string, public readonly tenantId: string, details?: unknown) {
    super(message, 'role_application_failed', 502, details);
    this.name = 'RoleApplicationError';
  }
}

/**
 * Raised by the chat platform client for unexpected responses
 */
export class PlatformApiError extends LinkError {
  constructor(message: string, public readonly status?: number, details?: unknown) {
    super(message, 'platform_api_error', 502, details);
    this.name = 'PlatformApiError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
