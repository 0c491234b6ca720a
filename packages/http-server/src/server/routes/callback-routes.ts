/**
 * Link callback routes
 *
 * The identity provider redirects the browser here after consent. Every
 * failure is answered with a plain-text message; only the success path
 * redirects.
 */

import { Router, Request, Response } from 'express';
import {
  MissingParametersError,
  ProfileFetchError,
  SessionInvalidOrExpiredError,
  TokenExchangeError,
  type LinkCallbackHandler,
  type LinkOutcome
} from '@account-link/auth';
import { logger } from '@account-link/observability';

export interface CallbackRoutesOptions {
  /** Where the browser is sent once the account is linked */
  successUrl: string;
  callbackPath?: string;
}

export const INTERNAL_ERROR_TEXT = 'An internal error occurred.';

/**
 * Prevent browsers and proxies from caching callback responses
 */
export function setAntiCachingHeaders(res: Response): void {
  res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, private');
  res.setHeader('Pragma', 'no-cache');
  res.setHeader('Expires', '0');
}

/**
 * Append the link outcome to the success URL as query parameters
 */
export function buildSuccessRedirect(successUrl: string, outcome: Pick<LinkOutcome, 'displayName' | 'requesterName'>): string {
  const params = new URLSearchParams({
    success: 'true',
    rbx: outcome.displayName,
    dc: outcome.requesterName,
  });
  const separator = successUrl.includes('?') ? '&' : '?';
  return `${successUrl}${separator}${params.toString()}`;
}

/**
 * Map a callback failure to its HTTP status and response text
 */
export function describeCallbackFailure(error: unknown): { status: number; text: string } {
  if (error instanceof MissingParametersError) {
    return { status: 400, text: 'Invalid callback: missing code or state.' };
  }
  if (error instanceof SessionInvalidOrExpiredError) {
    return { status: 400, text: 'Link session expired or invalid. Please start linking again.' };
  }
  if (error instanceof TokenExchangeError) {
    return { status: 500, text: `Failed to authenticate with the identity provider: ${error.message}` };
  }
  if (error instanceof ProfileFetchError) {
    return { status: 500, text: `Failed to fetch identity provider profile: ${error.message}` };
  }
  return { status: 500, text: INTERNAL_ERROR_TEXT };
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Setup the authorization callback route
 *
 * @param router - Express router to attach routes to
 * @param handler - Callback handler that completes the link
 */
export function setupCallbackRoutes(
  router: Router,
  handler: Pick<LinkCallbackHandler, 'handle'>,
  options: CallbackRoutesOptions
): void {
  router.get(options.callbackPath ?? '/callback', async (req: Request, res: Response) => {
    setAntiCachingHeaders(res);

    try {
      const outcome = await handler.handle(queryString(req.query.code), queryString(req.query.state));
      res.redirect(302, buildSuccessRedirect(options.successUrl, outcome));
    } catch (error) {
      const { status, text } = describeCallbackFailure(error);
      if (status >= 500) {
        logger.oauthError('Link callback failed', error);
      } else {
        logger.oauthWarn('Link callback rejected', { status, reason: text });
      }
      res.status(status).type('text/plain').send(text);
    }
  });
}
