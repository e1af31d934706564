/**
 * Authorization code to access token exchange
 */
import { logEvent, toError, type IHttpTransport } from '@bandkit/core';
import type { AuthorizationRequest } from '@bandkit/models';
import { TokenResponseSchema } from '@bandkit/schemas';
import { AuthorizationError } from '../errors/authorization-error.js';
import { assertAuthorizationCodeGrant } from './authorization-request.js';
import { trimTrailingSlash } from './auth-url.js';

export interface TokenExchangeParams {
  transport: IHttpTransport;
  authBaseUrl: string;
  request: AuthorizationRequest;
  code: string;
}

/**
 * @throws {ConfigurationError} When `grant_type` is not `authorization_code`
 */
export function buildTokenExchangeUrl(
  authBaseUrl: string,
  request: AuthorizationRequest,
  code: string,
): string {
  assertAuthorizationCodeGrant(request);

  const params = new URLSearchParams({ code, grant_type: request.grant_type });
  return `${trimTrailingSlash(authBaseUrl)}/oauth2/token?${params.toString()}`;
}

/**
 * Exchanges an authorization code for an access token.
 *
 * The request is a GET authenticated with HTTP Basic `(client_id, client_secret)`.
 * Only a 200 answer is read; its body must be JSON with a non-empty
 * `access_token`.
 * @throws {AuthorizationError} On a non-200 status or a body without a token
 * @throws {ConfigurationError} When `grant_type` is not `authorization_code`
 * @public
 */
export async function exchangeCodeForToken(params: TokenExchangeParams): Promise<string> {
  const { transport, authBaseUrl, request, code } = params;
  const url = buildTokenExchangeUrl(authBaseUrl, request, code);

  const response = await transport.get(url, undefined, {
    username: request.client_id,
    password: request.client_secret,
  });

  if (response.status !== 200) {
    logEvent('warn', 'auth:token_exchange_failed', { status: response.status });
    throw AuthorizationError.tokenRequestFailed(response.status);
  }

  let body: unknown;
  try {
    body = JSON.parse(response.body);
  } catch (error) {
    throw AuthorizationError.invalidTokenResponse(
      toError(error),
    );
  }

  const parsed = TokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw AuthorizationError.invalidTokenResponse(parsed.error);
  }
  return parsed.data.access_token;
}
