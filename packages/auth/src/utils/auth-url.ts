/**
 * Authorize URL building
 */
import type { AuthorizationRequest } from '@bandkit/models';
import { assertCodeResponseType } from './authorization-request.js';

/**
 * Builds the URL the user-agent is sent to for consent.
 *
 * Parameter order is fixed: `response_type`, `client_id`, `redirect_uri`,
 * form-encoded.
 * @example
 * ```typescript
 * buildAuthorizeUrl('https://auth.band.us', request);
 * // https://auth.band.us/oauth2/authorize?response_type=code&client_id=abc&redirect_uri=http%3A%2F%2Flocalhost%3A8000
 * ```
 * @throws {ConfigurationError} When `response_type` is not `code`
 * @public
 */
export function buildAuthorizeUrl(authBaseUrl: string, request: AuthorizationRequest): string {
  assertCodeResponseType(request);

  const params = new URLSearchParams({
    response_type: request.response_type,
    client_id: request.client_id,
    redirect_uri: request.redirect_uri,
  });
  return `${trimTrailingSlash(authBaseUrl)}/oauth2/authorize?${params.toString()}`;
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
