import { ConfigurationError } from '@bandkit/core';
import {
  GrantTypes,
  ResponseTypes,
  type AuthorizationRequest,
  type BandClientConfig,
} from '@bandkit/models';

export function toAuthorizationRequest(config: BandClientConfig): AuthorizationRequest {
  return {
    client_id: config.clientId,
    client_secret: config.clientSecret,
    redirect_uri: config.redirectUri,
    response_type: config.responseType,
    grant_type: config.grantType,
  };
}

/**
 * @throws {ConfigurationError} When `response_type` is not `code`
 */
export function assertCodeResponseType(request: AuthorizationRequest): void {
  if (request.response_type !== ResponseTypes.CODE) {
    throw ConfigurationError.invalidResponseType(request.response_type);
  }
}

/**
 * @throws {ConfigurationError} When `grant_type` is not `authorization_code`
 */
export function assertAuthorizationCodeGrant(request: AuthorizationRequest): void {
  if (request.grant_type !== GrantTypes.AUTHORIZATION_CODE) {
    throw ConfigurationError.invalidGrantType(request.grant_type);
  }
}

/**
 * Checks both types up front so a bad grant type fails before the browser
 * is opened rather than after the user has consented.
 */
export function validateAuthorizationRequest(request: AuthorizationRequest): void {
  assertCodeResponseType(request);
  assertAuthorizationCodeGrant(request);
}
