import { BandError } from '@bandkit/core';

export enum AuthorizationErrorCode {
  TOKEN_REQUEST_FAILED = 'token_request_failed',
  INVALID_TOKEN_RESPONSE = 'invalid_token_response',
  REDIRECT_TIMEOUT = 'redirect_timeout',
  MISSING_CODE = 'missing_code',
  ACCESS_DENIED = 'access_denied',
  CODE_NOT_PERSISTED = 'code_not_persisted',
  LISTENER_FAILED = 'listener_failed',
  MISSING_TOKEN = 'missing_token',
}

/**
 * Failure of the authorization-code flow, or absence of the token it produces.
 *
 * Never retried; the next `ensureAccessToken()` starts the flow over.
 * @public
 */
export class AuthorizationError extends BandError<AuthorizationErrorCode> {
  public constructor(message: string, code: AuthorizationErrorCode, cause?: Error) {
    super(message, code, cause);
    this.name = 'AuthorizationError';
  }

  /**
   * Token endpoint answered with anything but 200. The body is kept out of
   * the message since it may echo credentials.
   */
  public static tokenRequestFailed(status: number): AuthorizationError {
    return new AuthorizationError(
      `Token exchange failed with HTTP ${status}`,
      AuthorizationErrorCode.TOKEN_REQUEST_FAILED,
    );
  }

  public static invalidTokenResponse(cause?: Error): AuthorizationError {
    return new AuthorizationError(
      'Token endpoint returned no access_token',
      AuthorizationErrorCode.INVALID_TOKEN_RESPONSE,
      cause,
    );
  }

  public static redirectTimeout(timeoutMs: number): AuthorizationError {
    return new AuthorizationError(
      `No authorization redirect received within ${timeoutMs}ms`,
      AuthorizationErrorCode.REDIRECT_TIMEOUT,
    );
  }

  public static missingCode(): AuthorizationError {
    return new AuthorizationError(
      'Authorization redirect carried no code',
      AuthorizationErrorCode.MISSING_CODE,
    );
  }

  public static accessDenied(error: string, description?: string): AuthorizationError {
    const suffix = description ? `: ${description}` : '';
    return new AuthorizationError(
      `Authorization was rejected (${error})${suffix}`,
      AuthorizationErrorCode.ACCESS_DENIED,
    );
  }

  public static codeNotPersisted(cause: Error): AuthorizationError {
    return new AuthorizationError(
      'Failed to store the authorization code',
      AuthorizationErrorCode.CODE_NOT_PERSISTED,
      cause,
    );
  }

  public static listenerFailed(cause: Error): AuthorizationError {
    return new AuthorizationError(
      `Redirect listener failed: ${cause.message}`,
      AuthorizationErrorCode.LISTENER_FAILED,
      cause,
    );
  }

  public static missingToken(namespace: string): AuthorizationError {
    return new AuthorizationError(
      `No access token stored for ${namespace}; run the authorization flow first`,
      AuthorizationErrorCode.MISSING_TOKEN,
    );
  }
}
