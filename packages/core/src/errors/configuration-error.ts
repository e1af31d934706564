import { BandError } from './band-error.js';

export enum ConfigurationErrorCode {
  INVALID_RESPONSE_TYPE = 'invalid_response_type',
  INVALID_GRANT_TYPE = 'invalid_grant_type',
  INVALID_CONFIG = 'invalid_config',
}

/**
 * Local misconfiguration detected before any request is issued.
 * @public
 */
export class ConfigurationError extends BandError<ConfigurationErrorCode> {
  public constructor(message: string, code: ConfigurationErrorCode, cause?: Error) {
    super(message, code, cause);
    this.name = 'ConfigurationError';
  }

  public static invalidResponseType(actual: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid response_type: expected "code", got "${actual}"`,
      ConfigurationErrorCode.INVALID_RESPONSE_TYPE,
    );
  }

  public static invalidGrantType(actual: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid grant_type: expected "authorization_code", got "${actual}"`,
      ConfigurationErrorCode.INVALID_GRANT_TYPE,
    );
  }

  public static invalidConfig(detail: string, cause?: Error): ConfigurationError {
    return new ConfigurationError(
      `Invalid client configuration: ${detail}`,
      ConfigurationErrorCode.INVALID_CONFIG,
      cause,
    );
  }
}
