/**
 * Base class of every error raised by the bandkit packages.
 *
 * Carries a machine-readable `code` and an optional `cause`. Messages are
 * sanitized so access tokens and client secrets never reach logs or terminals.
 * @public
 */
export class BandError<TCode extends string = string> extends Error {
  public readonly code: TCode;
  public readonly cause?: Error;

  public constructor(message: string, code: TCode, cause?: Error) {
    super(BandError.sanitizeMessage(message));
    this.name = 'BandError';
    this.code = code;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Strips credentials that may have been interpolated into a message.
   */
  protected static sanitizeMessage(message: string): string {
    return message
      .replace(/\bBearer\s+[a-zA-Z0-9._~+/=-]+/gi, 'Bearer [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\bBasic\s+[a-zA-Z0-9+/=]+/g, 'Basic [REDACTED]');
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * Normalizes an unknown thrown value into an Error for use as a `cause`.
 * @public
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
