import { BandError } from '../errors/band-error.js';

/**
 * Transport-specific error codes
 */
export enum TransportErrorCode {
  CONNECTION_FAILED = 'connection_failed',
  REQUEST_TIMEOUT = 'request_timeout',
  INVALID_URL = 'invalid_url',
}

/**
 * Raised when a request never produced an HTTP response.
 *
 * HTTP error statuses are not transport errors; they reach the caller as a
 * regular {@link HttpResponse}.
 */
export class TransportError extends BandError<TransportErrorCode> {
  public constructor(message: string, code: TransportErrorCode, cause?: Error) {
    super(message, code, cause);
    this.name = 'TransportError';
  }

  public static connectionFailed(url: string, cause?: Error): TransportError {
    const reason = cause ? `: ${cause.message}` : '';
    return new TransportError(
      `Connection failed for ${url}${reason}`,
      TransportErrorCode.CONNECTION_FAILED,
      cause,
    );
  }

  public static requestTimeout(url: string, timeoutMs: number, cause?: Error): TransportError {
    return new TransportError(
      `Request to ${url} timed out after ${timeoutMs}ms`,
      TransportErrorCode.REQUEST_TIMEOUT,
      cause,
    );
  }

  public static invalidUrl(url: string, cause?: Error): TransportError {
    return new TransportError(`Invalid URL: ${url}`, TransportErrorCode.INVALID_URL, cause);
  }
}
