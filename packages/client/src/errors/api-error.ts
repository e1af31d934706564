import { BandError } from '@bandkit/core';
import type { ApiErrorBody } from '@bandkit/schemas';

export enum ApiErrorCode {
  RESULT_CODE = 'result_code',
  INVALID_CONTENT_TYPE = 'invalid_content_type',
  MALFORMED_RESPONSE = 'malformed_response',
}

/**
 * Failure reported by the API itself, as opposed to a transport failure.
 * @public
 */
export class ApiError extends BandError<ApiErrorCode> {
  public constructor(
    message: string,
    code: ApiErrorCode,
    public readonly resultCode?: number,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, code, cause);
    this.name = 'ApiError';
  }

  /**
   * Composes `result_code`, `message`, `detail.error` and
   * `detail.description` into one message.
   */
  public static fromErrorBody(body: ApiErrorBody, status?: number): ApiError {
    const { result_code, result_data } = body;
    const { message, detail } = result_data;
    return new ApiError(
      `${result_code}, ${message}(${detail.error})\n${detail.description}`,
      ApiErrorCode.RESULT_CODE,
      result_code,
      status,
    );
  }

  public static invalidContentType(status: number): ApiError {
    return new ApiError(
      'Invalid content type',
      ApiErrorCode.INVALID_CONTENT_TYPE,
      undefined,
      status,
    );
  }

  public static malformedResponse(detail: string, cause?: Error): ApiError {
    return new ApiError(
      `Malformed API response: ${detail}`,
      ApiErrorCode.MALFORMED_RESPONSE,
      undefined,
      undefined,
      cause,
    );
  }
}
