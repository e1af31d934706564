import { logEvent, toError, type HttpResponse } from '@bandkit/core';
import type { JsonValue } from '@bandkit/models';
import { ApiErrorBodySchema } from '@bandkit/schemas';
import { ApiError } from '../errors/api-error.js';

const JSON_CONTENT_TYPE = 'application/json';

// Header names are matched case-insensitively whatever the transport kept
function headerValue(response: HttpResponse, name: string): string | undefined {
  const entry = Object.entries(response.headers).find(
    ([header]) => header.toLowerCase() === name,
  );
  return entry?.[1];
}

export function isJsonResponse(response: HttpResponse): boolean {
  const contentType = headerValue(response, 'content-type') ?? '';
  return contentType.toLowerCase().startsWith(JSON_CONTENT_TYPE);
}

/**
 * Decodes an API response.
 *
 * A 200 JSON body is returned unchanged; the envelope's `result_code` is left
 * to the caller. Any other status raises an {@link ApiError} built from
 * whatever of the error body can be read, with `result_code` defaulting to -1.
 * @throws {ApiError} On a non-200 status, a non-JSON 200, or an unparseable 200 body
 * @public
 */
export function parseResponse(response: HttpResponse): JsonValue {
  if (response.status !== 200) {
    throw ApiError.fromErrorBody(
      ApiErrorBodySchema.parse(readErrorBody(response)),
      response.status,
    );
  }

  if (!isJsonResponse(response)) {
    throw ApiError.invalidContentType(response.status);
  }

  try {
    const value: JsonValue = JSON.parse(response.body);
    return value;
  } catch (error) {
    throw ApiError.malformedResponse('body is not valid JSON', toError(error));
  }
}

// Never throws: an unreadable body degrades to {}
function readErrorBody(response: HttpResponse): unknown {
  if (!isJsonResponse(response)) {
    return {};
  }
  try {
    return JSON.parse(response.body);
  } catch (error) {
    logEvent('debug', 'client:error_body_unreadable', {
      status: response.status,
      error: toError(error).message,
    });
    return {};
  }
}
