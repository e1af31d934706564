import type { z } from 'zod';
import { RESULT_CODE_SUCCESS } from '@bandkit/models';
import { ApiEnvelopeSchema, ApiErrorBodySchema } from '@bandkit/schemas';
import { ApiError } from '../errors/api-error.js';

/**
 * Checks `result_code` and parses `result_data` with the endpoint's schema.
 * @throws {ApiError} When the code is not 1 or the data does not match
 */
export function unwrapEnvelope<TSchema extends z.ZodTypeAny>(
  json: unknown,
  schema: TSchema,
): z.output<TSchema> {
  const envelope = ApiEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw ApiError.malformedResponse('missing result_code', envelope.error);
  }

  if (envelope.data.result_code !== RESULT_CODE_SUCCESS) {
    throw ApiError.fromErrorBody(ApiErrorBodySchema.parse(json), 200);
  }

  const data = schema.safeParse(envelope.data.result_data);
  if (!data.success) {
    const detail = data.error.issues
      .map((issue) => `${issue.path.join('.') || 'result_data'}: ${issue.message}`)
      .join('; ');
    throw ApiError.malformedResponse(detail, data.error);
  }
  return data.data;
}
