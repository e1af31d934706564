import { z } from 'zod';
import { RESULT_CODE_UNKNOWN } from '@bandkit/models';

/**
 * Success-path envelope. `result_data` is left opaque here and parsed by the
 * endpoint-specific schema once `result_code` has been checked.
 */
export const ApiEnvelopeSchema = z.object({
  result_code: z.number(),
  result_data: z.unknown(),
});

const FailureDetailSchema = z.object({
  error: z.string().catch(''),
  description: z.string().catch(''),
});

const EMPTY_FAILURE_DATA = {
  message: '',
  detail: { error: '', description: '' },
};

const FailureDataSchema = z.object({
  message: z.string().catch(''),
  detail: FailureDetailSchema.catch(EMPTY_FAILURE_DATA.detail),
});

/**
 * Lenient reading of an error body: every field degrades to its default
 * instead of failing, so any JSON value parses.
 */
export const ApiErrorBodySchema = z
  .object({
    result_code: z.number().catch(RESULT_CODE_UNKNOWN),
    result_data: FailureDataSchema.catch(EMPTY_FAILURE_DATA),
  })
  .catch({ result_code: RESULT_CODE_UNKNOWN, result_data: EMPTY_FAILURE_DATA });

export type ApiErrorBody = z.infer<typeof ApiErrorBodySchema>;

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

// Cursor values are replayed as query strings
export const CursorSchema = z.record(
  z.union([z.string(), z.number(), z.boolean()]).transform(String),
);

export const PagingSchema = z.object({
  previous_params: CursorSchema.nullish(),
  next_params: CursorSchema.nullish(),
});

/**
 * `result_data` of a listing endpoint: `items` plus an optional `paging` block
 */
export function pagedDataSchema<TItem extends z.ZodTypeAny>(item: TItem) {
  return z.object({
    items: z.array(item),
    paging: PagingSchema.nullish(),
  });
}
