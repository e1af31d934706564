/**
 * Any value `JSON.parse` can return
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Failure payload carried in `result_data` when `result_code` is not 1
 */
export interface ApiFailureData {
  message?: string;
  detail?: {
    error?: string;
    description?: string;
  };
}

/**
 * Top-level wrapper of every API response
 */
export interface ApiEnvelope<TData = unknown> {
  result_code: number;
  result_data: TData | null;
}
