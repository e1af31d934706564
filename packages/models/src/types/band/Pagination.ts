/**
 * Opaque continuation returned in `paging.next_params`.
 *
 * Replayed verbatim as query parameters of the following request; keys are
 * never interpreted or reordered.
 */
export type Cursor = Readonly<Record<string, string>>;

/**
 * One page of a listing endpoint
 */
export interface PagedResult<T> {
  items: readonly T[];
  /** Absent once the listing is exhausted */
  nextCursor?: Cursor;
}
