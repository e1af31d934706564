import type { Cursor, PagedResult } from '@bandkit/models';

export interface IteratePagesOptions {
  /** Stop after this many requests even if a cursor remains */
  maxPages?: number;
}

/**
 * Yields every item of a listing, following `nextCursor` one request at a
 * time until it is absent.
 * @example
 * ```typescript
 * for await (const post of iteratePages((cursor) => band.posts(cursor))) {
 *   console.info(post.content);
 * }
 * ```
 * @public
 */
export async function* iteratePages<T>(
  fetchPage: (cursor?: Cursor) => Promise<PagedResult<T>>,
  options: IteratePagesOptions = {},
): AsyncGenerator<T, void, undefined> {
  let cursor: Cursor | undefined;
  let pages = 0;

  do {
    const page = await fetchPage(cursor);
    pages += 1;
    yield* page.items;
    cursor = page.nextCursor;
  } while (cursor && (options.maxPages === undefined || pages < options.maxPages));
}
