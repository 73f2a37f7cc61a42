import type { FetchPage } from '../../types/page'

import { iteratePages } from './iterate-pages'

/**
 * Find the first item of a paginated listing matching a predicate.
 *
 * Pages are requested until a match is found or the listing ends.
 *
 * @param fetchPage - Fetches one page by number.
 * @param predicate - Match condition.
 * @returns First match in page order, or null.
 */
export async function findInPages<T>(
  fetchPage: FetchPage<T>,
  predicate: (item: T) => boolean,
): Promise<T | null> {
  for await (let item of iteratePages(fetchPage)) {
    if (predicate(item)) {
      return item
    }
  }
  return null
}
