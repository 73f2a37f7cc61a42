import type { FetchPage } from '../../types/page'

/**
 * Lazily iterate every item of a paginated listing.
 *
 * Starts at page 1 and requests exactly the page reported as next until the
 * terminal marker (0). Page size and every other parameter are fixed by the
 * `fetchPage` closure, so they stay the same for the whole traversal. Errors
 * propagate as soon as they occur.
 *
 * @param fetchPage - Fetches one page by number.
 * @yields Items in provider order.
 */
export async function* iteratePages<T>(
  fetchPage: FetchPage<T>,
): AsyncGenerator<T, void, undefined> {
  let page = 1
  while (page !== 0) {
    let result = await fetchPage(page)
    yield* result.items
    page = result.nextPage
  }
}
