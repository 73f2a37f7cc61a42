import type { FetchPage } from '../../types/page'

import { iteratePages } from './iterate-pages'

/**
 * Collect every item of a paginated listing.
 *
 * @param fetchPage - Fetches one page by number.
 * @returns All items in provider order.
 */
export async function collectPages<T>(fetchPage: FetchPage<T>): Promise<T[]> {
  let items: T[] = []
  for await (let item of iteratePages(fetchPage)) {
    items.push(item)
  }
  return items
}
