/**
 * One page of a paginated listing.
 *
 * `nextPage` is the page number to request next, `0` when this is the last
 * page.
 */
export interface Page<T> {
  /** Page number to request next, or 0 on the last page. */
  nextPage: number

  /** Items of this page in provider order. */
  items: T[]
}

/** Fetches a single page by its 1-based number. */
export type FetchPage<T> = (page: number) => Promise<Page<T>>
