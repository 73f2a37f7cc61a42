/** Parsed GitHub API response. */
export interface GitHubResponse<T> {
  /** Value of `x-github-request-id`, empty when absent. */
  requestId: string

  /** Next page from the `Link` header, 0 when there is none. */
  nextPage: number

  /** Parsed JSON body, null for empty bodies. */
  data: T
}
