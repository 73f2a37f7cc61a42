import type { Dispatcher } from 'undici'

/**
 * Transport state shared by all API functions of one client.
 */
export interface GitHubClientContext {
  /** Remaining requests in the current rate-limit window. */
  rateLimitRemaining: number

  /** Connection pool for this client, set when TLS checks are off. */
  dispatcher?: Dispatcher

  /** Cancellation signal passed to every request. */
  signal: AbortSignal | undefined

  /** GitHub token, if available. */
  token: undefined | string

  /** When the rate-limit window resets. */
  rateLimitReset: Date

  /** Base URL for asset uploads. */
  uploadUrl: string

  /** REST API base URL. */
  baseUrl: string
}
