import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubResponse } from '../../types/github-response'
import type { Repo } from '../../types/repo'

import { GitHubRateLimitError } from '../errors/github-rate-limit-error'
import { GitHubApiError } from '../errors/github-api-error'
import { parseNextPage } from './parse-next-page'
import { log } from '../log/log'

/** Remaining-request count below which a warning is logged. */
export const RATE_LIMIT_WARNING_THRESHOLD = 10

/** Options of a single API request. */
interface RequestOptions {
  /** Query string parameters, undefined values are dropped. */
  query?: Record<string, undefined | string | number>

  /** HTTP method (default GET). */
  method?: 'DELETE' | 'PATCH' | 'POST' | 'GET' | 'PUT'

  /** Base URL override, used for asset uploads. */
  baseUrl?: string

  /** JSON payload, or a Blob sent as-is. */
  body?: object | Blob

  /** Repository named in error messages. */
  repo?: Repo

  /** Operation name used in error messages. */
  operation: string
}

/**
 * Perform an HTTP request against GitHub API with auth and rate-limit updates.
 *
 * Every request observes the client's cancellation signal and goes through
 * the client's dispatcher, when it has one.
 *
 * @param context - Client context with token and rate-limit state.
 * @param path - API path beginning with '/'.
 * @param options - Request options.
 * @returns Parsed body, request id and the next page number.
 */
export async function makeRequest<T>(
  context: GitHubClientContext,
  path: string,
  options: RequestOptions,
): Promise<GitHubResponse<T>> {
  let headers: Record<string, string> = {
    'X-GitHub-Api-Version': '2022-11-28',
    Accept: 'application/vnd.github+json',
    'User-Agent': 'release-pipes',
  }

  if (context.token) {
    headers['Authorization'] = `Bearer ${context.token}`
  }

  let body: undefined | string | Blob
  if (options.body instanceof Blob) {
    headers['Content-Type'] = options.body.type || 'application/octet-stream'
    body = options.body
  } else if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json'
    body = JSON.stringify(options.body)
  }

  let base = (options.baseUrl ?? context.baseUrl).replace(/\/+$/u, '')
  let url = new URL(`${base}${path}`)
  for (let [key, value] of Object.entries(options.query ?? {})) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value))
    }
  }

  let response = await fetch(url, {
    method: options.method ?? 'GET',
    dispatcher: context.dispatcher,
    signal: context.signal,
    headers,
    body,
  })

  let responseHeaders: Record<string, string> = {}
  response.headers.forEach((value, key) => {
    responseHeaders[key] = value
  })

  updateRateLimit(context, responseHeaders)

  let requestId = responseHeaders['x-github-request-id'] ?? ''

  if (!response.ok) {
    if (response.status === 403) {
      let text = await response.text()
      if (text.includes('rate limit')) {
        throw new GitHubRateLimitError({
          resetAt: context.rateLimitReset,
          operation: options.operation,
          repo: options.repo,
          requestId,
        })
      }
    } else {
      await response.body?.cancel()
    }

    throw new GitHubApiError({
      statusText: response.statusText,
      operation: options.operation,
      status: response.status,
      repo: options.repo,
      requestId,
    })
  }

  let text = await response.text()
  let data = (text === '' ? null : JSON.parse(text)) as T

  return {
    nextPage: parseNextPage(responseHeaders['link']),
    requestId,
    data,
  }
}

/**
 * Update rate limit information from response headers.
 *
 * Warns once when the remaining count drops below
 * {@link RATE_LIMIT_WARNING_THRESHOLD}.
 *
 * @param context - Client context with mutable rate limit fields.
 * @param headers - Lower-cased response headers.
 */
function updateRateLimit(
  context: GitHubClientContext,
  headers: Record<string, string>,
): void {
  let reset = headers['x-ratelimit-reset']
  if (reset !== undefined) {
    context.rateLimitReset = new Date(Number.parseInt(reset, 10) * 1000)
  }

  let remaining = headers['x-ratelimit-remaining']
  if (remaining === undefined) {
    return
  }
  let previous = context.rateLimitRemaining
  context.rateLimitRemaining = Number.parseInt(remaining, 10)
  if (
    previous >= RATE_LIMIT_WARNING_THRESHOLD &&
    context.rateLimitRemaining < RATE_LIMIT_WARNING_THRESHOLD
  ) {
    log.warn('GitHub API rate limit is low', {
      remaining: context.rateLimitRemaining,
      resets: context.rateLimitReset.toISOString(),
    })
  }
}
