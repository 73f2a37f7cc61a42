import { isRetriableError } from '../errors/retriable-error'

/** Retry loop settings. */
interface RetryOptions {
  /** Called before each new attempt. */
  onRetry?(error: unknown, attempt: number): void

  /** Cancellation signal checked between attempts. */
  signal?: AbortSignal

  /** Maximum number of attempts (default 10). */
  attempts?: number

  /** Upper bound for a single delay in ms (default 10000). */
  maxDelay?: number

  /** First delay in ms, doubled on every retry (default 50). */
  delay?: number
}

/**
 * Run an operation, retrying it while it fails with a `RetriableError`.
 *
 * Any other error, or the last retriable one, is rethrown unchanged.
 *
 * @param operation - Operation receiving the 1-based attempt number.
 * @param options - Retry settings.
 * @returns Operation result.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  let { maxDelay = 10_000, attempts = 10, delay = 50, signal } = options

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted()
    try {
      return await operation(attempt)
    } catch (error) {
      if (!isRetriableError(error) || attempt >= attempts) {
        throw error
      }
      options.onRetry?.(error, attempt)
      await sleep(Math.min(delay * 2 ** (attempt - 1), maxDelay), signal)
    }
  }
}

/**
 * Wait for a number of milliseconds, rejecting early when aborted.
 *
 * @param ms - Delay.
 * @param signal - Cancellation signal.
 */
function sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    let onAbort = (): void => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    let timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
