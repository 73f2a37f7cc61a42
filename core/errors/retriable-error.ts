import type { ErrorKind } from '../../types/error-kind'

/**
 * A failure that may succeed when the same operation is attempted again.
 */
export class RetriableError extends Error {
  public readonly kind = 'retriable' satisfies ErrorKind

  /**
   * Creates a new RetriableError.
   *
   * @param cause - Underlying failure.
   */
  public constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause })
    this.name = 'RetriableError'
  }
}

/**
 * Check whether an error may be retried.
 *
 * @param error - Any thrown value.
 * @returns True for retriable errors.
 */
export function isRetriableError(error: unknown): error is RetriableError {
  return error instanceof RetriableError
}
