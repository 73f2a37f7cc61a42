import type { ErrorKind } from '../../types/error-kind'

/** Creating, updating or cleaning up a release failed. */
export class ReleaseError extends Error {
  public readonly kind = 'remote' satisfies ErrorKind

  /**
   * Creates a new ReleaseError.
   *
   * @param context - What was being attempted, e.g. `could not release`.
   * @param cause - Underlying failure.
   */
  public constructor(context: string, cause: unknown) {
    super(
      `${context}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    )
    this.name = 'ReleaseError'
  }
}
