import type { ErrorKind } from '../../types/error-kind'

/** A release id that was not produced by `createRelease`. */
export class InvalidReleaseIdError extends Error {
  public readonly kind = 'invariant' satisfies ErrorKind

  /**
   * Creates a new InvalidReleaseIdError.
   *
   * @param value - The malformed id.
   */
  public constructor(value: string) {
    super(`invalid release id: "${value}"`)
    this.name = 'InvalidReleaseIdError'
  }
}
