import type { ErrorKind } from '../../types/error-kind'

/** No milestone has the requested title. */
export class NoMilestoneFoundError extends Error {
  public readonly kind = 'not-found' satisfies ErrorKind

  public readonly title: string

  /**
   * Creates a new NoMilestoneFoundError.
   *
   * @param title - Requested milestone title.
   */
  public constructor(title: string) {
    super(`no milestone found: ${title}`)
    this.name = 'NoMilestoneFoundError'
    this.title = title
  }
}
