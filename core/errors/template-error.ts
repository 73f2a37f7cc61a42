import type { ErrorKind } from '../../types/error-kind'

/** A template could not be rendered. */
export class TemplateError extends Error {
  public readonly kind = 'configuration' satisfies ErrorKind

  public readonly template: string

  /**
   * Creates a new TemplateError.
   *
   * @param template - The template source.
   * @param reason - Why rendering failed.
   */
  public constructor(template: string, reason: string) {
    super(`template: ${reason} in "${template}"`)
    this.name = 'TemplateError'
    this.template = template
  }
}
