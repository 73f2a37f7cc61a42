import type { ErrorKind } from '../../types/error-kind'
import type { PipePhase } from '../../types/pipe'

/** A pipe failed and the run was aborted. */
export class PipeError extends Error {
  public readonly kind = 'pipe' satisfies ErrorKind

  public readonly phase: PipePhase

  public readonly pipe: string

  /**
   * Creates a new PipeError.
   *
   * @param pipe - Name of the failing pipe.
   * @param phase - Phase in which it failed.
   * @param cause - Underlying failure.
   */
  public constructor(pipe: string, phase: PipePhase, cause: unknown) {
    let reason = cause instanceof Error ? cause.message : String(cause)
    let label = phase === 'default' ? 'setting defaults' : 'running'
    super(`${pipe}: failed while ${label}: ${reason}`, { cause })
    this.name = 'PipeError'
    this.phase = phase
    this.pipe = pipe
  }
}
