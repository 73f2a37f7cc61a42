import type { Context } from './context'

/** Phase in which a pipe failed. */
export type PipePhase = 'default' | 'run'

/**
 * A single step of the publish pipeline.
 *
 * Pipes hold no state between runs. Every pipe implements all three
 * operations, even when it has nothing to do in one of them.
 */
export interface Pipe {
  /** Applies defaults to the pipe's own config subtree. Idempotent. */
  setDefaults(context: Context): Promise<void> | void

  /** Returns true when the pipe must not run for this context. */
  skip(context: Context): boolean

  /** Performs the pipe's work. */
  run(context: Context): Promise<void>

  /** Whether `--skip` may name this pipe. */
  skippable?: boolean

  /** Pipe name, used in logs and errors. */
  name: string
}
