import type { Context } from '../../types/context'
import type { Pipe } from '../../types/pipe'

import { PipeError } from '../errors/pipe-error'
import { isPipeSkipped } from './is-pipe-skipped'

/** What a run would do with one pipe. */
export interface PlannedPipe {
  /** Skip reason, null when the pipe would run. */
  skipped: string | null

  /** Pipe name. */
  name: string
}

/**
 * Work out which pipes a run would execute, without running any.
 *
 * Defaults are applied to every pipe that is not skipped, so configuration
 * errors surface the same way as in a real run.
 *
 * @param context - Run context.
 * @param pipes - Pipes in execution order.
 * @returns Plan in execution order.
 */
export async function planPipeline(
  context: Context,
  pipes: readonly Pipe[],
): Promise<PlannedPipe[]> {
  let plan: PlannedPipe[] = []
  for (let pipe of pipes) {
    let skipped = isPipeSkipped(context, pipe)
    if (!skipped) {
      try {
        await pipe.setDefaults(context)
      } catch (error) {
        throw new PipeError(pipe.name, 'default', error)
      }
    }
    plan.push({ name: pipe.name, skipped })
  }
  return plan
}
