import type { Context } from '../../types/context'
import type { Pipe } from '../../types/pipe'

import { PipeError } from '../errors/pipe-error'
import { isPipeSkipped } from './is-pipe-skipped'
import { log, withIndent } from '../log/log'

/**
 * Run pipes in order over a shared context.
 *
 * Each pipe is checked for skipping, then gets its defaults applied, then
 * runs. The first failure aborts the run with a `PipeError` naming the pipe
 * and phase; later pipes never start. Pipes are not retried here.
 *
 * @param context - Run context.
 * @param pipes - Pipes in execution order.
 */
export async function runPipeline(
  context: Context,
  pipes: readonly Pipe[],
): Promise<void> {
  for (let pipe of pipes) {
    context.signal.throwIfAborted()

    let skipped = isPipeSkipped(context, pipe)
    if (skipped) {
      log.pipe(pipe.name, skipped)
      continue
    }

    log.pipe(pipe.name)

    try {
      await pipe.setDefaults(context)
    } catch (error) {
      log.error(`${pipe.name} failed`, { phase: 'default' })
      throw new PipeError(pipe.name, 'default', error)
    }

    try {
      await withIndent(() => pipe.run(context))
    } catch (error) {
      log.error(`${pipe.name} failed`, { phase: 'run' })
      throw new PipeError(pipe.name, 'run', error)
    }
  }
}
