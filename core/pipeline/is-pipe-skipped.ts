import type { Context } from '../../types/context'
import type { Pipe } from '../../types/pipe'

/**
 * Check whether a pipe is skipped, either with `--skip` or by its own
 * `skip` check.
 *
 * @param context - Run context.
 * @param pipe - Pipe to check.
 * @returns Reason the pipe is skipped, or null when it runs.
 */
export function isPipeSkipped(context: Context, pipe: Pipe): string | null {
  if (pipe.skippable && context.skips.has(pipe.name)) {
    return '--skip'
  }
  return pipe.skip(context) ? 'skipped' : null
}
