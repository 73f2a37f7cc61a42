import type { Pipe } from '../../types/pipe'

import { ConfigError } from '../errors/config-error'

/**
 * Check that every `--skip` name refers to a skippable pipe.
 *
 * @param pipes - Registered pipes.
 * @param skips - Names given with `--skip`.
 */
export function validateSkips(
  pipes: readonly Pipe[],
  skips: Iterable<string>,
): void {
  let allowed = pipes.filter(pipe => pipe.skippable).map(pipe => pipe.name)

  for (let name of skips) {
    if (!allowed.includes(name)) {
      throw new ConfigError(
        `--skip=${name} is not allowed, valid options are: ${allowed.join(', ')}`,
      )
    }
  }
}
