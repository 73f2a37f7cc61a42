import type { Context } from '../../types/context'
import type { Repo } from '../../types/repo'

import { ConfigError } from '../errors/config-error'

/**
 * Resolve the repository releases are published to.
 *
 * @param context - Run context.
 * @returns Release repository.
 */
export function releaseRepo(context: Context): Repo {
  let github = context.config.release?.github
  if (!github?.owner || !github.name) {
    throw new ConfigError(
      'release.github.owner and release.github.name must be set',
    )
  }
  return github.branch ?
      { branch: github.branch, owner: github.owner, name: github.name }
    : { owner: github.owner, name: github.name }
}
