import type { Context } from '../../types/context'
import type { Pipe } from '../../types/pipe'

import { resolvePrerelease } from '../git/resolve-prerelease'
import { parseRemoteUrl } from '../git/parse-remote-url'
import { ConfigError } from '../errors/config-error'
import { runGit } from '../git/run-git'
import { log } from '../log/log'

/**
 * Resolve the tag, commit and previous tag being released, and the release
 * repository from the `origin` remote when it is not configured.
 */
export const gitPipe: Pipe = {
  run: async (context: Context): Promise<void> => {
    let { git } = context

    if (git.currentTag === '') {
      git.currentTag = describe(['describe', '--tags', '--abbrev=0'])
    }

    try {
      git.commit = runGit(['rev-list', '-n', '1', git.currentTag])
    } catch (error) {
      throw new ConfigError(`tag ${git.currentTag} does not exist`, {
        cause: error,
      })
    }

    if (git.previousTag === null) {
      git.previousTag = previousTag(git.currentTag)
    }

    context.isPrerelease = resolvePrerelease(
      context.config.release?.prerelease ?? 'auto',
      git.currentTag,
    )

    if (!context.config.release?.github) {
      detectRepo(context)
    }

    log.info('releasing', {
      previous: git.previousTag ?? 'none',
      prerelease: context.isPrerelease,
      commit: git.commit,
      tag: git.currentTag,
    })
  },
  setDefaults: () => {},
  skip: () => false,
  name: 'git',
}

/**
 * Run `git describe`, failing with a configuration error.
 *
 * @param args - Git arguments.
 * @returns Tag name.
 */
function describe(args: string[]): string {
  try {
    return runGit(args)
  } catch (error) {
    throw new ConfigError(
      'no tag found for the current commit, create one or pass --tag',
      { cause: error },
    )
  }
}

/**
 * Find the tag before the given one.
 *
 * @param tag - Current tag.
 * @returns Previous tag, or null for the first release.
 */
function previousTag(tag: string): string | null {
  try {
    return runGit(['describe', '--tags', '--abbrev=0', `${tag}^`])
  } catch {
    log.info('no previous tag found', { tag })
    return null
  }
}

/**
 * Fill `release.github` from the `origin` remote.
 *
 * @param context - Run context.
 */
function detectRepo(context: Context): void {
  let url: string
  try {
    url = runGit(['remote', 'get-url', 'origin'])
  } catch {
    log.warn('no origin remote, set release.github to publish')
    return
  }

  let repo = parseRemoteUrl(url)
  if (!repo) {
    log.warn('origin remote is not a GitHub repository', { url })
    return
  }
  context.config.release = { ...context.config.release, github: repo }
}
