import type { Pipe } from '../../types/pipe'

import { createGitHubClient } from '../api/create-github-client'
import { formatChangelog } from '../changelog/format-changelog'
import { buildChangelog } from '../changelog/build-changelog'
import { releaseRepo } from '../release/release-repo'
import { log } from '../log/log'

/** Build release notes, unless notes were supplied up front. */
export const changelogPipe: Pipe = {
  run: async context => {
    let client = createGitHubClient(context)
    let repo = releaseRepo(context)
    let { previousTag, currentTag } = context.git

    if (context.config.changelog?.use === 'github-native') {
      context.releaseNotes = await client.generateReleaseNotes(
        repo,
        currentTag,
        previousTag,
      )
      return
    }

    if (previousTag === null) {
      log.info('first release, no commits to compare')
      return
    }

    let commitLog = await buildChangelog(client, repo, previousTag, currentTag)
    context.releaseNotes = formatChangelog(commitLog)
    log.info('changelog built', {
      commits: commitLog === '' ? 0 : commitLog.split('\n').length,
    })
  },
  setDefaults: context => {
    context.config.changelog = { use: 'github', ...context.config.changelog }
  },
  skip: context =>
    context.config.changelog?.disable === true || context.releaseNotes !== '',
  name: 'changelog',
  skippable: true,
}
