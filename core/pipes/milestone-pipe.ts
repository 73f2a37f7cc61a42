import type { Pipe } from '../../types/pipe'

import { createGitHubClient } from '../api/create-github-client'
import { closeMilestone } from '../repository/close-milestone'
import { renderTemplate } from '../template/render-template'
import { formatRepo } from '../repository/format-repo'
import { releaseRepo } from '../release/release-repo'
import { log } from '../log/log'

/** Close the milestones of the release. */
export const milestonePipe: Pipe = {
  run: async context => {
    let client = createGitHubClient(context)

    for (let milestone of context.config.milestones ?? []) {
      if (!milestone.close) {
        continue
      }

      let repo = milestone.repo ?? releaseRepo(context)
      let title = renderTemplate(context, milestone.nameTemplate ?? '{{ .Tag }}')

      try {
        await closeMilestone(client, repo, title)
      } catch (error) {
        if (milestone.failOnError) {
          throw error
        }
        log.warn('failed to close milestone', {
          err: error instanceof Error ? error.message : String(error),
          repo: formatRepo(repo),
          title,
        })
        continue
      }

      log.info('closed milestone', { repo: formatRepo(repo), title })
    }
  },
  setDefaults: context => {
    context.config.milestones = (context.config.milestones ?? []).map(
      milestone => ({ nameTemplate: '{{ .Tag }}', ...milestone }),
    )
  },
  skip: context =>
    !(context.config.milestones ?? []).some(milestone => milestone.close),
  name: 'milestone',
  skippable: true,
}
