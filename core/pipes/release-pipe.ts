import type { Pipe } from '../../types/pipe'

import { createGitHubClient } from '../api/create-github-client'
import { DEFAULT_PARALLELISM, uploadArtifacts } from '../release/upload-artifacts'
import { createRelease } from '../release/create-release'
import { releaseHtmlUrl } from '../release/release-url'
import { log } from '../log/log'

/** Publish the GitHub release and upload the artifacts. */
export const releasePipe: Pipe = {
  setDefaults: context => {
    let { config } = context
    config.release = {
      replaceExistingDraft: false,
      nameTemplate: '{{ .Tag }}',
      mode: 'keep-existing',
      prerelease: 'auto',
      draft: false,
      ...config.release,
    }
    config.parallelism ??= DEFAULT_PARALLELISM
  },
  run: async context => {
    let client = createGitHubClient(context)
    let releaseId = await createRelease(context, client, context.releaseNotes)

    if (context.artifacts.length > 0) {
      await uploadArtifacts(context, client, releaseId)
    }

    context.releaseUrl = releaseHtmlUrl(context)
    log.info('release published', { url: context.releaseUrl })
  },
  skip: context => context.config.release?.disable === true,
  name: 'release',
  skippable: true,
}
