import { openAsBlob } from 'node:fs'

import type { GitHubClient } from '../../types/github-client'
import type { Artifact } from '../../types/artifact'
import type { Context } from '../../types/context'

import { renderTemplate } from '../template/render-template'
import { releaseUrlTemplate } from './release-url'
import { uploadArtifact } from './upload-artifact'
import { releaseRepo } from './release-repo'
import { retry } from '../retry/retry'
import { log } from '../log/log'

/** Uploads running at the same time when `parallelism` is not set. */
export const DEFAULT_PARALLELISM = 4

/**
 * Upload every artifact of the context to a release.
 *
 * Uploads run with bounded parallelism, each retried while it fails with a
 * retriable error. After the first failure no new upload starts; the first
 * failure is rethrown once the running ones settle.
 *
 * @param context - Run context.
 * @param client - GitHub client.
 * @param releaseId - Id returned by `createRelease`.
 */
export async function uploadArtifacts(
  context: Context,
  client: GitHubClient,
  releaseId: string,
): Promise<void> {
  let repo = releaseRepo(context)
  let urlTemplate = releaseUrlTemplate(context)
  let queue = [...context.artifacts]
  let limit = Math.max(1, context.config.parallelism ?? DEFAULT_PARALLELISM)
  let failed = false

  let upload = async (artifact: Artifact): Promise<void> => {
    let file = await openAsBlob(artifact.path)
    await retry(
      () => uploadArtifact(client, repo, releaseId, artifact, file),
      {
        onRetry: (_error, attempt) => {
          log.warn('retrying upload', { name: artifact.name, attempt })
        },
        signal: context.signal,
      },
    )
    log.info('uploaded', {
      url: renderTemplate(context, urlTemplate, {
        ArtifactName: artifact.name,
      }),
      name: artifact.name,
    })
  }

  let worker = async (): Promise<void> => {
    for (
      let artifact = queue.shift();
      artifact && !failed;
      artifact = queue.shift()
    ) {
      try {
        await upload(artifact)
      } catch (error) {
        failed = true
        throw error
      }
    }
  }

  let results = await Promise.allSettled(
    Array.from({ length: Math.min(limit, queue.length) }, () => worker()),
  )
  let rejection = results.find(
    (result): result is PromiseRejectedResult => result.status === 'rejected',
  )
  if (rejection) {
    throw rejection.reason
  }
}
