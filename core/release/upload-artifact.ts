import type { GitHubClient } from '../../types/github-client'
import type { Artifact } from '../../types/artifact'
import type { Repo } from '../../types/repo'

import { classifyUploadOutcome } from '../retry/classify-upload-outcome'
import { InvalidReleaseIdError } from '../errors/invalid-release-id-error'
import { GitHubApiError } from '../errors/github-api-error'
import { RetriableError } from '../errors/retriable-error'
import { log } from '../log/log'

/**
 * Upload one artifact to a release.
 *
 * A 422 (an asset with that name already exists) is rethrown as is. Any
 * other failure is wrapped in a `RetriableError` for the caller's retry
 * loop.
 *
 * @param client - GitHub client.
 * @param repo - Release repository.
 * @param releaseId - Id returned by `createRelease`.
 * @param artifact - Artifact to upload.
 * @param file - Artifact contents.
 */
export async function uploadArtifact(
  client: GitHubClient,
  repo: Repo,
  releaseId: string,
  artifact: Artifact,
  file: Blob,
): Promise<void> {
  if (!/^\d+$/u.test(releaseId)) {
    throw new InvalidReleaseIdError(releaseId)
  }
  let id = Number.parseInt(releaseId, 10)

  let failure: { error: unknown } | null = null
  try {
    await client.uploadReleaseAsset(repo, id, artifact.name, file)
  } catch (error) {
    failure = { error }
  }

  if (!failure) {
    return
  }

  let { error } = failure
  let response = error instanceof GitHubApiError ? error : null
  log.warn('upload failed', {
    'request-id': response?.requestId ?? '',
    'release-id': releaseId,
    name: artifact.name,
  })

  switch (classifyUploadOutcome(error, response?.status)) {
    case 'fatal':
      throw error
    case 'retriable':
      throw new RetriableError(error)
    case 'success':
      return
  }
}
