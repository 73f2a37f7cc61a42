import type { GitHubReleaseAsset } from '../../types/github-client'
import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubResponse } from '../../types/github-response'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/**
 * Upload a file as a release asset.
 *
 * Uploads go to the upload host, not the REST API host.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.releaseId - Numeric release id.
 * @param parameters.name - Asset name.
 * @param parameters.file - File contents.
 * @returns The created asset.
 */
export function uploadReleaseAsset(
  context: GitHubClientContext,
  parameters: { releaseId: number; name: string; file: Blob; repo: Repo },
): Promise<GitHubResponse<GitHubReleaseAsset>> {
  return makeRequest<GitHubReleaseAsset>(
    context,
    `${repoPath(parameters.repo)}/releases/${parameters.releaseId}/assets`,
    {
      query: { name: parameters.name },
      operation: 'upload release asset',
      repo: parameters.repo,
      baseUrl: context.uploadUrl,
      body: parameters.file,
      method: 'POST',
    },
  )
}
