import type {
  GitHubRelease,
  ReleaseData,
} from '../../types/github-client'
import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubResponse } from '../../types/github-response'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/**
 * Create a release.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.data - Release fields.
 * @returns The created release.
 */
export function createRelease(
  context: GitHubClientContext,
  parameters: { data: ReleaseData; repo: Repo },
): Promise<GitHubResponse<GitHubRelease>> {
  return makeRequest<GitHubRelease>(
    context,
    `${repoPath(parameters.repo)}/releases`,
    {
      operation: 'create release',
      body: parameters.data,
      repo: parameters.repo,
      method: 'POST',
    },
  )
}
