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
 * Update an existing release.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.id - Numeric release id.
 * @param parameters.data - Release fields.
 * @returns The updated release.
 */
export function editRelease(
  context: GitHubClientContext,
  parameters: { data: ReleaseData; repo: Repo; id: number },
): Promise<GitHubResponse<GitHubRelease>> {
  return makeRequest<GitHubRelease>(
    context,
    `${repoPath(parameters.repo)}/releases/${parameters.id}`,
    {
      operation: 'edit release',
      body: parameters.data,
      repo: parameters.repo,
      method: 'PATCH',
    },
  )
}
