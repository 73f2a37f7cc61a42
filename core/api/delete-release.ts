import type { GitHubClientContext } from '../../types/github-client-context'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/**
 * Delete a release. The tag is left untouched.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.id - Numeric release id.
 */
export async function deleteRelease(
  context: GitHubClientContext,
  parameters: { repo: Repo; id: number },
): Promise<void> {
  await makeRequest<null>(
    context,
    `${repoPath(parameters.repo)}/releases/${parameters.id}`,
    { operation: 'delete release', repo: parameters.repo, method: 'DELETE' },
  )
}
