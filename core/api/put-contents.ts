import type { GitHubClientContext } from '../../types/github-client-context'
import type { FileContentData } from '../../types/github-client'
import type { GitHubResponse } from '../../types/github-response'
import type { Repo } from '../../types/repo'

import { encodePath } from './get-content-sha'
import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/**
 * Create a file, or update it when `data.sha` is set.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.path - File path within the repository.
 * @param parameters.data - Commit payload.
 * @returns Raw commit response.
 */
export function putContents(
  context: GitHubClientContext,
  parameters: { data: FileContentData; path: string; repo: Repo },
): Promise<GitHubResponse<unknown>> {
  return makeRequest<unknown>(
    context,
    `${repoPath(parameters.repo)}/contents/${encodePath(parameters.path)}`,
    {
      operation: parameters.data.sha ? 'update file' : 'create file',
      body: parameters.data,
      repo: parameters.repo,
      method: 'PUT',
    },
  )
}
