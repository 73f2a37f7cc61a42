import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubRepository } from '../../types/github-client'
import type { GitHubResponse } from '../../types/github-response'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/**
 * Fetch repository metadata.
 *
 * @param context - Client context.
 * @param repo - Target repository.
 * @returns Repository resource.
 */
export function getRepository(
  context: GitHubClientContext,
  repo: Repo,
): Promise<GitHubResponse<GitHubRepository>> {
  return makeRequest<GitHubRepository>(context, repoPath(repo), {
    operation: 'get repository',
    repo,
  })
}
