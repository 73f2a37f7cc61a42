import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubMilestone } from '../../types/github-client'
import type { GitHubResponse } from '../../types/github-response'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/**
 * Change the state of a milestone.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.number - Milestone number.
 * @param parameters.state - New state.
 * @returns The updated milestone.
 */
export function editMilestone(
  context: GitHubClientContext,
  parameters: { state: 'closed' | 'open'; number: number; repo: Repo },
): Promise<GitHubResponse<GitHubMilestone>> {
  return makeRequest<GitHubMilestone>(
    context,
    `${repoPath(parameters.repo)}/milestones/${parameters.number}`,
    {
      body: { state: parameters.state },
      operation: 'edit milestone',
      repo: parameters.repo,
      method: 'PATCH',
    },
  )
}
