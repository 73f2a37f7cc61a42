import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubMilestone } from '../../types/github-client'
import type { Page } from '../../types/page'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/** Page size for milestone listings. */
export const MILESTONES_PER_PAGE = 100

/**
 * Fetch one page of open milestones.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.page - 1-based page number.
 * @returns Milestones of the page and the next page number.
 */
export async function listMilestones(
  context: GitHubClientContext,
  parameters: { page: number; repo: Repo },
): Promise<Page<GitHubMilestone>> {
  let response = await makeRequest<GitHubMilestone[]>(
    context,
    `${repoPath(parameters.repo)}/milestones`,
    {
      query: { per_page: MILESTONES_PER_PAGE, page: parameters.page },
      operation: 'list milestones',
      repo: parameters.repo,
    },
  )
  return { nextPage: response.nextPage, items: response.data }
}
