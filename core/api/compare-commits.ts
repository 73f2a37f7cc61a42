import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubCommit } from '../../types/github-client'
import type { Page } from '../../types/page'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/** Page size for commit comparisons. */
export const COMMITS_PER_PAGE = 100

/**
 * Fetch one page of commits between two refs, oldest first.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.base - Base ref.
 * @param parameters.head - Head ref.
 * @param parameters.page - 1-based page number.
 * @returns Commits of the page and the next page number.
 */
export async function compareCommits(
  context: GitHubClientContext,
  parameters: { page: number; base: string; head: string; repo: Repo },
): Promise<Page<GitHubCommit>> {
  let { base, head } = parameters
  let response = await makeRequest<components['schemas']['commit-comparison']>(
    context,
    `${repoPath(parameters.repo)}/compare/${encodeURIComponent(base)}...${encodeURIComponent(head)}`,
    {
      query: { per_page: COMMITS_PER_PAGE, page: parameters.page },
      operation: 'compare commits',
      repo: parameters.repo,
    },
  )
  return { items: response.data.commits, nextPage: response.nextPage }
}
