import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubRelease } from '../../types/github-client'
import type { Page } from '../../types/page'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/** Page size for release listings. */
export const RELEASES_PER_PAGE = 50

/**
 * Fetch one page of releases, newest first. Drafts are included when the
 * token has push access.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.page - 1-based page number.
 * @returns Releases of the page and the next page number.
 */
export async function listReleases(
  context: GitHubClientContext,
  parameters: { page: number; repo: Repo },
): Promise<Page<GitHubRelease>> {
  let response = await makeRequest<GitHubRelease[]>(
    context,
    `${repoPath(parameters.repo)}/releases`,
    {
      query: { per_page: RELEASES_PER_PAGE, page: parameters.page },
      operation: 'list releases',
      repo: parameters.repo,
    },
  )
  return { nextPage: response.nextPage, items: response.data }
}
