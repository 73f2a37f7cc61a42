import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubRelease } from '../../types/github-client'
import type { Repo } from '../../types/repo'

import { hasStatus } from '../errors/github-api-error'
import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/**
 * Fetch the release for a tag.
 *
 * Drafts are not returned by this endpoint. A 404 means no published release
 * exists for the tag.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.tag - Tag name.
 * @returns The release, or null when there is none.
 */
export async function getReleaseByTag(
  context: GitHubClientContext,
  parameters: { repo: Repo; tag: string },
): Promise<GitHubRelease | null> {
  try {
    let response = await makeRequest<GitHubRelease>(
      context,
      `${repoPath(parameters.repo)}/releases/tags/${encodeURIComponent(parameters.tag)}`,
      { operation: 'get release by tag', repo: parameters.repo },
    )
    return response.data
  } catch (error) {
    if (hasStatus(error, 404)) {
      return null
    }
    throw error
  }
}
