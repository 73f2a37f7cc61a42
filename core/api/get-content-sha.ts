import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { Repo } from '../../types/repo'

import { hasStatus } from '../errors/github-api-error'
import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/**
 * Resolve the blob SHA of a file.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository, `branch` selects the ref.
 * @param parameters.path - File path within the repository.
 * @returns Blob SHA, or null when the file does not exist.
 */
export async function getContentSha(
  context: GitHubClientContext,
  parameters: { path: string; repo: Repo },
): Promise<string | null> {
  try {
    let response = await makeRequest<components['schemas']['content-file']>(
      context,
      `${repoPath(parameters.repo)}/contents/${encodePath(parameters.path)}`,
      {
        query: { ref: parameters.repo.branch },
        operation: 'get contents',
        repo: parameters.repo,
      },
    )
    return response.data.sha
  } catch (error) {
    if (hasStatus(error, 404)) {
      return null
    }
    throw error
  }
}

/**
 * Encode every segment of a repository path.
 *
 * @param path - Slash separated path.
 * @returns Encoded path.
 */
export function encodePath(path: string): string {
  return path
    .split('/')
    .filter(Boolean)
    .map(segment => encodeURIComponent(segment))
    .join('/')
}
