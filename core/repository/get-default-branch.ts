import type { GitHubClient } from '../../types/github-client'
import type { Repo } from '../../types/repo'

import { GitHubApiError } from '../errors/github-api-error'
import { formatRepo } from './format-repo'
import { log } from '../log/log'

/**
 * Fetch the default branch of a repository.
 *
 * @param client - GitHub client.
 * @param repo - Repository.
 * @returns Default branch name.
 */
export async function getDefaultBranch(
  client: GitHubClient,
  repo: Repo,
): Promise<string> {
  try {
    let response = await client.getRepository(repo)
    return response.data.default_branch
  } catch (error) {
    log.warn('error checking for default branch', {
      statusCode: error instanceof GitHubApiError ? error.status : 0,
      err: error instanceof Error ? error.message : String(error),
      projectID: formatRepo(repo),
    })
    throw error
  }
}
