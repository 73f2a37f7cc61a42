import type { Repo } from '../../types/repo'

import { describeOperation, GitHubApiError } from './github-api-error'

/** The API refused the request because the rate limit is exhausted. */
export class GitHubRateLimitError extends GitHubApiError {
  public readonly resetAt: Date

  /**
   * Creates a new GitHubRateLimitError.
   *
   * @param parameters - Error details.
   * @param parameters.operation - Name of the API operation.
   * @param parameters.requestId - Value of `x-github-request-id`.
   * @param parameters.resetAt - The time when the rate limit resets.
   * @param parameters.repo - Repository the request addressed, if any.
   */
  public constructor(parameters: {
    operation: string
    requestId: string
    resetAt: Date
    repo?: Repo
  }) {
    super({ ...parameters, statusText: 'Forbidden', status: 403 })
    this.name = 'GitHubRateLimitError'
    this.message = `${describeOperation(parameters.operation, this.repo)}: GitHub API rate limit exceeded. Resets at ${parameters.resetAt.toISOString()}`
    this.resetAt = parameters.resetAt
  }
}
