import type { ErrorKind } from '../../types/error-kind'
import type { Repo } from '../../types/repo'

import { formatRepo } from '../repository/format-repo'

/** Non-2xx response from the GitHub API. */
export class GitHubApiError extends Error {
  public readonly kind = 'remote' satisfies ErrorKind

  public readonly repo: undefined | string

  public readonly requestId: string

  public readonly operation: string

  public readonly status: number

  /**
   * Creates a new GitHubApiError.
   *
   * @param parameters - Error details.
   * @param parameters.operation - Name of the API operation.
   * @param parameters.status - HTTP status code.
   * @param parameters.statusText - HTTP status text.
   * @param parameters.requestId - Value of `x-github-request-id`.
   * @param parameters.repo - Repository the request addressed, if any.
   */
  public constructor(parameters: {
    statusText: string
    operation: string
    requestId: string
    status: number
    repo?: Repo
  }) {
    let repo = parameters.repo ? formatRepo(parameters.repo) : undefined
    super(
      `${describeOperation(parameters.operation, repo)}: GitHub API error: ${parameters.status} ${parameters.statusText}`,
    )
    this.name = 'GitHubApiError'
    this.operation = parameters.operation
    this.requestId = parameters.requestId
    this.status = parameters.status
    this.repo = repo
  }
}

/**
 * Prefix for error messages: the operation, followed by the repository.
 *
 * @param operation - Name of the API operation.
 * @param repo - Repository as `owner/name`.
 * @returns Message prefix.
 */
export function describeOperation(
  operation: string,
  repo: undefined | string,
): string {
  return repo ? `${operation} ${repo}` : operation
}

/**
 * Check whether an error is a GitHub API error with the given status.
 *
 * @param error - Any thrown value.
 * @param status - Expected HTTP status.
 * @returns True when the status matches.
 */
export function hasStatus(error: unknown, status: number): boolean {
  return error instanceof GitHubApiError && error.status === status
}
