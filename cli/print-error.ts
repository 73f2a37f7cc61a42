import pc from 'picocolors'

import { GitHubRateLimitError } from '../core/errors/github-rate-limit-error'
import { GitHubApiError } from '../core/errors/github-api-error'

/**
 * Walk the `cause` chain of an error.
 *
 * @param error - Top-level error.
 * @returns The error and all its causes, outermost first.
 */
function causeChain(error: unknown): unknown[] {
  let chain: unknown[] = []
  for (
    let current: unknown = error;
    current !== undefined && !chain.includes(current);
    current = current instanceof Error ? current.cause : undefined
  ) {
    chain.push(current)
  }
  return chain
}

/**
 * Print a run failure with hints for well-known causes.
 *
 * @param error - The failure.
 */
export function printError(error: unknown): void {
  console.error(
    pc.redBright('\nError:'),
    error instanceof Error ? error.message : String(error),
  )

  let chain = causeChain(error)

  let api = chain.find(item => item instanceof GitHubApiError)
  if (api instanceof GitHubApiError && api.requestId) {
    console.error(pc.gray(`GitHub request id: ${api.requestId}`))
  }

  if (chain.some(item => item instanceof GitHubRateLimitError)) {
    console.error(
      pc.gray('\nExample: GITHUB_TOKEN=<token> release-pipes\n'),
    )
  }
}
