import type { GitHubCommit } from '../../types/github-client'

/** Length of abbreviated commit hashes. */
const SHORT_SHA_LENGTH = 7

/**
 * Format a commit as `<short sha>: <subject> (@<login>)`.
 *
 * The author suffix is left out for commits without a GitHub account.
 *
 * @param commit - Commit from a comparison.
 * @returns Changelog line.
 */
export function formatCommitLine(commit: GitHubCommit): string {
  let [subject = ''] = commit.commit.message.split('\n')
  let sha = commit.sha.slice(0, SHORT_SHA_LENGTH)
  let login = commit.author && 'login' in commit.author ? commit.author.login : ''
  return login ? `${sha}: ${subject} (@${login})` : `${sha}: ${subject}`
}
