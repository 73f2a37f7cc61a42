import type { GitHubClient } from '../../types/github-client'
import type { Repo } from '../../types/repo'

import { iteratePages } from '../pagination/iterate-pages'
import { formatCommitLine } from './format-commit-line'

/**
 * Build a plain commit log between two refs from the compare API.
 *
 * Commits keep the order GitHub returns them in, across all pages.
 *
 * @param client - GitHub client.
 * @param repo - Repository.
 * @param previous - Previous tag.
 * @param current - Current tag.
 * @returns One line per commit, newline separated.
 */
export async function buildChangelog(
  client: GitHubClient,
  repo: Repo,
  previous: string,
  current: string,
): Promise<string> {
  let lines: string[] = []
  for await (let commit of iteratePages(page =>
    client.compareCommits(repo, previous, current, page),
  )) {
    lines.push(formatCommitLine(commit))
  }
  return lines.join('\n')
}
