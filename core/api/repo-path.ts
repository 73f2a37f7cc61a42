import type { Repo } from '../../types/repo'

/**
 * Build the `/repos/{owner}/{name}` API path prefix.
 *
 * @param repo - Target repository.
 * @returns Encoded path prefix.
 */
export function repoPath(repo: Repo): string {
  return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}`
}
