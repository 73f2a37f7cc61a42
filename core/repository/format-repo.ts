import type { Repo } from '../../types/repo'

/**
 * Render a repository as `owner/name`.
 *
 * @param repo - Repository.
 * @returns Display string.
 */
export function formatRepo(repo: Repo): string {
  return `${repo.owner}/${repo.name}`
}
