import type { RepoConfig } from '../../types/config'

/**
 * Extract owner and name from a git remote URL.
 *
 * Handles `git@host:owner/name.git`, `ssh://git@host/owner/name.git` and
 * `https://host/owner/name(.git)`.
 *
 * @param url - Remote URL.
 * @returns Repository reference, or null when the URL is not recognized.
 */
export function parseRemoteUrl(url: string): RepoConfig | null {
  let match =
    url.trim().match(/^[\w.-]+@[\w.-]+:(?<path>[^:]+)$/u) ??
    url.trim().match(/^[a-z+]+:\/\/(?:[^@/]+@)?[^/]+\/(?<path>.+)$/u)

  let segments = (match?.groups?.['path'] ?? '')
    .replace(/\.git$/u, '')
    .replace(/\/+$/u, '')
    .split('/')

  if (segments.length !== 2) {
    return null
  }

  let [owner, name] = segments
  if (!owner || !name) {
    return null
  }
  return { owner, name }
}
