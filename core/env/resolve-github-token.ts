import { execFileSync } from 'node:child_process'
import { readFileSync } from 'node:fs'
import { join } from 'node:path'

/**
 * Resolve a GitHub token from the environment, the gh CLI, or git config.
 *
 * @param env - Environment variables.
 * @param cwd - Directory holding the `.git` folder.
 * @returns Token string or undefined when not found.
 */
export function resolveGitHubToken(
  env: Record<string, undefined | string>,
  cwd: string,
): undefined | string {
  for (let name of ['GITHUB_TOKEN', 'GH_TOKEN']) {
    let value = env[name]?.trim()
    if (value) {
      return value
    }
  }

  return fromGhCli() ?? fromGitConfig(join(cwd, '.git', 'config'))
}

/**
 * Ask the gh CLI for its token.
 *
 * @returns Token, or undefined when gh is missing or logged out.
 */
function fromGhCli(): undefined | string {
  try {
    let output = execFileSync('gh', ['auth', 'token'], {
      stdio: ['ignore', 'pipe', 'ignore'],
      encoding: 'utf8',
      timeout: 500,
    })
    return output.trim() || undefined
  } catch {
    /** Gh is optional. */
    return undefined
  }
}

/**
 * Read `github.token`, `github.oauth-token` or `hub.oauthtoken` from a git
 * config file.
 *
 * @param file - Path of the git config file.
 * @returns Token, or undefined when absent.
 */
function fromGitConfig(file: string): undefined | string {
  let content: string
  try {
    content = readFileSync(file, 'utf8')
  } catch {
    /** Not a git checkout. */
    return undefined
  }

  let section: string | null = null
  for (let rawLine of content.split(/\r?\n/u)) {
    let line = rawLine.trim()
    let header = line.match(/^\[(?<name>[^\]]+)\]$/u)?.groups?.['name']
    if (header) {
      section = header.toLowerCase()
      continue
    }

    let entry = line.match(/^(?<key>[\w-]+)\s*=\s*(?<value>\S.*)$/u)?.groups
    let key = entry?.['key']?.toLowerCase()
    let value = entry?.['value']?.trim()
    if (!key || !value) {
      continue
    }
    if (
      (section === 'github' && (key === 'token' || key === 'oauth-token')) ||
      (section === 'hub' && key === 'oauthtoken')
    ) {
      return value
    }
  }

  return undefined
}
