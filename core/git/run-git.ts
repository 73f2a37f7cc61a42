import { execFileSync } from 'node:child_process'

/**
 * Run a git command and return its trimmed output.
 *
 * @param args - Git arguments.
 * @returns Standard output without surrounding whitespace.
 */
export function runGit(args: string[]): string {
  let output = execFileSync('git', args, {
    stdio: ['ignore', 'pipe', 'pipe'],
    encoding: 'utf8',
  })
  return output.trim()
}
