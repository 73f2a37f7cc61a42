/**
 * Wrap a commit log into a Markdown release notes section.
 *
 * @param commitLog - Newline separated commit lines.
 * @returns Notes body, empty when there are no commits.
 */
export function formatChangelog(commitLog: string): string {
  if (commitLog === '') {
    return ''
  }
  let items = commitLog.split('\n').map(line => `* ${line}`)
  return `## Changelog\n\n${items.join('\n')}\n`
}
