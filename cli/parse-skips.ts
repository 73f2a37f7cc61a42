/**
 * Normalize `--skip` values, which may repeat and hold comma separated lists.
 *
 * @param raw - Raw option value.
 * @returns Pipe names.
 */
export function parseSkips(raw: undefined | string[] | string): string[] {
  let values: string[] = []
  if (Array.isArray(raw)) {
    values.push(...raw)
  } else if (typeof raw === 'string') {
    values.push(raw)
  }

  return values
    .flatMap(item => item.split(','))
    .map(item => item.trim())
    .filter(Boolean)
}
