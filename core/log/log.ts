import pc from 'picocolors'

/** Structured context printed after a log message. */
type Fields = Record<string, undefined | boolean | string | number | null>

/** Current nesting level, raised while a pipe runs. */
let depth = 0

/**
 * Format fields as gray `key=value` pairs.
 *
 * @param fields - Structured context.
 * @returns Formatted suffix, empty without fields.
 */
function formatFields(fields: Fields | undefined): string {
  if (!fields) {
    return ''
  }
  let pairs = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`)
  return pairs.length > 0 ? ` ${pc.gray(pairs.join(' '))}` : ''
}

/**
 * Build the line prefix for the current nesting level.
 *
 * @param bullet - Colored bullet.
 * @returns Indented bullet.
 */
function prefix(bullet: string): string {
  return `${'   '.repeat(depth)}${bullet} `
}

/** Run logger. */
export const log = {
  /**
   * Print an error.
   *
   * @param message - Message text.
   * @param fields - Structured context.
   */
  error(message: string, fields?: Fields): void {
    console.error(`${prefix(pc.red('⨯'))}${message}${formatFields(fields)}`)
  },

  /**
   * Print a warning.
   *
   * @param message - Message text.
   * @param fields - Structured context.
   */
  warn(message: string, fields?: Fields): void {
    console.warn(`${prefix(pc.yellow('•'))}${message}${formatFields(fields)}`)
  },

  /**
   * Print an informational message.
   *
   * @param message - Message text.
   * @param fields - Structured context.
   */
  info(message: string, fields?: Fields): void {
    console.info(`${prefix(pc.cyan('•'))}${message}${formatFields(fields)}`)
  },

  /**
   * Print a pipe header.
   *
   * @param name - Pipe name.
   * @param note - Optional gray note, e.g. why it was skipped.
   */
  pipe(name: string, note?: string): void {
    let suffix = note ? ` ${pc.gray(`(${note})`)}` : ''
    console.info(`${prefix(pc.bold(pc.cyan('•')))}${pc.bold(name)}${suffix}`)
  },
}

/**
 * Run a task with log output nested one level deeper.
 *
 * @param task - Task to run.
 * @returns Task result.
 */
export async function withIndent<T>(task: () => Promise<T>): Promise<T> {
  depth++
  try {
    return await task()
  } finally {
    depth--
  }
}
