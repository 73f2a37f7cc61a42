import type { Context } from '../../types/context'
import type { Config } from '../../types/config'

/** Inputs of a run. */
interface ContextOptions {
  /** Environment variables for templates and credentials. */
  env?: Record<string, undefined | string>

  /** Pipes skipped with `--skip`. */
  skips?: Iterable<string>

  /** Release notes supplied up front, e.g. from a file. */
  releaseNotes?: string

  /** Cancellation signal. */
  signal?: AbortSignal

  /** Tag released before the current one. */
  previousTag?: string

  /** Tag to release, detected from git when absent. */
  tag?: string

  /** Resolved configuration. */
  config: Config
}

/**
 * Create the context of a run.
 *
 * @param options - Run inputs.
 * @returns Fresh context.
 */
export function createContext(options: ContextOptions): Context {
  return {
    git: {
      previousTag: options.previousTag ?? null,
      currentTag: options.tag ?? '',
      commit: '',
    },
    signal: options.signal ?? new AbortController().signal,
    releaseNotes: options.releaseNotes ?? '',
    skips: new Set(options.skips ?? []),
    config: options.config,
    env: options.env ?? {},
    isPrerelease: false,
    token: undefined,
    date: new Date(),
    releaseUrl: '',
    artifacts: [],
  }
}
