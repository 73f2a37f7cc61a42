import type { Artifact } from './artifact'
import type { GitState } from './git-state'
import type { Config } from './config'

/**
 * State of a single run, shared by reference between all pipes.
 *
 * Created once by `createContext` and dropped when the run ends.
 */
export interface Context {
  /** Template variables for `{{ .Env.NAME }}`. */
  env: Record<string, undefined | string>

  /** Pipes skipped with `--skip`. */
  skips: Set<string>

  /** Cancellation signal observed by every remote call. */
  signal: AbortSignal

  /** Token for the GitHub API, set by the env pipe. */
  token: undefined | string

  /** Files to upload, set by the artifacts pipe. */
  artifacts: Artifact[]

  /** Whether the release is a prerelease. */
  isPrerelease: boolean

  /** Release notes body. */
  releaseNotes: string

  /** URL of the published release page. */
  releaseUrl: string

  /** Resolved configuration. */
  config: Config

  /** Git state, set by the git pipe. */
  git: GitState

  /** Run start time. */
  date: Date
}
