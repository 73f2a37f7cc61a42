export type {
  PrereleaseMode,
  ReleaseNotesMode,
  ReleaseConfig,
  Config,
} from '../types/config'
export type { GitHubClient, ReleaseData } from '../types/github-client'
export type { FetchPage, Page } from '../types/page'
export type { ErrorKind } from '../types/error-kind'
export type { Pipe, PipePhase } from '../types/pipe'
export type { Context } from '../types/context'
export type { Artifact } from '../types/artifact'
export type { Repo } from '../types/repo'

export { deleteExistingDraftRelease } from './release/delete-existing-draft-release'
export { classifyUploadOutcome } from './retry/classify-upload-outcome'
export { NoMilestoneFoundError } from './errors/no-milestone-found-error'
export { InvalidReleaseIdError } from './errors/invalid-release-id-error'
export { RetriableError, isRetriableError } from './errors/retriable-error'
export { truncateReleaseBody } from './release/truncate-release-body'
export { GitHubApiError, hasStatus } from './errors/github-api-error'
export { GitHubRateLimitError } from './errors/github-rate-limit-error'
export { getDefaultBranch } from './repository/get-default-branch'
export { mergeReleaseNotes } from './release/merge-release-notes'
export { createGitHubClient } from './api/create-github-client'
export { closeMilestone } from './repository/close-milestone'
export { buildChangelog } from './changelog/build-changelog'
export { renderTemplate } from './template/render-template'
export { uploadArtifacts } from './release/upload-artifacts'
export { createContext } from './context/create-context'
export { uploadArtifact } from './release/upload-artifact'
export { createRelease } from './release/create-release'
export { collectPages } from './pagination/collect-pages'
export { iteratePages } from './pagination/iterate-pages'
export { findInPages } from './pagination/find-in-pages'
export { createFile } from './repository/create-file'
export { runPipeline } from './pipeline/run-pipeline'
export { TemplateError } from './errors/template-error'
export { ReleaseError } from './errors/release-error'
export { ConfigError } from './errors/config-error'
export { PipeError } from './errors/pipe-error'
export { readConfig } from './config/read-config'
export { PIPES } from './pipes/index'
export { retry } from './retry/retry'
