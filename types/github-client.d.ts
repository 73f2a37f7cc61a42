import type { components } from '@octokit/openapi-types'

import type { GitHubResponse } from './github-response'
import type { Repo } from './repo'
import type { Page } from './page'

/** Release resource as returned by GitHub. */
export type GitHubRelease = components['schemas']['release']

/** Milestone resource as returned by GitHub. */
export type GitHubMilestone = components['schemas']['milestone']

/** Commit entry of a comparison. */
export type GitHubCommit = components['schemas']['commit']

/** Repository resource. */
export type GitHubRepository = components['schemas']['full-repository']

/** Uploaded release asset. */
export type GitHubReleaseAsset = components['schemas']['release-asset']

/** Writable release fields. */
export interface ReleaseData {
  /** Discussion category to create for the release. */
  discussion_category_name?: string

  /** Commitish the tag is created from, when it does not exist yet. */
  target_commitish?: string

  /** Whether the release is a prerelease. */
  prerelease: boolean

  /** Tag name. */
  tag_name: string

  /** Whether the release is a draft. */
  draft: boolean

  /** Release title. */
  name: string

  /** Release notes. */
  body: string
}

/** Payload for creating or updating a file. */
export interface FileContentData {
  /** Committer identity. */
  committer: { email: string; name: string }

  /** Blob SHA of the file being replaced. */
  sha?: string

  /** Branch to commit to. */
  branch?: string

  /** Commit message. */
  message: string

  /** Base64 encoded content. */
  content: string
}

/**
 * GitHub operations used by the release pipes.
 *
 * Methods are thin wrappers around the endpoint functions bound to one
 * client context (auth, base URLs, rate limit and cancellation).
 */
export interface GitHubClient {
  /** Upload an asset to a release. */
  uploadReleaseAsset(
    repo: Repo,
    releaseId: number,
    name: string,
    file: Blob,
  ): Promise<GitHubResponse<GitHubReleaseAsset>>

  /** Compare two refs, one page of commits at a time. */
  compareCommits(
    repo: Repo,
    base: string,
    head: string,
    page: number,
  ): Promise<Page<GitHubCommit>>

  /** Generate notes with GitHub's own generator. */
  generateReleaseNotes(
    repo: Repo,
    tag: string,
    previousTag: string | null,
  ): Promise<string>

  /** Edit a release. */
  editRelease(
    repo: Repo,
    id: number,
    data: ReleaseData,
  ): Promise<GitHubResponse<GitHubRelease>>

  /** Edit a milestone. */
  editMilestone(
    repo: Repo,
    number: number,
    state: 'closed' | 'open',
  ): Promise<GitHubResponse<GitHubMilestone>>

  /** Create or update a file. */
  putContents(
    repo: Repo,
    path: string,
    data: FileContentData,
  ): Promise<GitHubResponse<unknown>>

  /** Create a release. */
  createRelease(
    repo: Repo,
    data: ReleaseData,
  ): Promise<GitHubResponse<GitHubRelease>>

  /** Fetch a release by tag, null when there is none. */
  getReleaseByTag(repo: Repo, tag: string): Promise<GitHubRelease | null>

  /** Blob SHA of a file, null when the file does not exist. */
  getContentSha(repo: Repo, path: string): Promise<string | null>

  /** One page of milestones. */
  listMilestones(repo: Repo, page: number): Promise<Page<GitHubMilestone>>

  /** One page of releases, newest first. */
  listReleases(repo: Repo, page: number): Promise<Page<GitHubRelease>>

  /** Delete a release. */
  deleteRelease(repo: Repo, id: number): Promise<void>

  /** Repository metadata. */
  getRepository(repo: Repo): Promise<GitHubResponse<GitHubRepository>>
}
