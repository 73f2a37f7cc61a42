/** How new release notes merge with notes already on the release. */
export type ReleaseNotesMode = 'keep-existing' | 'replace' | 'prepend' | 'append'

/** Prerelease flag, `auto` derives it from the tag. */
export type PrereleaseMode = boolean | 'auto'

/** Source of the release notes. */
export type ChangelogSource = 'github-native' | 'github'

/** Repository the release is published to. */
export interface RepoConfig {
  /** Branch override for file commits. */
  branch?: string

  /** Repository owner. */
  owner: string

  /** Repository name. */
  name: string
}

/** Release settings. */
export interface ReleaseConfig {
  /** Discussion category to open for the release. */
  discussionCategoryName?: string

  /** Delete a draft with the same name before publishing. */
  replaceExistingDraft?: boolean

  /** Target commitish template. */
  targetCommitish?: string

  /** Prerelease flag. */
  prerelease?: PrereleaseMode

  /** Notes merge mode when the release already exists. */
  mode?: ReleaseNotesMode

  /** Release title template. */
  nameTemplate?: string

  /** Target repository. */
  github?: RepoConfig

  /** Skip the release pipe. */
  disable?: boolean

  /** Publish as draft. */
  draft?: boolean
}

/** Changelog settings. */
export interface ChangelogConfig {
  /** Which generator builds the notes. */
  use?: ChangelogSource

  /** Skip the changelog pipe. */
  disable?: boolean
}

/** Milestone closing settings. */
export interface MilestoneConfig {
  /** Fail the run when closing fails. */
  failOnError?: boolean

  /** Milestone title template. */
  nameTemplate?: string

  /** Repository holding the milestone, release repository when absent. */
  repo?: RepoConfig

  /** Close the milestone. */
  close?: boolean
}

/** Discord announcement settings. */
export interface DiscordConfig {
  /** Message template. */
  messageTemplate?: string

  /** Whether to announce. */
  enabled?: boolean

  /** Embed icon. */
  iconUrl?: string

  /** Embed author. */
  author?: string

  /** Decimal embed color. */
  color?: string | number
}

/** Announcement settings. */
export interface AnnounceConfig {
  /** Discord webhook. */
  discord?: DiscordConfig
}

/** GitHub endpoints, for GitHub Enterprise. */
export interface GitHubUrls {
  /** Disable TLS certificate checks. */
  skipTlsVerify?: boolean

  /** Download base URL template. */
  download?: string

  /** Upload base URL template. */
  upload?: string

  /** REST API base URL template. */
  api?: string
}

/** Resolved project configuration. */
export interface Config {
  /** Milestones to close after the release. */
  milestones?: MilestoneConfig[]

  /** Changelog settings. */
  changelog?: ChangelogConfig

  /** Maximum concurrent uploads. */
  parallelism?: number

  /** GitHub endpoints. */
  githubUrls?: GitHubUrls

  /** Announcement settings. */
  announce?: AnnounceConfig

  /** Release settings. */
  release?: ReleaseConfig

  /** Files to upload. */
  artifacts?: string[]

  /** Project name used in templates. */
  projectName?: string
}
