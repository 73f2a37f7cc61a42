import type { Config } from '../../../types/config'

import { isMilestoneConfig } from './is-milestone-config'
import { isChangelogConfig } from './is-changelog-config'
import { isAnnounceConfig } from './is-announce-config'
import { isReleaseConfig } from './is-release-config'
import { isGitHubUrls } from './is-github-urls'

/** Validates the value of one top-level config field. */
type SectionGuard = (value: unknown) => boolean

/** Guard of every top-level config field. */
export const CONFIG_SECTIONS = {
  artifacts: value =>
    Array.isArray(value) && value.every(item => typeof item === 'string'),
  milestones: value => Array.isArray(value) && value.every(isMilestoneConfig),
  parallelism: value => Number.isInteger(value) && Number(value) > 0,
  projectName: value => typeof value === 'string',
  changelog: isChangelogConfig,
  announce: isAnnounceConfig,
  githubUrls: isGitHubUrls,
  release: isReleaseConfig,
} satisfies Record<keyof Config, SectionGuard>

/**
 * Find the guard of a top-level field.
 *
 * @param key - Field name.
 * @returns Guard, or undefined for unknown fields.
 */
export function getSectionGuard(key: string): SectionGuard | undefined {
  return new Map<string, SectionGuard>(Object.entries(CONFIG_SECTIONS)).get(key)
}
