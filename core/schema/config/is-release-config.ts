import type { ReleaseConfig } from '../../../types/config'

import { isRepoConfig } from './is-repo-config'
import { hasOptional } from '../has-optional'
import { isRecord } from '../is-record'

/** Accepted values of `release.mode`. */
const NOTES_MODES = new Set(['keep-existing', 'replace', 'prepend', 'append'])

/**
 * Type guard to check if a value conforms to the ReleaseConfig interface.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid release section.
 */
export function isReleaseConfig(value: unknown): value is ReleaseConfig {
  if (!isRecord(value)) {
    return false
  }

  let { prerelease, github, mode } = value

  return (
    (github === undefined || isRepoConfig(github)) &&
    (mode === undefined ||
      (typeof mode === 'string' && NOTES_MODES.has(mode))) &&
    (prerelease === undefined ||
      typeof prerelease === 'boolean' ||
      prerelease === 'auto') &&
    hasOptional(value, 'discussionCategoryName', 'string') &&
    hasOptional(value, 'replaceExistingDraft', 'boolean') &&
    hasOptional(value, 'targetCommitish', 'string') &&
    hasOptional(value, 'nameTemplate', 'string') &&
    hasOptional(value, 'disable', 'boolean') &&
    hasOptional(value, 'draft', 'boolean')
  )
}
