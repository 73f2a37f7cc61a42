import type { RepoConfig } from '../../../types/config'

import { hasOptional } from '../has-optional'
import { isRecord } from '../is-record'

/**
 * Type guard to check if a value is a repository reference.
 *
 * @param value - The value to check.
 * @returns True if owner and name are non-empty strings.
 */
export function isRepoConfig(value: unknown): value is RepoConfig {
  if (!isRecord(value)) {
    return false
  }

  return (
    typeof value['owner'] === 'string' &&
    typeof value['name'] === 'string' &&
    value['owner'] !== '' &&
    value['name'] !== '' &&
    hasOptional(value, 'branch', 'string')
  )
}
