import type { ChangelogConfig } from '../../../types/config'

import { hasOptional } from '../has-optional'
import { isRecord } from '../is-record'

/**
 * Type guard to check if a value conforms to the ChangelogConfig interface.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid changelog section.
 */
export function isChangelogConfig(value: unknown): value is ChangelogConfig {
  if (!isRecord(value)) {
    return false
  }

  let { use } = value
  return (
    (use === undefined || use === 'github' || use === 'github-native') &&
    hasOptional(value, 'disable', 'boolean')
  )
}
