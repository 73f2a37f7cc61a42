import type { MilestoneConfig } from '../../../types/config'

import { isRepoConfig } from './is-repo-config'
import { hasOptional } from '../has-optional'
import { isRecord } from '../is-record'

/**
 * Type guard to check if a value conforms to the MilestoneConfig interface.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid milestone entry.
 */
export function isMilestoneConfig(value: unknown): value is MilestoneConfig {
  if (!isRecord(value)) {
    return false
  }

  return (
    (value['repo'] === undefined || isRepoConfig(value['repo'])) &&
    hasOptional(value, 'nameTemplate', 'string') &&
    hasOptional(value, 'failOnError', 'boolean') &&
    hasOptional(value, 'close', 'boolean')
  )
}
