import type { Config } from '../../../types/config'

import { getSectionGuard } from './config-sections'
import { isRecord } from '../is-record'

/**
 * Type guard to check if a value conforms to the Config interface.
 *
 * Unknown top-level fields make the value invalid.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid configuration.
 */
export function isConfig(value: unknown): value is Config {
  if (!isRecord(value)) {
    return false
  }

  return Object.entries(value).every(([key, section]) => {
    let guard = getSectionGuard(key)
    return guard !== undefined && guard(section)
  })
}
