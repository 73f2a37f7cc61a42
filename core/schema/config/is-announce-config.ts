import type { AnnounceConfig } from '../../../types/config'

import { hasOptional } from '../has-optional'
import { isRecord } from '../is-record'

/**
 * Type guard to check if a value conforms to the AnnounceConfig interface.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid announce section.
 */
export function isAnnounceConfig(value: unknown): value is AnnounceConfig {
  if (!isRecord(value)) {
    return false
  }

  let { discord } = value
  if (discord === undefined) {
    return true
  }

  /** Colors may be written as YAML numbers or strings. */
  return (
    isRecord(discord) &&
    (discord['color'] === undefined ||
      typeof discord['color'] === 'string' ||
      Number.isInteger(discord['color'])) &&
    hasOptional(discord, 'messageTemplate', 'string') &&
    hasOptional(discord, 'enabled', 'boolean') &&
    hasOptional(discord, 'iconUrl', 'string') &&
    hasOptional(discord, 'author', 'string')
  )
}
