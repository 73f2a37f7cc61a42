import type { Config } from '../../types/config'

import { getSectionGuard } from '../schema/config/config-sections'
import { isConfig } from '../schema/config/is-config'
import { ConfigError } from '../errors/config-error'
import { isRecord } from '../schema/is-record'

/**
 * Validate a parsed configuration document.
 *
 * An empty document is an empty configuration.
 *
 * @param value - Parsed YAML value.
 * @param source - File name used in error messages.
 * @returns Typed configuration.
 */
export function validateConfig(value: unknown, source: string): Config {
  if (value === null || value === undefined) {
    return {}
  }

  if (!isRecord(value)) {
    throw new ConfigError(`${source}: configuration must be a mapping`)
  }

  for (let [key, section] of Object.entries(value)) {
    let guard = getSectionGuard(key)
    if (!guard) {
      throw new ConfigError(`${source}: unknown field "${key}"`)
    }
    if (!guard(section)) {
      throw new ConfigError(`${source}: invalid "${key}" section`)
    }
  }

  if (!isConfig(value)) {
    throw new ConfigError(`${source}: invalid configuration`)
  }
  return value
}
