import { readFile } from 'node:fs/promises'
import { parse } from 'yaml'
import path from 'node:path'

import type { Config } from '../../types/config'

import { ConfigError } from '../errors/config-error'
import { validateConfig } from './validate-config'

/** File names looked up in the working directory, in order. */
export const CONFIG_FILES = ['.release-pipes.yml', '.release-pipes.yaml']

/** A loaded configuration and where it came from. */
interface LoadedConfig {
  /** Path of the file, null when none was found. */
  path: string | null

  /** Validated configuration. */
  config: Config
}

/**
 * Load the configuration file.
 *
 * With an explicit path the file must exist. Otherwise the default file
 * names are tried in `directory`, and a missing file yields an empty
 * configuration.
 *
 * @param directory - Working directory.
 * @param explicit - Path given with `--config`.
 * @returns Loaded configuration.
 */
export async function readConfig(
  directory: string,
  explicit?: string,
): Promise<LoadedConfig> {
  if (explicit) {
    let file = path.resolve(directory, explicit)
    let content = await readConfigFile(file)
    if (content === null) {
      throw new ConfigError(`config file not found: ${file}`)
    }
    return { config: parseConfig(content, file), path: file }
  }

  for (let name of CONFIG_FILES) {
    let file = path.join(directory, name)
    let content = await readConfigFile(file)
    if (content !== null) {
      return { config: parseConfig(content, file), path: file }
    }
  }

  return { path: null, config: {} }
}

/**
 * Parse and validate YAML configuration text.
 *
 * @param content - YAML source.
 * @param source - File name used in error messages.
 * @returns Validated configuration.
 */
export function parseConfig(content: string, source: string): Config {
  let value: unknown
  try {
    value = parse(content)
  } catch (error) {
    throw new ConfigError(`${source}: invalid YAML`, { cause: error })
  }
  return validateConfig(value, source)
}

/**
 * Read a file, returning null when it does not exist.
 *
 * @param file - Absolute path.
 * @returns File content or null.
 */
async function readConfigFile(file: string): Promise<string | null> {
  try {
    return await readFile(file, 'utf8')
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'ENOENT'
    ) {
      return null
    }
    throw error
  }
}
