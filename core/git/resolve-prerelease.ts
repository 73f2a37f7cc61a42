import semver from 'semver'

import type { PrereleaseMode } from '../../types/config'

/**
 * Decide whether a tag is released as a prerelease.
 *
 * @param mode - Configured prerelease flag.
 * @param tag - Tag being released.
 * @returns True for prereleases.
 */
export function resolvePrerelease(mode: PrereleaseMode, tag: string): boolean {
  if (mode !== 'auto') {
    return mode
  }
  return (semver.prerelease(tag)?.length ?? 0) > 0
}
