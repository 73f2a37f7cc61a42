import type { GitHubUrls } from '../../../types/config'

import { hasOptional } from '../has-optional'
import { isRecord } from '../is-record'

/**
 * Type guard to check if a value conforms to the GitHubUrls interface.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid githubUrls section.
 */
export function isGitHubUrls(value: unknown): value is GitHubUrls {
  return (
    isRecord(value) &&
    hasOptional(value, 'skipTlsVerify', 'boolean') &&
    hasOptional(value, 'download', 'string') &&
    hasOptional(value, 'upload', 'string') &&
    hasOptional(value, 'api', 'string')
  )
}
