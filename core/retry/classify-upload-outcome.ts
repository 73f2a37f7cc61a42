import type { UploadOutcome } from '../../types/upload-outcome'

/**
 * Decide whether an upload attempt may be retried.
 *
 * A 422 means an asset with that name already exists, which no retry can
 * fix. Every other failure, including one without any response, is
 * retriable.
 *
 * @param error - Failure of the attempt, undefined on success.
 * @param status - HTTP status of the response, if one was received.
 * @returns Outcome classification.
 */
export function classifyUploadOutcome(
  error: unknown,
  status: undefined | number,
): UploadOutcome {
  if (error === undefined || error === null) {
    return 'success'
  }
  if (status === 422) {
    return 'fatal'
  }
  return 'retriable'
}
