/** Longest release body GitHub accepts, in characters. */
export const MAX_RELEASE_BODY_LENGTH = 125_000

/**
 * Cut a release body down to the size GitHub accepts.
 *
 * Counts code points, so a surrogate pair is never split.
 *
 * @param body - Release notes.
 * @returns The body, or its first `MAX_RELEASE_BODY_LENGTH` characters.
 */
export function truncateReleaseBody(body: string): string {
  if (body.length <= MAX_RELEASE_BODY_LENGTH) {
    return body
  }

  let end = 0
  for (
    let count = 0;
    count < MAX_RELEASE_BODY_LENGTH && end < body.length;
    count++
  ) {
    end += (body.codePointAt(end) ?? 0) > 0xffff ? 2 : 1
  }
  return body.slice(0, end)
}
