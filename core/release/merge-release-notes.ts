import type { ReleaseNotesMode } from '../../types/config'

/** Separator placed between existing and new notes. */
export const NOTES_SEPARATOR = '\n\n'

/**
 * Merge new release notes with the notes already on the release.
 *
 * @param existing - Body currently stored on the release.
 * @param current - Newly generated body.
 * @param mode - Merge mode.
 * @returns Body to store.
 */
export function mergeReleaseNotes(
  existing: string,
  current: string,
  mode: ReleaseNotesMode,
): string {
  switch (mode) {
    case 'keep-existing':
      return existing === '' ? current : existing
    case 'prepend':
      return `${current}${NOTES_SEPARATOR}${existing}`
    case 'append':
      return `${existing}${NOTES_SEPARATOR}${current}`
    case 'replace':
      return current
  }
}
