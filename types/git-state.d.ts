/** Git state of the revision being released. */
export interface GitState {
  /** Tag released before the current one, null for the first release. */
  previousTag: string | null

  /** Tag being released. */
  currentTag: string

  /** Full commit SHA the tag points to. */
  commit: string
}
