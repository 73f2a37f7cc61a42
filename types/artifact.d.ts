/** A locally produced file attached to the release. */
export interface Artifact {
  /** Asset name used on upload. */
  name: string

  /** Path to the file on disk. */
  path: string
}
