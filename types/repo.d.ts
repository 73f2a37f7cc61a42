/** Remote GitHub project addressed by release operations. */
export interface Repo {
  /** Branch override for file commits (default branch when absent). */
  readonly branch?: string

  /** Repository owner (user or organization). */
  readonly owner: string

  /** Repository name. */
  readonly name: string
}
