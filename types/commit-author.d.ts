/** Committer identity used when writing files through the API. */
export interface CommitAuthor {
  /** Committer email. */
  email: string

  /** Committer name. */
  name: string
}
