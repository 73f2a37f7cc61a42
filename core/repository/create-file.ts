import type { FileContentData, GitHubClient } from '../../types/github-client'
import type { CommitAuthor } from '../../types/commit-author'
import type { Repo } from '../../types/repo'

import { getDefaultBranch } from './get-default-branch'
import { formatRepo } from './format-repo'
import { log } from '../log/log'

/**
 * Create a file in a repository, or update it when it already exists.
 *
 * Commits to `repo.branch`, or to the default branch. When the default
 * branch cannot be resolved the branch is left out and GitHub picks it.
 *
 * @param client - GitHub client.
 * @param author - Committer identity.
 * @param repo - Target repository.
 * @param content - File contents.
 * @param path - File path within the repository.
 * @param message - Commit message.
 */
export async function createFile(
  client: GitHubClient,
  author: CommitAuthor,
  repo: Repo,
  content: Uint8Array | string,
  path: string,
  message: string,
): Promise<void> {
  let { branch } = repo
  if (!branch) {
    try {
      branch = await getDefaultBranch(client, repo)
    } catch (error) {
      log.warn('error checking for default branch, using the API default', {
        err: error instanceof Error ? error.message : String(error),
        projectID: formatRepo(repo),
        fileName: path,
      })
    }
  }

  let data: FileContentData = {
    committer: { email: author.email, name: author.name },
    content: (typeof content === 'string' ?
      Buffer.from(content, 'utf8')
    : Buffer.from(content)
    ).toString('base64'),
    message,
  }
  if (branch) {
    data.branch = branch
  }

  let target: Repo = branch ? { ...repo, branch } : repo
  let sha = await client.getContentSha(target, path)
  if (sha) {
    data.sha = sha
  }

  await client.putContents(repo, path, data)
}
