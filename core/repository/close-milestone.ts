import type { GitHubClient } from '../../types/github-client'
import type { Repo } from '../../types/repo'

import { NoMilestoneFoundError } from '../errors/no-milestone-found-error'
import { findInPages } from '../pagination/find-in-pages'

/**
 * Close the milestone with the given title.
 *
 * GitHub has no lookup by title, so open milestones are scanned page by
 * page; the first exact match in listing order is closed.
 *
 * @param client - GitHub client.
 * @param repo - Repository holding the milestone.
 * @param title - Milestone title.
 */
export async function closeMilestone(
  client: GitHubClient,
  repo: Repo,
  title: string,
): Promise<void> {
  let milestone = await findInPages(
    page => client.listMilestones(repo, page),
    item => item.title === title,
  )

  if (!milestone) {
    throw new NoMilestoneFoundError(title)
  }

  await client.editMilestone(repo, milestone.number, 'closed')
}
