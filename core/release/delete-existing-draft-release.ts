import type { GitHubClient, GitHubRelease } from '../../types/github-client'
import type { Repo } from '../../types/repo'

import { collectPages } from '../pagination/collect-pages'
import { ReleaseError } from '../errors/release-error'
import { log } from '../log/log'

/**
 * Delete the most recent draft release carrying the given name.
 *
 * Every page of the listing is read before anything is deleted, so a draft
 * on a later page is never missed. GitHub lists newest first, so the first
 * match is the most recent draft. Finding none is not an error.
 *
 * @param client - GitHub client.
 * @param repo - Release repository.
 * @param name - Rendered release title.
 */
export async function deleteExistingDraftRelease(
  client: GitHubClient,
  repo: Repo,
  name: string,
): Promise<void> {
  let releases: GitHubRelease[]
  try {
    releases = await collectPages(page => client.listReleases(repo, page))
  } catch (error) {
    throw new ReleaseError('could not delete existing drafts', error)
  }

  let draft = releases.find(release => release.draft && release.name === name)
  if (!draft) {
    return
  }

  try {
    await client.deleteRelease(repo, draft.id)
  } catch (error) {
    throw new ReleaseError('could not delete previous draft release', error)
  }

  log.info('deleted previous draft release', {
    commit: draft.target_commitish,
    tag: draft.tag_name,
    name: draft.name,
  })
}
