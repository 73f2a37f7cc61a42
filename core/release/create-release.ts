import type {
  GitHubClient,
  GitHubRelease,
  ReleaseData,
} from '../../types/github-client'
import type { ReleaseNotesMode } from '../../types/config'
import type { Context } from '../../types/context'
import type { Repo } from '../../types/repo'

import { deleteExistingDraftRelease } from './delete-existing-draft-release'
import { truncateReleaseBody } from './truncate-release-body'
import { renderTemplate } from '../template/render-template'
import { mergeReleaseNotes } from './merge-release-notes'
import { ReleaseError } from '../errors/release-error'
import { releaseRepo } from './release-repo'
import { log } from '../log/log'

/**
 * Publish the release for the current tag, or update it when it exists.
 *
 * When the release already exists its current body is read from GitHub and
 * merged with `body` according to `release.mode`, so notes written by an
 * earlier attempt of the same run survive a retry.
 *
 * Not safe to call concurrently for the same tag.
 *
 * @param context - Run context.
 * @param client - GitHub client.
 * @param body - Release notes.
 * @returns Release id as an opaque string.
 */
export async function createRelease(
  context: Context,
  client: GitHubClient,
  body: string,
): Promise<string> {
  let config = context.config.release ?? {}
  let repo = releaseRepo(context)
  let title = renderTemplate(context, config.nameTemplate ?? '{{ .Tag }}')

  if (config.draft && config.replaceExistingDraft) {
    await deleteExistingDraftRelease(client, repo, title)
  }

  let data: ReleaseData = {
    prerelease: context.isPrerelease,
    tag_name: context.git.currentTag,
    body: truncateReleaseBody(body),
    draft: config.draft ?? false,
    name: title,
  }

  if (config.discussionCategoryName) {
    data.discussion_category_name = config.discussionCategoryName
  }

  if (config.targetCommitish) {
    let target = renderTemplate(context, config.targetCommitish)
    if (target !== '') {
      data.target_commitish = target
    }
  }

  let release: GitHubRelease
  try {
    release = await createOrUpdateRelease(
      client,
      repo,
      data,
      config.mode ?? 'keep-existing',
    )
  } catch (error) {
    throw new ReleaseError('could not release', error)
  }

  return String(release.id)
}

/**
 * Create the release, or edit the published release of the same tag.
 *
 * @param client - GitHub client.
 * @param repo - Release repository.
 * @param data - Release fields.
 * @param mode - Notes merge mode for an existing release.
 * @returns Created or updated release.
 */
async function createOrUpdateRelease(
  client: GitHubClient,
  repo: Repo,
  data: ReleaseData,
  mode: ReleaseNotesMode,
): Promise<GitHubRelease> {
  let existing = await client.getReleaseByTag(repo, data.tag_name)

  if (!existing) {
    let response = await client.createRelease(repo, data)
    log.info('release created', {
      'request-id': response.requestId,
      'release-id': response.data.id,
      name: data.name,
    })
    return response.data
  }

  let merged = truncateReleaseBody(
    mergeReleaseNotes(existing.body ?? '', data.body, mode),
  )
  let response = await client.editRelease(repo, existing.id, {
    ...data,
    body: merged,
  })
  log.info('release updated', {
    'request-id': response.requestId,
    'release-id': response.data.id,
    name: data.name,
  })
  return response.data
}
