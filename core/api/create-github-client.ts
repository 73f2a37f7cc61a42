import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubClient } from '../../types/github-client'
import type { Context } from '../../types/context'

import { Agent } from 'undici'

import { renderTemplate } from '../template/render-template'
import { generateReleaseNotes } from './generate-release-notes'
import { uploadReleaseAsset } from './upload-release-asset'
import { getReleaseByTag } from './get-release-by-tag'
import { ConfigError } from '../errors/config-error'
import { compareCommits } from './compare-commits'
import { listMilestones } from './list-milestones'
import { getContentSha } from './get-content-sha'
import { deleteRelease } from './delete-release'
import { editMilestone } from './edit-milestone'
import { getRepository } from './get-repository'
import { createRelease } from './create-release'
import { listReleases } from './list-releases'
import { editRelease } from './edit-release'
import { putContents } from './put-contents'

/** REST API host used when `githubUrls.api` is not set. */
export const DEFAULT_API_URL = 'https://api.github.com'

/** Upload host used when `githubUrls.upload` is not set. */
export const DEFAULT_UPLOAD_URL = 'https://uploads.github.com'

/**
 * Create a GitHub API client bound to a run context.
 *
 * Base URLs come from `githubUrls` (rendered as templates) so GitHub
 * Enterprise works; every request carries the context token and signal.
 * With `skipTlsVerify` the client gets its own connection pool that accepts
 * any certificate. Other HTTP traffic of the process is unaffected.
 *
 * @param context - Run context.
 * @returns Client with bound methods.
 */
export function createGitHubClient(context: Context): GitHubClient {
  let urls = context.config.githubUrls ?? {}

  let clientContext: GitHubClientContext = {
    uploadUrl: resolveUrl(context, 'upload', urls.upload, DEFAULT_UPLOAD_URL),
    baseUrl: resolveUrl(context, 'API', urls.api, DEFAULT_API_URL),
    dispatcher: urls.skipTlsVerify
      ? new Agent({ connect: { rejectUnauthorized: false } })
      : undefined,
    rateLimitRemaining: context.token ? 5000 : 60,
    rateLimitReset: new Date(),
    signal: context.signal,
    token: context.token,
  }

  return {
    compareCommits: (repo, base, head, page) =>
      compareCommits(clientContext, { base, head, page, repo }),
    uploadReleaseAsset: (repo, releaseId, name, file) =>
      uploadReleaseAsset(clientContext, { releaseId, name, file, repo }),
    generateReleaseNotes: (repo, tag, previousTag) =>
      generateReleaseNotes(clientContext, { previousTag, repo, tag }),
    editMilestone: (repo, number, state) =>
      editMilestone(clientContext, { number, state, repo }),
    putContents: (repo, path, data) =>
      putContents(clientContext, { path, data, repo }),
    editRelease: (repo, id, data) =>
      editRelease(clientContext, { data, repo, id }),
    getReleaseByTag: (repo, tag) =>
      getReleaseByTag(clientContext, { repo, tag }),
    listMilestones: (repo, page) =>
      listMilestones(clientContext, { page, repo }),
    getContentSha: (repo, path) => getContentSha(clientContext, { path, repo }),
    createRelease: (repo, data) => createRelease(clientContext, { data, repo }),
    listReleases: (repo, page) => listReleases(clientContext, { page, repo }),
    deleteRelease: (repo, id) => deleteRelease(clientContext, { repo, id }),
    getRepository: repo => getRepository(clientContext, repo),
  }
}

/**
 * Render and validate one of the configurable base URLs.
 *
 * @param context - Run context.
 * @param label - Name used in errors.
 * @param template - Configured template, if any.
 * @param fallback - URL used without a template.
 * @returns Absolute URL.
 */
function resolveUrl(
  context: Context,
  label: string,
  template: undefined | string,
  fallback: string,
): string {
  if (!template) {
    return fallback
  }
  let rendered = renderTemplate(context, template)
  try {
    return new URL(rendered).toString()
  } catch (error) {
    throw new ConfigError(`invalid GitHub ${label} URL: "${rendered}"`, {
      cause: error,
    })
  }
}
