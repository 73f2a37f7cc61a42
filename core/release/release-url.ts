import type { Context } from '../../types/context'

import { renderTemplate } from '../template/render-template'
import { releaseRepo } from './release-repo'

/** Download host used when `githubUrls.download` is not set. */
export const DEFAULT_DOWNLOAD_URL = 'https://github.com'

/**
 * Render the download base URL.
 *
 * @param context - Run context.
 * @returns Base URL without a trailing slash.
 */
function downloadUrl(context: Context): string {
  let template = context.config.githubUrls?.download ?? DEFAULT_DOWNLOAD_URL
  return renderTemplate(context, template).replace(/\/+$/u, '')
}

/**
 * Build the URL template of release downloads.
 *
 * The result still contains `{{ .Tag }}` and `{{ .ArtifactName }}` for the
 * caller to render.
 *
 * @param context - Run context.
 * @returns Download URL template.
 */
export function releaseUrlTemplate(context: Context): string {
  let repo = releaseRepo(context)
  return `${downloadUrl(context)}/${repo.owner}/${repo.name}/releases/download/{{ .Tag }}/{{ .ArtifactName }}`
}

/**
 * Build the URL of the release page for the current tag.
 *
 * @param context - Run context.
 * @returns Release page URL.
 */
export function releaseHtmlUrl(context: Context): string {
  let repo = releaseRepo(context)
  return `${downloadUrl(context)}/${repo.owner}/${repo.name}/releases/tag/${encodeURIComponent(context.git.currentTag)}`
}
