import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'
import { repoPath } from './repo-path'

/**
 * Generate release notes with GitHub's built-in generator.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.repo - Target repository.
 * @param parameters.tag - Tag being released.
 * @param parameters.previousTag - Previous tag, null to let GitHub pick.
 * @returns Markdown notes body.
 */
export async function generateReleaseNotes(
  context: GitHubClientContext,
  parameters: { previousTag: string | null; repo: Repo; tag: string },
): Promise<string> {
  let response = await makeRequest<
    components['schemas']['release-notes-content']
  >(context, `${repoPath(parameters.repo)}/releases/generate-notes`, {
    body: {
      previous_tag_name: parameters.previousTag ?? undefined,
      tag_name: parameters.tag,
    },
    operation: 'generate release notes',
    repo: parameters.repo,
    method: 'POST',
  })
  return response.data.body
}
