import { beforeEach, describe, expect, it, vi } from 'vitest'

import { InvalidReleaseIdError } from '../../core/errors/invalid-release-id-error'
import { createGitHubClient } from '../../core/api/create-github-client'
import { uploadArtifact } from '../../core/release/upload-artifact'
import { RetriableError } from '../../core/errors/retriable-error'
import { GitHubApiError } from '../../core/errors/github-api-error'
import { mockGitHub, failure, json } from '../helpers/github-server'
import { testContext } from '../helpers/test-context'

let repo = { owner: 'o', name: 'r' }
let artifact = { path: 'dist/app.tgz', name: 'app.tgz' }

describe('uploadArtifact', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('uploads the file under the artifact name', async () => {
    let requests = mockGitHub({
      'POST /repos/o/r/releases/42/assets': () =>
        json({ name: 'app.tgz', id: 1 }, { status: 201 }),
    })
    let client = createGitHubClient(testContext())
    await uploadArtifact(client, repo, '42', artifact, new Blob(['data']))
    expect(requests[0]?.url.searchParams.get('name')).toBe('app.tgz')
  })

  it('rethrows 422 without marking it retriable', async () => {
    mockGitHub({
      'POST /repos/o/r/releases/42/assets': () =>
        failure(422, 'Unprocessable Entity'),
    })
    let client = createGitHubClient(testContext())
    let error = await uploadArtifact(
      client,
      repo,
      '42',
      artifact,
      new Blob(['data']),
    ).catch((error_: unknown) => error_)

    expect(error).toBeInstanceOf(GitHubApiError)
    expect(error).not.toBeInstanceOf(RetriableError)
    expect(error).toHaveProperty('status', 422)
  })

  it('marks server errors as retriable', async () => {
    mockGitHub({
      'POST /repos/o/r/releases/42/assets': () => failure(502, 'Bad Gateway'),
    })
    let client = createGitHubClient(testContext())
    await expect(
      uploadArtifact(client, repo, '42', artifact, new Blob(['data'])),
    ).rejects.toThrow(RetriableError)
  })

  it('marks network failures as retriable', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'))
    let client = createGitHubClient(testContext())
    await expect(
      uploadArtifact(client, repo, '42', artifact, new Blob(['data'])),
    ).rejects.toThrow(RetriableError)
  })

  it('logs the failing upload', async () => {
    let warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('{}', {
        headers: { 'x-github-request-id': 'REQ-1' },
        statusText: 'Bad Gateway',
        status: 502,
      }),
    )
    let client = createGitHubClient(testContext())
    await expect(
      uploadArtifact(client, repo, '42', artifact, new Blob(['data'])),
    ).rejects.toThrow(RetriableError)
    expect(warn).toHaveBeenCalledWith(
      expect.stringContaining('request-id=REQ-1 release-id=42 name=app.tgz'),
    )
  })

  it.each(['', 'abc', '12a', '-1'])(
    'rejects the malformed release id %j before any request',
    async releaseId => {
      let spy = vi.spyOn(globalThis, 'fetch')
      let client = createGitHubClient(testContext())
      await expect(
        uploadArtifact(client, repo, releaseId, artifact, new Blob(['data'])),
      ).rejects.toThrow(InvalidReleaseIdError)
      expect(spy).not.toHaveBeenCalled()
    },
  )
})
