import { describe, expect, it, vi } from 'vitest'
import { Agent } from 'undici'

import { createGitHubClient } from '../../core/api/create-github-client'
import { mockGitHub, failure, json } from '../helpers/github-server'
import { ConfigError } from '../../core/errors/config-error'
import { testContext } from '../helpers/test-context'

let repo = { owner: 'o', name: 'r' }

describe('createGitHubClient', () => {
  it('talks to api.github.com by default', async () => {
    let requests = mockGitHub({
      'GET /repos/o/r': () => json({ default_branch: 'main' }),
    })
    let client = createGitHubClient(testContext())
    let response = await client.getRepository(repo)
    expect(response.data.default_branch).toBe('main')
    expect(requests[0]?.url.origin).toBe('https://api.github.com')
  })

  it('renders configured enterprise URLs', async () => {
    let requests = mockGitHub({
      'GET /api/v3/repos/o/r': () => json({ default_branch: 'trunk' }),
    })
    let context = testContext({
      githubUrls: { api: 'https://{{ .Env.GHE_HOST }}/api/v3/' },
    })
    context.env['GHE_HOST'] = 'ghe.test'
    let client = createGitHubClient(context)
    await client.getRepository(repo)
    expect(requests[0]?.url.toString()).toBe(
      'https://ghe.test/api/v3/repos/o/r',
    )
  })

  it('sends uploads to the upload host', async () => {
    let requests = mockGitHub({
      'POST /repos/o/r/releases/7/assets': () =>
        json({ name: 'a.tgz', id: 1 }, { status: 201 }),
    })
    let client = createGitHubClient(testContext())
    await client.uploadReleaseAsset(repo, 7, 'a.tgz', new Blob(['data']))
    expect(requests[0]?.url.toString()).toBe(
      'https://uploads.github.com/repos/o/r/releases/7/assets?name=a.tgz',
    )
    expect(requests[0]?.body).toBeInstanceOf(Blob)
  })

  it('uses its own connection pool when TLS checks are off', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(json({ default_branch: 'main' }))
    let client = createGitHubClient(
      testContext({ githubUrls: { skipTlsVerify: true } }),
    )
    await client.getRepository(repo)
    expect(spy.mock.calls[0]?.[1]?.dispatcher).toBeInstanceOf(Agent)
  })

  it('uses the default connection pool otherwise', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(json({ default_branch: 'main' }))
    await createGitHubClient(testContext()).getRepository(repo)
    expect(spy.mock.calls[0]?.[1]?.dispatcher).toBeUndefined()
  })

  it('rejects URLs that do not parse', () => {
    let context = testContext({ githubUrls: { upload: 'not a url' } })
    expect(() => createGitHubClient(context)).toThrow(ConfigError)
    expect(() => createGitHubClient(context)).toThrow(
      'invalid GitHub upload URL: "not a url"',
    )
  })

  it('returns null for a tag without release', async () => {
    mockGitHub({
      'GET /repos/o/r/releases/tags/v1.0.0': () => failure(404, 'Not Found'),
    })
    let client = createGitHubClient(testContext())
    await expect(client.getReleaseByTag(repo, 'v1.0.0')).resolves.toBeNull()
  })

  it('propagates other errors when looking up a release', async () => {
    mockGitHub({
      'GET /repos/o/r/releases/tags/v1.0.0': () =>
        failure(500, 'Internal Server Error'),
    })
    let client = createGitHubClient(testContext())
    await expect(client.getReleaseByTag(repo, 'v1.0.0')).rejects.toThrow(
      'get release by tag o/r: GitHub API error: 500 Internal Server Error',
    )
  })

  it('returns null content sha for missing files', async () => {
    mockGitHub({})
    let client = createGitHubClient(testContext())
    await expect(
      client.getContentSha({ ...repo, branch: 'main' }, 'docs/a b.md'),
    ).resolves.toBeNull()
  })
})
