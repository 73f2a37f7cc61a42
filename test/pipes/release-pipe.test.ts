import { beforeEach, describe, expect, it, vi } from 'vitest'

import { mockGitHub, failure, json } from '../helpers/github-server'
import { releasePipe } from '../../core/pipes/release-pipe'
import { testContext } from '../helpers/test-context'

vi.mock('node:fs', async importOriginal => ({
  ...(await importOriginal<typeof import('node:fs')>()),
  openAsBlob: vi.fn(() => Promise.resolve(new Blob(['data']))),
}))

describe('releasePipe', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
  })

  it('applies defaults without overriding configured values', () => {
    let context = testContext({ release: { mode: 'append' }, parallelism: 2 })
    releasePipe.setDefaults(context)
    expect(context.config.release).toEqual({
      github: { owner: 'o', name: 'r' },
      replaceExistingDraft: false,
      nameTemplate: '{{ .Tag }}',
      prerelease: 'auto',
      mode: 'append',
      draft: false,
    })
    expect(context.config.parallelism).toBe(2)
  })

  it('publishes the release, uploads artifacts and records the URL', async () => {
    let requests = mockGitHub({
      'POST /repos/o/r/releases/42/assets': () => json({}, { status: 201 }),
      'POST /repos/o/r/releases': () => json({ id: 42 }, { status: 201 }),
    })
    let context = testContext()
    context.releaseNotes = 'notes'
    context.artifacts = [{ path: '/tmp/app.tgz', name: 'app.tgz' }]
    releasePipe.setDefaults(context)
    await releasePipe.run(context)

    expect(
      requests.map(request => `${request.method} ${request.url.host}`),
    ).toEqual([
      'GET api.github.com',
      'POST api.github.com',
      'POST uploads.github.com',
    ])
    expect(context.releaseUrl).toBe(
      'https://github.com/o/r/releases/tag/v1.0.0',
    )
  })

  it('leaves the URL unset when publishing fails', async () => {
    mockGitHub({ 'POST /repos/o/r/releases': () => failure(401, 'Unauthorized') })
    let context = testContext()
    releasePipe.setDefaults(context)
    await expect(releasePipe.run(context)).rejects.toThrow(
      'could not release: create release o/r: GitHub API error: 401 Unauthorized',
    )
    expect(context.releaseUrl).toBe('')
  })

  it('skips when disabled', () => {
    expect(
      releasePipe.skip(testContext({ release: { disable: true } })),
    ).toBeTruthy()
    expect(releasePipe.skip(testContext())).toBeFalsy()
  })
})
