import { beforeEach, describe, expect, it, vi } from 'vitest'

import { createContext } from '../../core/context/create-context'
import { ConfigError } from '../../core/errors/config-error'
import { gitPipe } from '../../core/pipes/git-pipe'
import { runGit } from '../../core/git/run-git'

vi.mock('../../core/git/run-git', () => ({ runGit: vi.fn() }))

/**
 * Answer git commands from a table, failing for unknown ones.
 *
 * @param outputs - Output by space-joined arguments.
 */
function gitOutputs(outputs: Record<string, string>): void {
  vi.mocked(runGit).mockImplementation(args => {
    let output = outputs[args.join(' ')]
    if (output === undefined) {
      throw new Error(`fatal: ${args.join(' ')}`)
    }
    return output
  })
}

describe('gitPipe', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('resolves tag, commit, previous tag and repository', async () => {
    gitOutputs({
      'describe --tags --abbrev=0 v1.1.0-rc.1^': 'v1.0.0',
      'remote get-url origin': 'git@github.com:o/r.git',
      'rev-list -n 1 v1.1.0-rc.1': 'abc123',
      'describe --tags --abbrev=0': 'v1.1.0-rc.1',
    })
    let context = createContext({ config: {} })
    await gitPipe.run(context)

    expect(context.git).toEqual({
      currentTag: 'v1.1.0-rc.1',
      previousTag: 'v1.0.0',
      commit: 'abc123',
    })
    expect(context.isPrerelease).toBeTruthy()
    expect(context.config.release?.github).toEqual({ owner: 'o', name: 'r' })
  })

  it('keeps tags given up front and configured repositories', async () => {
    gitOutputs({ 'rev-list -n 1 v2.0.0': 'def456' })
    let context = createContext({
      config: { release: { github: { owner: 'a', name: 'b' } } },
      previousTag: 'v1.0.0',
      tag: 'v2.0.0',
    })
    await gitPipe.run(context)

    expect(context.git.previousTag).toBe('v1.0.0')
    expect(context.config.release?.github).toEqual({ owner: 'a', name: 'b' })
    expect(runGit).toHaveBeenCalledOnce()
  })

  it('treats a tag without predecessor as the first release', async () => {
    gitOutputs({ 'rev-list -n 1 v0.1.0': 'abc' })
    let context = createContext({
      config: { release: { github: { owner: 'o', name: 'r' } } },
      tag: 'v0.1.0',
    })
    await gitPipe.run(context)
    expect(context.git.previousTag).toBeNull()
  })

  it('fails without a tag', async () => {
    gitOutputs({})
    let context = createContext({ config: {} })
    await expect(gitPipe.run(context)).rejects.toThrow(
      'no tag found for the current commit, create one or pass --tag',
    )
  })

  it('fails for a tag that does not exist', async () => {
    gitOutputs({})
    let context = createContext({ config: {}, tag: 'v9.9.9' })
    await expect(gitPipe.run(context)).rejects.toThrow(ConfigError)
  })

  it('leaves the repository unset for remotes outside GitHub paths', async () => {
    gitOutputs({
      'remote get-url origin': '/srv/git/r.git',
      'rev-list -n 1 v1.0.0': 'abc',
    })
    let context = createContext({
      previousTag: 'v0.9.0',
      tag: 'v1.0.0',
      config: {},
    })
    await gitPipe.run(context)
    expect(context.config.release).toBeUndefined()
  })
})
