import { readFile } from 'node:fs/promises'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { parseConfig, readConfig } from '../../core/config/read-config'
import { ConfigError } from '../../core/errors/config-error'

vi.mock('node:fs/promises', () => ({ readFile: vi.fn() }))

/**
 * Serve file contents from a table, failing with ENOENT otherwise.
 *
 * @param files - Content by absolute path.
 */
function files(contents: Record<string, string>): void {
  vi.mocked(readFile).mockImplementation(file => {
    let content = contents[String(file)]
    if (content === undefined) {
      return Promise.reject(
        Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' }),
      )
    }
    return Promise.resolve(content)
  })
}

describe('readConfig', () => {
  beforeEach(() => {
    files({})
  })

  it('finds the default file in the working directory', async () => {
    files({ '/w/.release-pipes.yaml': 'projectName: demo\n' })
    expect(await readConfig('/w')).toEqual({
      path: '/w/.release-pipes.yaml',
      config: { projectName: 'demo' },
    })
  })

  it('prefers the .yml file', async () => {
    files({
      '/w/.release-pipes.yaml': 'projectName: second\n',
      '/w/.release-pipes.yml': 'projectName: first\n',
    })
    expect((await readConfig('/w')).config).toEqual({ projectName: 'first' })
  })

  it('returns an empty configuration without a file', async () => {
    expect(await readConfig('/w')).toEqual({ path: null, config: {} })
  })

  it('resolves an explicit path against the working directory', async () => {
    files({ '/w/ci/release.yml': 'parallelism: 2\n' })
    expect(await readConfig('/w', 'ci/release.yml')).toEqual({
      path: '/w/ci/release.yml',
      config: { parallelism: 2 },
    })
  })

  it('fails when an explicit file is missing', async () => {
    await expect(readConfig('/w', 'nope.yml')).rejects.toThrow(
      'config file not found: /w/nope.yml',
    )
  })

  it('propagates read errors other than a missing file', async () => {
    vi.mocked(readFile).mockRejectedValue(new Error('EACCES'))
    await expect(readConfig('/w')).rejects.toThrow('EACCES')
  })
})

describe('parseConfig', () => {
  it('parses and validates YAML', () => {
    expect(
      parseConfig(
        'release:\n  github:\n    owner: o\n    name: r\n  mode: replace\n',
        'cfg.yml',
      ),
    ).toEqual({ release: { github: { owner: 'o', name: 'r' }, mode: 'replace' } })
  })

  it('reports YAML syntax errors', () => {
    expect(() => parseConfig('release: [', 'cfg.yml')).toThrow(
      new ConfigError('cfg.yml: invalid YAML'),
    )
  })
})
