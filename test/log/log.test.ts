import { describe, expect, it, vi } from 'vitest'

import { withIndent, log } from '../../core/log/log'

/**
 * Remove ANSI color codes.
 *
 * @param text - Colored text.
 * @returns Plain text.
 */
function plain(text: unknown): string {
  return String(text).replaceAll(/\u001B\[\d+m/gu, '')
}

describe('log', () => {
  it('prints messages with key=value fields', () => {
    let info = vi.spyOn(console, 'info').mockImplementation(() => {})
    log.info('uploaded', { name: 'a.tgz', skipped: undefined, attempt: 2 })
    expect(plain(info.mock.calls[0]?.[0])).toBe('• uploaded name=a.tgz attempt=2')
  })

  it('routes warnings and errors to their console methods', () => {
    let warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    let error = vi.spyOn(console, 'error').mockImplementation(() => {})
    log.warn('careful')
    log.error('failed', { err: 'boom' })
    expect(plain(warn.mock.calls[0]?.[0])).toBe('• careful')
    expect(plain(error.mock.calls[0]?.[0])).toBe('⨯ failed err=boom')
  })

  it('prints pipe headers with notes', () => {
    let info = vi.spyOn(console, 'info').mockImplementation(() => {})
    log.pipe('milestone', 'skipped')
    expect(plain(info.mock.calls[0]?.[0])).toBe('• milestone (skipped)')
  })

  it('indents nested output and restores depth after failures', async () => {
    let info = vi.spyOn(console, 'info').mockImplementation(() => {})
    await expect(
      withIndent(() => {
        log.info('inner')
        return Promise.reject(new Error('boom'))
      }),
    ).rejects.toThrow('boom')
    log.info('outer')
    expect(plain(info.mock.calls[0]?.[0])).toBe('   • inner')
    expect(plain(info.mock.calls[1]?.[0])).toBe('• outer')
  })
})
