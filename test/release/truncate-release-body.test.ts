import { describe, expect, it } from 'vitest'

import {
  MAX_RELEASE_BODY_LENGTH,
  truncateReleaseBody,
} from '../../core/release/truncate-release-body'

describe('truncateReleaseBody', () => {
  it('keeps bodies at the limit', () => {
    let body = 'a'.repeat(MAX_RELEASE_BODY_LENGTH)
    expect(truncateReleaseBody(body)).toBe(body)
  })

  it('cuts longer bodies to a prefix of the limit', () => {
    let body = `${'a'.repeat(MAX_RELEASE_BODY_LENGTH)}tail`
    let result = truncateReleaseBody(body)
    expect(result).toHaveLength(MAX_RELEASE_BODY_LENGTH)
    expect(body.startsWith(result)).toBeTruthy()
  })

  it('never splits surrogate pairs', () => {
    let body = `a${'😀'.repeat(MAX_RELEASE_BODY_LENGTH)}`
    let result = truncateReleaseBody(body)
    expect([...result]).toHaveLength(MAX_RELEASE_BODY_LENGTH)
    expect(result.endsWith('😀')).toBeTruthy()
  })
})
