import { describe, expect, it } from 'vitest'

import { resolvePrerelease } from '../../core/git/resolve-prerelease'

describe('resolvePrerelease', () => {
  it('detects prerelease tags in auto mode', () => {
    expect(resolvePrerelease('auto', 'v1.0.0-rc.1')).toBeTruthy()
    expect(resolvePrerelease('auto', 'v1.0.0')).toBeFalsy()
  })

  it('treats tags that are not semver as releases', () => {
    expect(resolvePrerelease('auto', 'nightly')).toBeFalsy()
  })

  it('uses explicit flags as given', () => {
    expect(resolvePrerelease(true, 'v1.0.0')).toBeTruthy()
    expect(resolvePrerelease(false, 'v1.0.0-beta.2')).toBeFalsy()
  })
})
