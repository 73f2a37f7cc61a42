import { describe, expect, it } from 'vitest'

import { parseSkips } from '../../cli/parse-skips'

describe('parseSkips', () => {
  it('returns nothing without the option', () => {
    expect(parseSkips(undefined)).toEqual([])
  })

  it('splits comma separated lists', () => {
    expect(parseSkips('changelog, discord')).toEqual(['changelog', 'discord'])
  })

  it('merges repeated options and drops blanks', () => {
    expect(parseSkips(['release', 'milestone,,discord '])).toEqual([
      'release',
      'milestone',
      'discord',
    ])
  })
})
