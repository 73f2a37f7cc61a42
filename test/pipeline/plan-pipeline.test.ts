import { describe, expect, it } from 'vitest'

import { planPipeline } from '../../core/pipeline/plan-pipeline'
import { validateSkips } from '../../core/pipeline/validate-skips'
import { ConfigError } from '../../core/errors/config-error'
import { testContext } from '../helpers/test-context'
import { PIPES } from '../../core/pipes'

describe('planPipeline', () => {
  it('lists every pipe with its skip reason', async () => {
    let context = testContext({
      milestones: [{ close: true }],
      changelog: { disable: true },
    })
    context.skips = new Set(['release'])

    expect(await planPipeline(context, PIPES)).toEqual([
      { skipped: null, name: 'git' },
      { skipped: null, name: 'env' },
      { skipped: 'skipped', name: 'changelog' },
      { skipped: 'skipped', name: 'artifacts' },
      { skipped: '--skip', name: 'release' },
      { skipped: null, name: 'milestone' },
      { skipped: 'skipped', name: 'discord' },
    ])
  })

  it('applies defaults of pipes that would run', async () => {
    let context = testContext({ milestones: [{ close: true }] })
    await planPipeline(context, PIPES)
    expect(context.config.milestones).toEqual([
      { nameTemplate: '{{ .Tag }}', close: true },
    ])
    expect(context.config.release).toMatchObject({
      mode: 'keep-existing',
      draft: false,
    })
  })
})

describe('validateSkips', () => {
  it('accepts skippable pipes', () => {
    expect(() => validateSkips(PIPES, ['changelog', 'discord'])).not.toThrow()
  })

  it('rejects unknown and mandatory pipes', () => {
    expect(() => validateSkips(PIPES, ['git'])).toThrow(ConfigError)
    expect(() => validateSkips(PIPES, ['nope'])).toThrow(
      '--skip=nope is not allowed, valid options are: changelog, release, milestone, discord',
    )
  })
})
