import type { Context } from '../../types/context'
import type { Config } from '../../types/config'

import { createContext } from '../../core/context/create-context'

/**
 * Create a context for a release of `v1.0.0` in `o/r`.
 *
 * @param config - Config merged over the defaults.
 * @returns Context with git state and token filled in.
 */
export function testContext(config: Config = {}): Context {
  let context = createContext({
    config: {
      projectName: 'demo',
      ...config,
      release: { github: { owner: 'o', name: 'r' }, ...config.release },
    },
    env: { HOME: '/home/test' },
    previousTag: 'v0.9.0',
    tag: 'v1.0.0',
  })
  context.git.commit = '0123456789abcdef0123456789abcdef01234567'
  context.token = 'test-token'
  return context
}
