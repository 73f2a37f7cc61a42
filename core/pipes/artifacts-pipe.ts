import { stat } from 'node:fs/promises'
import path from 'node:path'

import type { Pipe } from '../../types/pipe'

import { ConfigError } from '../errors/config-error'
import { log } from '../log/log'

/** Collect the configured files to upload. */
export const artifactsPipe: Pipe = {
  run: async context => {
    let names = new Set<string>()

    for (let file of context.config.artifacts ?? []) {
      let absolute = path.resolve(file)
      let isFile = await stat(absolute).then(
        stats => stats.isFile(),
        () => false,
      )
      if (!isFile) {
        throw new ConfigError(`artifact not found: ${file}`)
      }

      let name = path.basename(absolute)
      if (names.has(name)) {
        throw new ConfigError(`duplicate artifact name: ${name}`)
      }
      names.add(name)
      context.artifacts.push({ path: absolute, name })
    }

    log.info('artifacts collected', { count: context.artifacts.length })
  },
  skip: context => (context.config.artifacts ?? []).length === 0,
  setDefaults: () => {},
  name: 'artifacts',
}
