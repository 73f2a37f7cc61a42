import { stringify } from 'yaml'
import pc from 'picocolors'

import { createContext } from '../core/context/create-context'
import { readConfig } from '../core/config/read-config'
import { PIPES } from '../core/pipes/index'
import { printError } from './print-error'

/**
 * Validate the configuration and print it with defaults applied.
 *
 * @param configPath - Path given with `--config`.
 * @param cwd - Working directory.
 * @returns Process exit code.
 */
export async function runCheck(
  configPath: undefined | string,
  cwd: string,
): Promise<number> {
  try {
    let { config, path } = await readConfig(cwd, configPath)
    let context = createContext({ env: process.env, config })
    for (let pipe of PIPES) {
      await pipe.setDefaults(context)
    }

    console.info(pc.green(`✓ ${path ?? 'default configuration'} is valid\n`))
    console.info(stringify(context.config))
    return 0
  } catch (error) {
    printError(error)
    return 1
  }
}
