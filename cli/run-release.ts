import { createSpinner } from 'nanospinner'
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import pc from 'picocolors'

import type { Config } from '../types/config'

import { validateSkips } from '../core/pipeline/validate-skips'
import { createContext } from '../core/context/create-context'
import { planPipeline } from '../core/pipeline/plan-pipeline'
import { runPipeline } from '../core/pipeline/run-pipeline'
import { readConfig } from '../core/config/read-config'
import { confirmRelease } from './confirm-release'
import { PIPES } from '../core/pipes/index'
import { parseSkips } from './parse-skips'
import { printError } from './print-error'
import { printPlan } from './print-plan'

/** Options of the release command. */
export interface ReleaseOptions {
  /** Pipes to skip (repeatable, comma separated). */
  skip?: string[] | string

  /** File with release notes, replaces the changelog. */
  releaseNotes?: string

  /** Tag released before the current one. */
  previousTag?: string

  /** Config file path. */
  config?: string

  /** Force a draft release. */
  draft?: boolean

  /** Tag to release. */
  tag?: string

  /** Only print which pipes would run. */
  dryRun: boolean

  /** Skip the confirmation prompt. */
  yes: boolean
}

/**
 * Run the release command.
 *
 * @param options - Command options.
 * @param cwd - Working directory.
 * @returns Process exit code.
 */
export async function runRelease(
  options: ReleaseOptions,
  cwd: string,
): Promise<number> {
  let spinner = createSpinner('Loading configuration...').start()

  let config: Config
  let releaseNotes = ''
  try {
    let loaded = await readConfig(cwd, options.config)
    config = loaded.config
    if (options.releaseNotes) {
      releaseNotes = await readFile(
        path.resolve(cwd, options.releaseNotes),
        'utf8',
      )
    }
    spinner.success({
      text:
        loaded.path ?
          `Loaded ${pc.cyan(path.relative(cwd, loaded.path))}`
        : 'No configuration file found, using defaults',
    })
  } catch (error) {
    spinner.error({ text: 'Could not load configuration' })
    printError(error)
    return 1
  }

  if (options.draft) {
    config.release = { ...config.release, draft: true }
  }

  let controller = new AbortController()
  let onInterrupt = (): void => {
    controller.abort(new Error('interrupted'))
  }
  process.once('SIGINT', onInterrupt)

  let context = createContext({
    previousTag: options.previousTag,
    skips: parseSkips(options.skip),
    signal: controller.signal,
    tag: options.tag,
    env: process.env,
    releaseNotes,
    config,
  })

  try {
    validateSkips(PIPES, context.skips)

    if (options.dryRun) {
      printPlan(await planPipeline(context, PIPES))
      return 0
    }

    if (!options.yes && process.stdin.isTTY) {
      let confirmed = await confirmRelease(options.tag ?? 'the latest tag')
      if (!confirmed) {
        return 0
      }
    }

    console.info(pc.cyan('\n🚀 Publishing release\n'))
    await runPipeline(context, PIPES)

    console.info(
      pc.green(
        `\n✓ Release succeeded${context.releaseUrl ? `: ${context.releaseUrl}` : ''}\n`,
      ),
    )
    return 0
  } catch (error) {
    printError(error)
    return 1
  } finally {
    process.off('SIGINT', onInterrupt)
  }
}
