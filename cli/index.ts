import cac from 'cac'

import type { ReleaseOptions } from './run-release'

import { version } from '../package.json'
import { runRelease } from './run-release'
import { runCheck } from './run-check'

/** Run the CLI. */
export function run(): void {
  let cli = cac('release-pipes')

  cli
    .help()
    .version(version)
    .option('--config <path>', 'Config file (default: .release-pipes.yml)')

  cli
    .command('check', 'Validate the configuration and print the defaults')
    .action(async (options: { config?: string }) => {
      process.exitCode = await runCheck(options.config, process.cwd())
    })

  cli
    .command('', 'Publish a release for the current tag')
    .option('--tag <tag>', 'Tag to release (default: latest tag on HEAD)')
    .option('--previous-tag <tag>', 'Tag to compare against for the changelog')
    .option('--release-notes <file>', 'Use notes from a file')
    .option('--skip <pipes>', 'Skip pipes, e.g. changelog,discord (repeatable)')
    .option('--draft', 'Publish the release as a draft')
    .option('--dry-run', 'Show which pipes would run without publishing')
    .option('--yes, -y', 'Skip the confirmation prompt')
    .action(async (options: ReleaseOptions) => {
      process.exitCode = await runRelease(options, process.cwd())
    })

  cli.parse()
}
