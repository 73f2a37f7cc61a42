import type { Pipe } from '../../types/pipe'

import { changelogPipe } from './changelog-pipe'
import { artifactsPipe } from './artifacts-pipe'
import { milestonePipe } from './milestone-pipe'
import { releasePipe } from './release-pipe'
import { discordPipe } from './discord-pipe'
import { envPipe } from './env-pipe'
import { gitPipe } from './git-pipe'

/** Publish pipes, in execution order. */
export const PIPES: readonly Pipe[] = [
  gitPipe,
  envPipe,
  changelogPipe,
  artifactsPipe,
  releasePipe,
  milestonePipe,
  discordPipe,
]
