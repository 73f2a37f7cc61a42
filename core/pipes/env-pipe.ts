import type { Pipe } from '../../types/pipe'

import { resolveGitHubToken } from '../env/resolve-github-token'
import { ConfigError } from '../errors/config-error'
import { log } from '../log/log'

/** Load the GitHub token and report insecure transport settings. */
export const envPipe: Pipe = {
  run: async context => {
    let token = context.token ?? resolveGitHubToken(context.env, process.cwd())
    if (!token) {
      throw new ConfigError(
        'missing GitHub token, set GITHUB_TOKEN or GH_TOKEN, or log in with gh',
      )
    }
    context.token = token

    if (context.config.githubUrls?.skipTlsVerify) {
      log.warn('TLS certificate verification is disabled for GitHub requests')
    }
  },
  setDefaults: () => {},
  skip: () => false,
  name: 'env',
}
