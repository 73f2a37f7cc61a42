import type { Pipe } from '../../types/pipe'

import { renderTemplate } from '../template/render-template'
import { ConfigError } from '../errors/config-error'
import { log } from '../log/log'

/** Discord webhook API base. */
const DISCORD_API_URL = 'https://discord.com/api/webhooks'

const DEFAULT_MESSAGE_TEMPLATE =
  '{{ .ProjectName }} {{ .Tag }} is out! Check it out at {{ .ReleaseURL }}'

const DEFAULT_ICON = 'https://github.githubassets.com/favicons/favicon.png'

const DEFAULT_AUTHOR = 'release-pipes'

const DEFAULT_COLOR = '3888754'

/** Announce the release on a Discord webhook. */
export const discordPipe: Pipe = {
  run: async context => {
    let discord = context.config.announce?.discord ?? {}
    let message = renderTemplate(
      context,
      discord.messageTemplate ?? DEFAULT_MESSAGE_TEMPLATE,
    )

    let id = context.env['DISCORD_WEBHOOK_ID']
    let token = context.env['DISCORD_WEBHOOK_TOKEN']
    if (!id || !token) {
      throw new ConfigError(
        'DISCORD_WEBHOOK_ID and DISCORD_WEBHOOK_TOKEN must be set',
      )
    }

    let color = Number.parseInt(String(discord.color ?? DEFAULT_COLOR), 10)
    if (Number.isNaN(color)) {
      throw new ConfigError(`invalid color "${discord.color}"`)
    }

    log.info('posting', { message })

    let response = await fetch(
      `${DISCORD_API_URL}/${encodeURIComponent(id)}/${encodeURIComponent(token)}`,
      {
        body: JSON.stringify({
          embeds: [
            {
              author: {
                icon_url: discord.iconUrl ?? DEFAULT_ICON,
                name: discord.author ?? DEFAULT_AUTHOR,
              },
              description: message,
              color,
            },
          ],
        }),
        headers: { 'Content-Type': 'application/json' },
        signal: context.signal,
        method: 'POST',
      },
    )

    if (!response.ok) {
      throw new Error(
        `webhook responded ${response.status} ${response.statusText}`,
      )
    }
  },
  setDefaults: context => {
    let announce = context.config.announce ?? {}
    announce.discord = {
      messageTemplate: DEFAULT_MESSAGE_TEMPLATE,
      color: DEFAULT_COLOR,
      author: DEFAULT_AUTHOR,
      iconUrl: DEFAULT_ICON,
      ...announce.discord,
    }
    context.config.announce = announce
  },
  skip: context => context.config.announce?.discord?.enabled !== true,
  name: 'discord',
  skippable: true,
}
