import type { Context } from '../../types/context'

import { TemplateError } from '../errors/template-error'

/** Matches a single `{{ ... }}` action. */
const ACTION_PATTERN = /\{\{(?<body>.*?)\}\}/gu

/** Matches `.Field` and `.Env.NAME` references. */
const FIELD_PATTERN = /^\.(?<field>[A-Za-z]\w*)(?:\.(?<key>\w+))?$/u

/**
 * Collect the values available to templates for a context.
 *
 * @param context - Run context.
 * @returns Field values by name.
 */
export function templateFields(context: Context): Record<string, string> {
  let tag = context.git.currentTag
  return {
    ShortCommit: context.git.commit.slice(0, 7),
    PreviousTag: context.git.previousTag ?? '',
    IsPrerelease: String(context.isPrerelease),
    ProjectName: context.config.projectName ?? '',
    Date: context.date.toISOString(),
    ReleaseURL: context.releaseUrl,
    Version: tag.replace(/^v/u, ''),
    Commit: context.git.commit,
    Tag: tag,
  }
}

/**
 * Render a template using `{{ .Field }}` and `{{ .Env.NAME }}` actions.
 *
 * @param context - Run context.
 * @param template - Template source.
 * @param extra - Additional fields, taking precedence over built-in ones.
 * @returns Rendered string.
 */
export function renderTemplate(
  context: Context,
  template: string,
  extra: Record<string, string> = {},
): string {
  if (template.replaceAll(ACTION_PATTERN, '').includes('{{')) {
    throw new TemplateError(template, 'unterminated action')
  }

  let fields = { ...templateFields(context), ...extra }

  return template.replaceAll(ACTION_PATTERN, (_match, body: string) => {
    let expression = body.trim()
    let groups = expression.match(FIELD_PATTERN)?.groups
    let field = groups?.['field']
    if (!field) {
      throw new TemplateError(template, `unsupported action "${expression}"`)
    }

    let key = groups?.['key']
    if (field === 'Env' && key) {
      let value = context.env[key]
      if (value === undefined) {
        throw new TemplateError(template, `environment variable ${key} is not set`)
      }
      return value
    }

    let value = key ? undefined : fields[field]
    if (value === undefined) {
      throw new TemplateError(template, `unknown field "${expression}"`)
    }
    return value
  })
}
