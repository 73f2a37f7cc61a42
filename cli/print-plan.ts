import pc from 'picocolors'

import type { PlannedPipe } from '../core/pipeline/plan-pipeline'

/**
 * Print which pipes a run would execute.
 *
 * @param plan - Planned pipes in execution order.
 */
export function printPlan(plan: PlannedPipe[]): void {
  console.info(pc.yellow('\n📋 Dry Run - Nothing will be published\n'))
  for (let pipe of plan) {
    if (pipe.skipped) {
      console.info(pc.gray(`   • ${pipe.name} (${pipe.skipped})`))
    } else {
      console.info(`   ${pc.green('•')} ${pipe.name}`)
    }
  }

  let count = plan.filter(pipe => !pipe.skipped).length
  let pluralRules = new Intl.PluralRules('en-US', { type: 'cardinal' })
  let noun = pluralRules.select(count) === 'one' ? 'pipe' : 'pipes'
  console.info(pc.gray(`\n${count} ${noun} would run\n`))
}
