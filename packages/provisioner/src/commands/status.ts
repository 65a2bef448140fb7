/* eslint-disable no-console */
import type { Command } from '../cli/types'
import type { StepOutcome } from '../types'
import { checkSteps } from '../provisioner'
import { buildSteps } from '../steps'
import { prepareContext } from './shared'

const outcomeLabel: Record<StepOutcome, string> = {
  applied: '✅ applied',
  skipped: '✅ satisfied',
  pending: '⏳ pending',
  failed: '❌ failed',
}

const cmd: Command = {
  name: 'status',
  description: 'Show which provisioning steps are already satisfied',
  async run(ctx): Promise<number> {
    const prepared = await prepareContext(ctx)
    if (!prepared)
      return 1

    const report = await checkSteps(buildSteps(prepared.config), prepared)

    if (ctx.options.json) {
      console.log(JSON.stringify(report, null, 2))
      return report.ok ? 0 : 1
    }

    console.log(`${'Step'.padEnd(22)}${'Status'.padEnd(16)}Description`)
    console.log('─'.repeat(70))
    for (const result of report.results) {
      console.log(`${result.name.padEnd(22)}${outcomeLabel[result.outcome].padEnd(16)}${result.description}`)
      if (result.error)
        console.log(`${''.padEnd(22)}${result.error}`)
    }

    return report.ok ? 0 : 1
  },
}

export default cmd
