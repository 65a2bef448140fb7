/* eslint-disable no-console */
import type { Command } from '../cli/types'
import type { ProvisionConfig } from '../types'
import { logInfo } from '../logging'
import { formatDuration } from '../progress'
import { runProvisioner } from '../provisioner'
import { buildSteps } from '../steps'
import { prepareContext } from './shared'

function joinUrl(base: string, segment: string): string {
  return `${base.replace(/\/+$/, '')}/${segment}`
}

export function formatSummary(config: ProvisionConfig): string[] {
  const lines = ['', '============================================', ' Setup complete!']
  if (config.wordpress.enabled)
    lines.push(` WordPress  : ${joinUrl(config.siteUrl, '')}`)
  if (config.phpMyAdmin.enabled)
    lines.push(` phpMyAdmin : ${joinUrl(config.siteUrl, config.phpMyAdmin.directory)}`)
  lines.push('============================================')
  return lines
}

const command: Command = {
  name: 'run',
  description: 'Provision the development environment',
  async run(ctx) {
    const prepared = await prepareContext(ctx)
    if (!prepared)
      return 1

    const dryRun = Boolean(ctx.options.dryRun)
    const steps = buildSteps(prepared.config)

    logInfo(dryRun ? '🔍 Checking development environment...' : '🚀 Provisioning development environment...')
    const report = await runProvisioner(steps, prepared, { dryRun })

    if (!report.ok)
      return 1

    if (dryRun) {
      const pending = report.results.filter(result => result.outcome === 'pending').length
      logInfo(`${pending} of ${report.results.length} steps would run`)
      return 0
    }

    for (const line of formatSummary(prepared.config)) {
      console.log(line)
    }
    logInfo(`\x1B[2mFinished in ${formatDuration(report.durationMs)}\x1B[0m`)
    return 0
  },
}

export default command
