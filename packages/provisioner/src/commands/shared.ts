import type { CommandContext } from '../cli/types'
import type { ProvisionOverrides } from '../config'
import type { ProvisionConfig, ProvisionContext } from '../types'
import { loadProvisionConfig } from '../config'
import { validateConfig } from '../config-validation'
import { createCommandRunner } from '../exec'
import { configureLogging, logError, logWarn } from '../logging'

export function overridesFromOptions(ctx: CommandContext): ProvisionOverrides {
  const { options } = ctx
  const overrides: ProvisionOverrides = {}
  if (options.verbose)
    overrides.verbose = true
  if (options.wordpress === false)
    overrides.wordpress = { enabled: false }
  if (options.phpmyadmin === false)
    overrides.phpMyAdmin = { enabled: false }
  return overrides
}

export async function resolveConfig(ctx: CommandContext): Promise<ProvisionConfig> {
  if (ctx.config)
    return ctx.config
  return loadProvisionConfig(overridesFromOptions(ctx), { env: ctx.env })
}

/**
 * Load, validate and wire up everything a provisioning command needs.
 * Returns null after reporting when the configuration is invalid.
 */
export async function prepareContext(ctx: CommandContext): Promise<ProvisionContext | null> {
  const config = await resolveConfig(ctx)
  configureLogging({ verbose: config.verbose })

  const validation = validateConfig(config)
  for (const warning of validation.warnings) {
    logWarn(warning)
  }
  if (!validation.valid) {
    logError('Invalid configuration:')
    for (const error of validation.errors) {
      logError(`  • ${error}`)
    }
    return null
  }

  return {
    config,
    runner: ctx.runner ?? createCommandRunner(config),
  }
}
