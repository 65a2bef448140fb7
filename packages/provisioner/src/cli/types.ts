import type { CommandRunner, ProvisionConfig } from '../types'

export interface CliOptions {
  verbose?: boolean
  dryRun?: boolean
  json?: boolean
  /** `--no-wordpress` sets this to false */
  wordpress?: boolean
  /** `--no-phpmyadmin` sets this to false */
  phpmyadmin?: boolean
}

export interface CommandContext {
  options: CliOptions
  env: NodeJS.ProcessEnv
  /** Preloaded configuration; loaded from disk and env when absent */
  config?: ProvisionConfig
  runner?: CommandRunner
}

export interface Command {
  name: string
  description?: string
  run: (ctx: CommandContext) => Promise<number> | number
}
