#!/usr/bin/env tsx
import type { CliOptions } from '../src/cli/types'
import fs from 'node:fs'
import process from 'node:process'
import { CAC } from 'cac'
import { resolveCommand } from '../src/commands'
import { errorMessage } from '../src/errors'
import { logError, setupSignalHandlers } from '../src/logging'

function readVersion(): string {
  const packageJson: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string')
    return packageJson.version
  return '0.0.0'
}

async function execute(name: string, options: CliOptions): Promise<void> {
  try {
    const cmd = await resolveCommand(name)
    if (!cmd) {
      logError(`Unknown command: ${name}`)
      process.exitCode = 1
      return
    }
    const code = await cmd.run({ options, env: process.env })
    if (code !== 0)
      process.exitCode = code
  }
  catch (error) {
    logError(`${name} failed: ${errorMessage(error)}`)
    process.exitCode = 1
  }
}

setupSignalHandlers()

const cli = new CAC('provisioner')

cli.version(readVersion())
cli.help()

// No arguments: provision everything
cli
  .command('', 'Provision the development environment')
  .option('--verbose', 'Show every command that is executed')
  .option('--dry-run', 'Only check which steps would run')
  .option('--no-wordpress', 'Skip the WordPress install')
  .option('--no-phpmyadmin', 'Skip the phpMyAdmin install')
  .example('provisioner')
  .example('provisioner --dry-run')
  .action((options: CliOptions) => {
    // the default command also catches unknown command names
    if (cli.args.length > 0) {
      logError(`Unknown command: ${cli.args.join(' ')}`)
      process.exitCode = 1
      return
    }
    return execute('run', options)
  })

cli
  .command('run', 'Provision the development environment')
  .option('--verbose', 'Show every command that is executed')
  .option('--dry-run', 'Only check which steps would run')
  .option('--no-wordpress', 'Skip the WordPress install')
  .option('--no-phpmyadmin', 'Skip the phpMyAdmin install')
  .example('provisioner run --no-phpmyadmin')
  .action((options: CliOptions) => execute('run', options))

cli
  .command('status', 'Show which provisioning steps are already satisfied')
  .option('--json', 'Output as JSON')
  .option('--no-wordpress', 'Leave WordPress steps out')
  .option('--no-phpmyadmin', 'Leave the phpMyAdmin step out')
  .example('provisioner status')
  .example('provisioner status --json')
  .action((options: CliOptions) => execute('status', options))

cli
  .command('config', 'Show the resolved configuration')
  .action((options: CliOptions) => execute('config', options))

cli.parse(process.argv, { run: false })
await cli.runMatchedCommand()
