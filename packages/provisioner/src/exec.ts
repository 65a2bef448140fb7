import type { CommandOptions, CommandResult, CommandRunner, ProvisionConfig } from './types'
import { spawn } from 'node:child_process'
import process from 'node:process'
import { CommandError } from './errors'
import { logDebug } from './logging'

export interface RunnerOptions {
  useSudo: boolean
}

/**
 * Build the argv actually spawned, prefixing sudo for privileged commands
 */
export function buildInvocation(command: string, args: string[], options: CommandOptions, runner: RunnerOptions): [string, string[]] {
  if (options.sudo && runner.useSudo) {
    return ['sudo', [command, ...args]]
  }
  return [command, args]
}

/**
 * CommandRunner backed by child_process.spawn
 */
export function createCommandRunner(config: Pick<ProvisionConfig, 'useSudo'>): CommandRunner {
  return {
    run(command, args, options = {}) {
      const [cmd, argv] = buildInvocation(command, args, options, { useSudo: config.useSudo })
      logDebug(`$ ${[cmd, ...argv].join(' ')}`)

      return new Promise<CommandResult>((resolve, reject) => {
        const proc = spawn(cmd, argv, {
          cwd: options.cwd,
          stdio: ['pipe', 'pipe', 'pipe'],
          env: process.env,
        })

        let stdout = ''
        let stderr = ''

        proc.stdout.on('data', (data: Buffer) => {
          stdout += data.toString()
        })

        proc.stderr.on('data', (data: Buffer) => {
          stderr += data.toString()
        })

        proc.on('close', (code) => {
          resolve({ code: code ?? 1, stdout, stderr })
        })

        proc.on('error', reject)

        // A child that exits without reading its input closes the pipe;
        // the exit code is reported through 'close'
        proc.stdin.on('error', (error: NodeJS.ErrnoException) => {
          if (error.code !== 'EPIPE')
            reject(error)
        })

        if (options.input !== undefined) {
          proc.stdin.write(options.input)
        }
        proc.stdin.end()
      })
    },
  }
}

/**
 * Run a command and throw a CommandError on a non-zero exit
 */
export async function runChecked(runner: CommandRunner, command: string, args: string[], options: CommandOptions = {}): Promise<string> {
  const result = await runner.run(command, args, options)
  if (result.code !== 0) {
    throw new CommandError(command, args, result.code, result.stderr || result.stdout)
  }
  return result.stdout
}
