export class ProvisionError extends Error {
  readonly code: string

  constructor(message: string, code = 'PROVISION_ERROR') {
    super(message)
    this.name = 'ProvisionError'
    this.code = code
  }
}

export class CommandError extends ProvisionError {
  readonly command: string
  readonly args: string[]
  readonly exitCode: number
  readonly stderr: string

  constructor(command: string, args: string[], exitCode: number, stderr: string) {
    const output = stderr.trim()
    super(
      `Command failed with exit code ${exitCode}: ${[command, ...args].join(' ')}${output ? `\n${output}` : ''}`,
      'COMMAND_FAILED',
    )
    this.name = 'CommandError'
    this.command = command
    this.args = args
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

export class DownloadError extends ProvisionError {
  readonly url: string
  readonly status?: number

  constructor(url: string, message: string, status?: number) {
    super(`Failed to download ${url}: ${message}`, 'DOWNLOAD_FAILED')
    this.name = 'DownloadError'
    this.url = url
    this.status = status
  }
}

export class StepError extends ProvisionError {
  readonly step: string

  constructor(step: string, cause: unknown) {
    super(`Step ${step} failed: ${errorMessage(cause)}`, 'STEP_FAILED')
    this.name = 'StepError'
    this.step = step
    this.cause = cause
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
