/* eslint-disable no-console */
/**
 * Terminal progress helpers
 */
import process from 'node:process'

/**
 * Format bytes to human readable format
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0)
    return '0 B'

  const k = 1024
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB']
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)))

  return `${(bytes / k ** i).toFixed(1)} ${sizes[i]}`
}

/**
 * Format a duration in milliseconds
 */
export function formatDuration(ms: number): string {
  if (ms < 1000)
    return `${Math.round(ms)}ms`

  const seconds = ms / 1000
  if (seconds < 60)
    return `${seconds.toFixed(1)}s`

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/**
 * Simple spinner for indeterminate progress. Purely decorative: it only
 * writes to the terminal.
 */
export class Spinner {
  private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']
  private interval: NodeJS.Timeout | null = null
  private currentFrame = 0
  private message = ''

  get isSpinning(): boolean {
    return this.interval !== null
  }

  get text(): string {
    return this.message
  }

  start(message = 'Working...'): void {
    this.stop()
    this.message = message
    this.interval = setInterval(() => {
      process.stdout.write(`\r${this.frames[this.currentFrame]} ${this.message}`)
      this.currentFrame = (this.currentFrame + 1) % this.frames.length
    }, 100)
  }

  stop(finalMessage?: string): void {
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null

      // Clear the line
      process.stdout.write(`\r${' '.repeat(this.message.length + 2)}\r`)
    }

    if (finalMessage) {
      console.log(finalMessage)
    }
  }

  update(message: string): void {
    this.message = message
  }
}
