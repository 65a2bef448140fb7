/* eslint-disable no-console */
import process from 'node:process'
import { Spinner } from './progress'

export interface LoggingOptions {
  verbose?: boolean
}

let verbose = false
let activeSpinner: Spinner | null = null

export function configureLogging(options: LoggingOptions): void {
  if (options.verbose !== undefined)
    verbose = options.verbose
}

// The spinner line has to be cleared before anything else is printed
export function cleanupSpinner(): void {
  if (activeSpinner) {
    activeSpinner.stop()
    activeSpinner = null
  }
}

/**
 * Start the shared spinner. Ignored when stdout is not a terminal or in
 * verbose mode, where command output would interleave with it.
 */
export function startSpinner(message: string): void {
  cleanupSpinner()
  if (verbose || !process.stdout.isTTY)
    return

  activeSpinner = new Spinner()
  activeSpinner.start(message)
}

/**
 * Take the spinner off the terminal while something else draws there.
 * Returns a function that starts it again with the same message.
 */
export function suspendSpinner(): () => void {
  if (!activeSpinner)
    return () => {}

  const message = activeSpinner.text
  cleanupSpinner()
  return () => startSpinner(message)
}

export function setupSignalHandlers(): void {
  process.on('SIGINT', () => {
    cleanupSpinner()
    process.exit(130)
  })

  process.on('SIGTERM', () => {
    cleanupSpinner()
    process.exit(143)
  })

  process.on('exit', () => {
    cleanupSpinner()
  })
}

export function logInfo(message: string): void {
  cleanupSpinner()
  console.log(message)
}

export function logSuccess(message: string): void {
  cleanupSpinner()
  console.log(`✅ ${message}`)
}

export function logSkip(message: string): void {
  cleanupSpinner()
  console.log(`⏭️  ${message}`)
}

export function logWarn(message: string): void {
  cleanupSpinner()
  console.warn(`⚠️  ${message}`)
}

export function logError(message: string): void {
  cleanupSpinner()
  console.error(`❌ ${message}`)
}

export function logDebug(message: string): void {
  if (!verbose)
    return
  cleanupSpinner()
  console.warn(message)
}
