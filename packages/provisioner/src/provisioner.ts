import type { ProvisionContext, ProvisionReport, ProvisionStep, RunOptions, StepResult } from './types'
import { errorMessage, StepError } from './errors'
import { cleanupSpinner, logError, logInfo, logSkip, logSuccess, startSpinner } from './logging'
import { formatDuration } from './progress'

/**
 * Run steps in order. A step whose check passes is skipped; the first step
 * that throws ends the run and nothing after it is checked or applied.
 */
export async function runProvisioner(steps: ProvisionStep[], ctx: ProvisionContext, options: RunOptions = {}): Promise<ProvisionReport> {
  const { dryRun = false, spinner = true } = options
  const startedAt = Date.now()
  const results: StepResult[] = []

  for (const step of steps) {
    const stepStartedAt = Date.now()
    const record = (outcome: StepResult['outcome'], error?: string): StepResult => {
      const result: StepResult = {
        name: step.name,
        description: step.description,
        outcome,
        durationMs: Date.now() - stepStartedAt,
      }
      if (error !== undefined)
        result.error = error
      results.push(result)
      return result
    }

    try {
      if (await step.check(ctx)) {
        logSkip(`${step.description} already done, skipping`)
        record('skipped')
        continue
      }

      if (dryRun) {
        logInfo(`⏳ ${step.description} (pending)`)
        record('pending')
        continue
      }

      if (spinner)
        startSpinner(`${step.description}...`)
      else
        logInfo(`🔧 ${step.description}...`)

      await step.apply(ctx)
      cleanupSpinner()

      const result = record('applied')
      logSuccess(`${step.description} \x1B[2m(${formatDuration(result.durationMs)})\x1B[0m`)
    }
    catch (error) {
      cleanupSpinner()
      const failure = new StepError(step.name, error)
      record('failed', errorMessage(error))
      logError(failure.message)

      return {
        ok: false,
        results,
        failedStep: step.name,
        durationMs: Date.now() - startedAt,
      }
    }
  }

  return {
    ok: true,
    results,
    durationMs: Date.now() - startedAt,
  }
}

/**
 * Run the checks only, without logging. Later steps often depend on earlier
 * ones (wp-config needs WordPress), so a pending step does not stop the scan
 * but a failing check does.
 */
export async function checkSteps(steps: ProvisionStep[], ctx: ProvisionContext): Promise<ProvisionReport> {
  const startedAt = Date.now()
  const results: StepResult[] = []

  for (const step of steps) {
    const stepStartedAt = Date.now()
    try {
      const satisfied = await step.check(ctx)
      results.push({
        name: step.name,
        description: step.description,
        outcome: satisfied ? 'skipped' : 'pending',
        durationMs: Date.now() - stepStartedAt,
      })
    }
    catch (error) {
      results.push({
        name: step.name,
        description: step.description,
        outcome: 'failed',
        durationMs: Date.now() - stepStartedAt,
        error: errorMessage(error),
      })
      return { ok: false, results, failedStep: step.name, durationMs: Date.now() - startedAt }
    }
  }

  return { ok: true, results, durationMs: Date.now() - startedAt }
}
