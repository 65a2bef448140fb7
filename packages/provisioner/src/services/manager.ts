import type { CommandRunner, ProvisionConfig, ServiceStatus } from '../types'
import { errorMessage } from '../errors'
import { runChecked } from '../exec'
import { logDebug } from '../logging'

/**
 * Services in the order they are started: database, web server, PHP runtime
 */
export function getServiceOrder(config: ProvisionConfig): string[] {
  const { database, webServer, php } = config.services
  return [database, webServer, php]
}

/**
 * Query systemd for a service's state
 */
export async function getServiceStatus(runner: CommandRunner, serviceName: string): Promise<ServiceStatus> {
  try {
    const result = await runner.run('systemctl', ['is-active', '--quiet', serviceName])
    return result.code === 0 ? 'running' : 'stopped'
  }
  catch (error) {
    logDebug(`Could not query ${serviceName}: ${errorMessage(error)}`)
    return 'unknown'
  }
}

export async function isServiceRunning(runner: CommandRunner, serviceName: string): Promise<boolean> {
  return (await getServiceStatus(runner, serviceName)) === 'running'
}

export async function startService(runner: CommandRunner, serviceName: string): Promise<void> {
  await runChecked(runner, 'systemctl', ['start', serviceName], { sudo: true })
}

export async function restartService(runner: CommandRunner, serviceName: string): Promise<void> {
  await runChecked(runner, 'systemctl', ['restart', serviceName], { sudo: true })
}

/**
 * Names of the configured services that are not running, in start order
 */
export async function getStoppedServices(runner: CommandRunner, config: ProvisionConfig): Promise<string[]> {
  const stopped: string[] = []
  for (const serviceName of getServiceOrder(config)) {
    if (!await isServiceRunning(runner, serviceName))
      stopped.push(serviceName)
  }
  return stopped
}
