import type { ProvisionStep } from '../types'
import { logDebug } from '../logging'
import { getStoppedServices, restartService, startService } from '../services/manager'

export const startServicesStep: ProvisionStep = {
  name: 'start-services',
  description: 'Start database, web server and PHP services',
  async check({ config, runner }) {
    return (await getStoppedServices(runner, config)).length === 0
  },
  async apply({ config, runner }) {
    for (const serviceName of await getStoppedServices(runner, config)) {
      logDebug(`🚀 Starting ${serviceName}...`)
      await startService(runner, serviceName)
    }
  },
}

// Always restarts so new files and PHP settings are picked up
export const restartWebServerStep: ProvisionStep = {
  name: 'restart-web-server',
  description: 'Restart the web server',
  async check() {
    return false
  },
  async apply({ config, runner }) {
    await restartService(runner, config.services.webServer)
  },
}
