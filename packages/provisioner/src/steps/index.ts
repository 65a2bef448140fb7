import type { ProvisionConfig, ProvisionStep } from '../types'
import { ensureDatabaseStep } from './database'
import { tunePhpStep } from './php'
import { installPhpMyAdminStep } from './phpmyadmin'
import { restartWebServerStep, startServicesStep } from './services'
import { configureWordPressStep, installWordPressStep } from './wordpress'

export { ensureDatabaseStep } from './database'
export { tunePhpStep } from './php'
export { installPhpMyAdminStep, phpMyAdminPath, phpMyAdminStagingPath } from './phpmyadmin'
export { restartWebServerStep, startServicesStep } from './services'
export { configureWordPressStep, installWordPressStep, wordpressSentinel, wpConfigPath } from './wordpress'

/**
 * The ordered step list for a config; disabled features are left out
 */
export function buildSteps(config: ProvisionConfig): ProvisionStep[] {
  const steps: ProvisionStep[] = [startServicesStep, ensureDatabaseStep]

  if (config.wordpress.enabled) {
    steps.push(installWordPressStep)
    if (config.wordpress.configure)
      steps.push(configureWordPressStep)
  }

  if (config.phpMyAdmin.enabled)
    steps.push(installPhpMyAdminStep)

  if (config.php.enabled)
    steps.push(tunePhpStep)

  steps.push(restartWebServerStep)
  return steps
}
