import type { ProvisionConfig, ProvisionStep } from '../types'
import fs from 'node:fs'
import { ProvisionError } from '../errors'
import { writeFilePrivileged } from '../filesystem'
import { logDebug } from '../logging'
import { applyIniSettings, findOutdatedSettings } from '../php/ini'
import { restartService } from '../services/manager'
import { isFile } from '../utils'

async function readIni(config: ProvisionConfig): Promise<string> {
  if (!await isFile(config.php.iniPath)) {
    throw new ProvisionError(`PHP configuration ${config.php.iniPath} not found`, 'MISSING_FILE')
  }
  return fs.promises.readFile(config.php.iniPath, 'utf-8')
}

export const tunePhpStep: ProvisionStep = {
  name: 'tune-php',
  description: 'Apply php.ini overrides',
  async check({ config }) {
    const content = await readIni(config)
    return findOutdatedSettings(content, config.php.settings).length === 0
  },
  async apply({ config, runner }) {
    const content = await readIni(config)
    const outdated = findOutdatedSettings(content, config.php.settings)
    logDebug(`Updating ${outdated.join(', ')} in ${config.php.iniPath}`)

    await writeFilePrivileged(runner, config.php.iniPath, applyIniSettings(content, config.php.settings))
    // php-fpm only reads php.ini at startup
    await restartService(runner, config.services.php)
  },
}
