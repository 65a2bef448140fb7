import type { ProvisionConfig } from './types'
import path from 'node:path'

export interface ValidationResult {
  valid: boolean
  errors: string[]
  warnings: string[]
}

const MYSQL_NAME = /^\w{1,64}$/
const INI_KEY = /^[\w.]+$/

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value)
    return url.protocol === 'http:' || url.protocol === 'https:'
  }
  catch {
    return false
  }
}

/**
 * Validates a ProvisionConfig object
 */
export function validateConfig(config: ProvisionConfig): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []

  // Database
  if (!MYSQL_NAME.test(config.database.name)) {
    errors.push('database.name must be 1-64 letters, digits or underscores')
  }
  if (!MYSQL_NAME.test(config.database.user)) {
    errors.push('database.user must be 1-64 letters, digits or underscores')
  }
  if (!config.database.host) {
    errors.push('database.host must not be empty')
  }
  if (!config.database.password) {
    warnings.push('database.password is empty; the database user will have no password')
  }

  // Services
  for (const [key, name] of Object.entries(config.services)) {
    if (!name || /\s/.test(name)) {
      errors.push(`services.${key} must be a service name without spaces`)
    }
  }

  // Paths
  if (!path.isAbsolute(config.webRoot)) {
    errors.push('webRoot must be an absolute path')
  }
  if (!path.isAbsolute(config.workDir)) {
    errors.push('workDir must be an absolute path')
  }
  if (!config.webUser || !config.webGroup) {
    errors.push('webUser and webGroup must not be empty')
  }

  // Downloads
  if (config.wordpress.enabled && !isHttpUrl(config.wordpress.url)) {
    errors.push('wordpress.url must be an http(s) URL')
  }
  if (config.wordpress.configure && !config.wordpress.enabled) {
    warnings.push('wordpress.configure has no effect while wordpress.enabled is false')
  }
  if (config.wordpress.enabled && !/^\w+$/.test(config.wordpress.tablePrefix)) {
    errors.push('wordpress.tablePrefix must contain only letters, digits or underscores')
  }
  if (config.phpMyAdmin.enabled) {
    if (!isHttpUrl(config.phpMyAdmin.url)) {
      errors.push('phpMyAdmin.url must be an http(s) URL')
    }
    const dir = config.phpMyAdmin.directory
    if (!dir || dir === '.' || dir === '..' || dir.includes('/') || dir.includes('\\')) {
      errors.push('phpMyAdmin.directory must be a single directory name')
    }
  }

  if (!isHttpUrl(config.siteUrl)) {
    warnings.push('siteUrl is not an http(s) URL')
  }

  // PHP
  if (config.php.enabled) {
    if (!path.isAbsolute(config.php.iniPath)) {
      errors.push('php.iniPath must be an absolute path')
    }
    const keys = Object.keys(config.php.settings)
    if (keys.length === 0) {
      warnings.push('php.enabled is true but php.settings is empty')
    }
    for (const key of keys) {
      if (!INI_KEY.test(key)) {
        errors.push(`php.settings contains invalid key: ${key}`)
      }
    }
  }

  // Network
  if (!Number.isInteger(config.network.timeout) || config.network.timeout < 1000 || config.network.timeout > 600000) {
    errors.push('network.timeout must be an integer between 1000ms and 600000ms (10 minutes)')
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}
