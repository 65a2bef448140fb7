import type { DatabaseConfig, NetworkConfig, PhpConfig, PhpMyAdminConfig, ProvisionConfig, ServiceNames, WordPressConfig } from './types'
import { tmpdir } from 'node:os'
import process from 'node:process'
import { loadConfig } from 'bunfig'

export interface ProvisionOverrides {
  verbose?: boolean
  useSudo?: boolean
  services?: Partial<ServiceNames>
  database?: Partial<DatabaseConfig>
  webRoot?: string
  webUser?: string
  webGroup?: string
  workDir?: string
  siteUrl?: string
  wordpress?: Partial<WordPressConfig>
  phpMyAdmin?: Partial<PhpMyAdminConfig>
  php?: Partial<PhpConfig>
  network?: Partial<NetworkConfig>
}

const DEFAULT_PHP_SETTINGS: Record<string, string> = {
  upload_max_filesize: '64M',
  post_max_size: '64M',
  memory_limit: '256M',
  max_execution_time: '300',
}

function isCI(env: NodeJS.ProcessEnv): boolean {
  return env.CI === 'true' || env.GITHUB_ACTIONS === 'true'
}

function isRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0
}

/**
 * Parse `key=value,key=value` into a settings map
 */
export function parseSettings(raw: string | undefined): Record<string, string> | undefined {
  if (!raw)
    return undefined

  const settings: Record<string, string> = {}
  for (const pair of raw.split(',')) {
    const [key, ...valueParts] = pair.split('=')
    if (key && key.trim() && valueParts.length > 0) {
      settings[key.trim()] = valueParts.join('=').trim()
    }
  }
  return settings
}

export function createDefaultConfig(env: NodeJS.ProcessEnv = process.env): ProvisionConfig {
  return {
    verbose: env.PROVISION_VERBOSE === 'true' || isCI(env),
    useSudo: env.PROVISION_USE_SUDO ? env.PROVISION_USE_SUDO !== 'false' : !isRoot(),
    services: {
      database: env.PROVISION_DB_SERVICE || 'mariadb',
      webServer: env.PROVISION_WEB_SERVICE || 'httpd',
      php: env.PROVISION_PHP_SERVICE || 'php-fpm',
    },
    database: {
      name: env.PROVISION_DB_NAME || 'wordpress',
      user: env.PROVISION_DB_USER || 'wordpressuser',
      password: env.PROVISION_DB_PASSWORD ?? 'password',
      host: env.PROVISION_DB_HOST || 'localhost',
    },
    webRoot: env.PROVISION_WEB_ROOT || '/var/www/html',
    webUser: env.PROVISION_WEB_USER || 'apache',
    webGroup: env.PROVISION_WEB_GROUP || 'apache',
    workDir: env.PROVISION_WORK_DIR || tmpdir(),
    siteUrl: env.PROVISION_SITE_URL || 'http://localhost',
    wordpress: {
      enabled: env.PROVISION_WORDPRESS_ENABLED !== 'false',
      configure: env.PROVISION_WORDPRESS_CONFIGURE !== 'false',
      url: env.PROVISION_WORDPRESS_URL || 'https://wordpress.org/latest.tar.gz',
      tablePrefix: env.PROVISION_WORDPRESS_TABLE_PREFIX || 'wp_',
    },
    phpMyAdmin: {
      enabled: env.PROVISION_PHPMYADMIN_ENABLED !== 'false',
      url: env.PROVISION_PHPMYADMIN_URL || 'https://www.phpmyadmin.net/downloads/phpMyAdmin-latest-all-languages.tar.gz',
      directory: env.PROVISION_PHPMYADMIN_DIRECTORY || 'phpMyAdmin',
    },
    php: {
      enabled: env.PROVISION_PHP_TUNING === 'true',
      iniPath: env.PROVISION_PHP_INI || '/etc/php.ini',
      settings: parseSettings(env.PROVISION_PHP_SETTINGS) ?? { ...DEFAULT_PHP_SETTINGS },
    },
    network: {
      timeout: Number.parseInt(env.PROVISION_NETWORK_TIMEOUT || '120000', 10),
      userAgent: env.PROVISION_USER_AGENT || `provisioner/${env.npm_package_version || '0.4.0'}`,
    },
  }
}

function assignDefined<T extends object>(base: T, overrides?: Partial<T>): T {
  const result = { ...base }
  if (overrides) {
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined)
        Reflect.set(result, key, value)
    }
  }
  return result
}

/**
 * Merge overrides into a config section by section, ignoring undefined
 * leaves. A `php.settings` override replaces the whole map.
 */
export function mergeConfig(base: ProvisionConfig, overrides: ProvisionOverrides = {}): ProvisionConfig {
  const { services, database, wordpress, phpMyAdmin, php, network, ...top } = overrides

  return {
    ...assignDefined(base, top),
    services: assignDefined(base.services, services),
    database: assignDefined(base.database, database),
    wordpress: assignDefined(base.wordpress, wordpress),
    phpMyAdmin: assignDefined(base.phpMyAdmin, phpMyAdmin),
    php: assignDefined({ ...base.php, settings: { ...base.php.settings } }, php),
    network: assignDefined(base.network, network),
  }
}

export interface LoadOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

/**
 * Resolve the configuration: env-derived defaults, then `provisioner.config.*`
 * from the working directory, then the given overrides (CLI flags).
 */
export async function loadProvisionConfig(overrides: ProvisionOverrides = {}, options: LoadOptions = {}): Promise<ProvisionConfig> {
  const { cwd = process.cwd(), env = process.env } = options
  const fileConfig = await loadConfig<ProvisionConfig>({
    name: 'provisioner',
    cwd,
    defaultConfig: createDefaultConfig(env),
  })

  return mergeConfig(fileConfig, overrides)
}
