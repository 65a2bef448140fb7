import type { DatabaseConfig } from '../types'
import { randomInt } from 'node:crypto'

export const SALT_PLACEHOLDER = 'put your unique phrase here'

const SALT_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!@#$%^&*()-_[]{}<>~+=,.;:/?|'

export function generateSalt(length = 64): string {
  let salt = ''
  for (let i = 0; i < length; i++) {
    salt += SALT_ALPHABET[randomInt(SALT_ALPHABET.length)]
  }
  return salt
}

/**
 * Single-quoted PHP string literal
 */
export function phpString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, '\\\'')}'`
}

export interface WpConfigOptions {
  database: DatabaseConfig
  tablePrefix: string
  salt?: () => string
}

/**
 * Fill in wp-config-sample.php: credentials, table prefix and salts
 */
export function renderWpConfig(sample: string, options: WpConfigOptions): string {
  const { database, tablePrefix, salt = generateSalt } = options

  return sample
    .replace(/'database_name_here'/g, () => phpString(database.name))
    .replace(/'username_here'/g, () => phpString(database.user))
    .replace(/'password_here'/g, () => phpString(database.password))
    .replace(/(define\(\s*'DB_HOST',\s*)'[^']*'/, (_, head: string) => `${head}${phpString(database.host)}`)
    .replace(/\$table_prefix\s*=\s*'[^']*';/, () => `$table_prefix = ${phpString(tablePrefix)};`)
    .replace(new RegExp(`'${SALT_PLACEHOLDER}'`, 'g'), () => phpString(salt()))
}
