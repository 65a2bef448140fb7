import type { CommandRunner, DatabaseConfig } from '../types'
import { runChecked } from '../exec'

/**
 * Quote a MySQL identifier with backticks
 */
export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``
}

/**
 * Quote a MySQL string literal
 */
export function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, '\\\'')}'`
}

function accountOf(database: DatabaseConfig): string {
  return `${quoteString(database.user)}@${quoteString(database.host)}`
}

/**
 * SQL that creates the database, its user and the grants. Every statement
 * can be re-run, so a run interrupted halfway is finished by the next one.
 */
export function buildCreateDatabaseSql(database: DatabaseConfig): string {
  const account = accountOf(database)

  return [
    `CREATE DATABASE IF NOT EXISTS ${quoteIdentifier(database.name)};`,
    `CREATE USER IF NOT EXISTS ${account} IDENTIFIED BY ${quoteString(database.password)};`,
    `GRANT ALL PRIVILEGES ON ${quoteIdentifier(database.name)}.* TO ${account};`,
    'FLUSH PRIVILEGES;',
    '',
  ].join('\n')
}

function batchArgs(statement: string): string[] {
  return ['--batch', '--skip-column-names', '-e', statement]
}

/**
 * Names listed by `SHOW DATABASES`
 */
export async function listDatabases(runner: CommandRunner): Promise<string[]> {
  const output = await runChecked(runner, 'mysql', batchArgs('SHOW DATABASES;'), { sudo: true })
  return output.split('\n').map(line => line.trim()).filter(Boolean)
}

export async function databaseExists(runner: CommandRunner, name: string): Promise<boolean> {
  return (await listDatabases(runner)).includes(name)
}

/**
 * Whether the configured account holds ALL PRIVILEGES on the database.
 * MariaDB rejects `SHOW GRANTS` for an unknown account, which counts as no.
 */
export async function hasDatabaseGrant(runner: CommandRunner, database: DatabaseConfig): Promise<boolean> {
  const result = await runner.run('mysql', batchArgs(`SHOW GRANTS FOR ${accountOf(database)};`), { sudo: true })
  if (result.code !== 0)
    return false

  const target = `ON ${quoteIdentifier(database.name)}.*`
  return result.stdout
    .split('\n')
    .some(line => line.includes('GRANT ALL PRIVILEGES') && line.includes(target))
}

export async function createDatabase(runner: CommandRunner, database: DatabaseConfig): Promise<void> {
  await runChecked(runner, 'mysql', [], { sudo: true, input: buildCreateDatabaseSql(database) })
}
