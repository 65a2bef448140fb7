import { describe, expect, it } from 'vitest'
import { buildCreateDatabaseSql, createDatabase, databaseExists, hasDatabaseGrant, listDatabases, quoteIdentifier, quoteString } from '../src/services/database'
import { FakeSystem } from './helpers/fake-system'

const database = {
  name: 'wordpress',
  user: 'wordpressuser',
  password: 'test-secret',
  host: 'localhost',
}

function runningSystem(): FakeSystem {
  const system = new FakeSystem()
  system.services.set('mariadb', true)
  return system
}

describe('Database', () => {
  describe('quoting', () => {
    it('quotes identifiers with backticks', () => {
      expect(quoteIdentifier('wordpress')).toBe('`wordpress`')
      expect(quoteIdentifier('odd`name')).toBe('`odd``name`')
    })

    it('quotes string literals', () => {
      expect(quoteString('test-secret')).toBe('\'test-secret\'')
      expect(quoteString('it\'s')).toBe('\'it\\\'s\'')
      expect(quoteString('back\\slash')).toBe('\'back\\\\slash\'')
    })
  })

  it('builds the create statements', () => {
    expect(buildCreateDatabaseSql(database)).toBe([
      'CREATE DATABASE IF NOT EXISTS `wordpress`;',
      'CREATE USER IF NOT EXISTS \'wordpressuser\'@\'localhost\' IDENTIFIED BY \'test-secret\';',
      'GRANT ALL PRIVILEGES ON `wordpress`.* TO \'wordpressuser\'@\'localhost\';',
      'FLUSH PRIVILEGES;',
      '',
    ].join('\n'))
  })

  it('lists databases through the mysql client', async () => {
    const system = runningSystem()
    system.databases.add('shop')

    expect(await listDatabases(system)).toEqual(['information_schema', 'mysql', 'performance_schema', 'shop'])
    expect(system.calls[0]).toEqual({
      command: 'mysql',
      args: ['--batch', '--skip-column-names', '-e', 'SHOW DATABASES;'],
      options: { sudo: true },
    })
  })

  it('matches database names exactly', async () => {
    const system = runningSystem()
    system.databases.add('wordpress_old')

    expect(await databaseExists(system, 'wordpress')).toBe(false)
    system.databases.add('wordpress')
    expect(await databaseExists(system, 'wordpress')).toBe(true)
  })

  it('creates the database and user from stdin', async () => {
    const system = runningSystem()

    await createDatabase(system, database)

    expect(system.databases.has('wordpress')).toBe(true)
    expect(system.users.has('wordpressuser@localhost')).toBe(true)
    expect(system.calls[0].args).toEqual([])
    expect(system.calls[0].options.input).toBe(buildCreateDatabaseSql(database))
  })

  it('finishes a creation that stopped after the database', async () => {
    const system = runningSystem()
    system.databases.add('wordpress')
    system.users.add('wordpressuser@localhost')

    await createDatabase(system, database)

    expect(system.grants.has('wordpress|wordpressuser@localhost')).toBe(true)
    expect([...system.databases]).toEqual(['wordpress'])
  })

  it('surfaces mysql errors', async () => {
    const system = runningSystem()
    system.failWhen(call => call.options.input !== undefined, 1, 'ERROR 1045 (28000): Access denied for user \'root\'@\'localhost\'')

    await expect(createDatabase(system, database)).rejects.toThrow('ERROR 1045 (28000)')
  })

  describe('hasDatabaseGrant', () => {
    it('is false for an unknown account', async () => {
      const system = runningSystem()

      expect(await hasDatabaseGrant(system, database)).toBe(false)
      expect(system.calls[0].args).toEqual(['--batch', '--skip-column-names', '-e', 'SHOW GRANTS FOR \'wordpressuser\'@\'localhost\';'])
    })

    it('requires ALL PRIVILEGES on the configured database', async () => {
      const system = runningSystem()
      system.users.add('wordpressuser@localhost')
      system.grants.add('other|wordpressuser@localhost')

      expect(await hasDatabaseGrant(system, database)).toBe(false)
      system.grants.add('wordpress|wordpressuser@localhost')
      expect(await hasDatabaseGrant(system, database)).toBe(true)
    })
  })

  it('fails when the server is down', async () => {
    await expect(listDatabases(new FakeSystem())).rejects.toThrow('Command failed with exit code 1: mysql --batch')
  })
})
