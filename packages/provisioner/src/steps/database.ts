import type { ProvisionStep } from '../types'
import { createDatabase, databaseExists, hasDatabaseGrant } from '../services/database'

export const ensureDatabaseStep: ProvisionStep = {
  name: 'ensure-database',
  description: 'Create the application database and user',
  async check({ config, runner }) {
    return await databaseExists(runner, config.database.name)
      && await hasDatabaseGrant(runner, config.database)
  },
  async apply({ config, runner }) {
    await createDatabase(runner, config.database)
  },
}
