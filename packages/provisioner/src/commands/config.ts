/* eslint-disable no-console */
import type { Command } from '../cli/types'
import type { ProvisionConfig } from '../types'
import { maskSecret } from '../utils'
import { resolveConfig } from './shared'

export function redactConfig(config: ProvisionConfig): ProvisionConfig {
  return {
    ...config,
    database: {
      ...config.database,
      password: maskSecret(config.database.password),
    },
  }
}

const command: Command = {
  name: 'config',
  description: 'Show the resolved configuration',
  async run(ctx) {
    const config = await resolveConfig(ctx)
    console.log(JSON.stringify(redactConfig(config), null, 2))
    return 0
  },
}

export default command
