import type { Command } from '../cli/types'

// Lazy command resolvers. Add new commands here.
const registry: Record<string, () => Promise<Command>> = {
  run: async () => (await import('./run')).default,
  status: async () => (await import('./status')).default,
  config: async () => (await import('./config')).default,
}

export async function resolveCommand(name?: string): Promise<Command | undefined> {
  if (!name)
    return undefined
  const loader = registry[name]
  if (!loader)
    return undefined
  return loader()
}

export function listCommands(): string[] {
  return Object.keys(registry).sort()
}
