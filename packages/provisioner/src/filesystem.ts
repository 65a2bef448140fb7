import type { CommandRunner } from './types'
import { runChecked } from './exec'

// Privileged filesystem operations. The web root and system config files
// belong to root, so these go through the runner instead of node:fs.

export async function makeDirectory(runner: CommandRunner, dir: string): Promise<void> {
  await runChecked(runner, 'mkdir', ['-p', dir], { sudo: true })
}

/**
 * Copy the contents of `source` into `destination`, overwriting files
 */
export async function copyTree(runner: CommandRunner, source: string, destination: string): Promise<void> {
  await runChecked(runner, 'cp', ['-rf', `${source}/.`, `${destination}/`], { sudo: true })
}

export async function copyFile(runner: CommandRunner, source: string, destination: string): Promise<void> {
  await runChecked(runner, 'cp', ['-f', source, destination], { sudo: true })
}

/**
 * Rename within one filesystem, so the target appears in a single step.
 * `destination` must not exist yet.
 */
export async function movePath(runner: CommandRunner, source: string, destination: string): Promise<void> {
  await runChecked(runner, 'mv', ['-f', source, destination], { sudo: true })
}

export async function removePath(runner: CommandRunner, target: string): Promise<void> {
  await runChecked(runner, 'rm', ['-rf', target], { sudo: true })
}

export async function changeOwner(runner: CommandRunner, target: string, user: string, group: string, recursive = true): Promise<void> {
  const args = recursive ? ['-R', `${user}:${group}`, target] : [`${user}:${group}`, target]
  await runChecked(runner, 'chown', args, { sudo: true })
}

export async function changeMode(runner: CommandRunner, target: string, mode: string, recursive = true): Promise<void> {
  const args = recursive ? ['-R', mode, target] : [mode, target]
  await runChecked(runner, 'chmod', args, { sudo: true })
}

/**
 * Write a file as root by piping the content through `tee`
 */
export async function writeFilePrivileged(runner: CommandRunner, filePath: string, content: string): Promise<void> {
  await runChecked(runner, 'tee', [filePath], { sudo: true, input: content })
}
