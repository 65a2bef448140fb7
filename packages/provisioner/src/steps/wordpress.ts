import type { ProvisionConfig, ProvisionStep } from '../types'
import fs from 'node:fs'
import path from 'node:path'
import { createWorkspace, downloadFile, extractArchive, removeWorkspace } from '../download'
import { ProvisionError } from '../errors'
import { changeMode, changeOwner, copyFile, copyTree, makeDirectory, movePath, writeFilePrivileged } from '../filesystem'
import { logDebug } from '../logging'
import { isDirectory, isFile } from '../utils'
import { renderWpConfig } from '../wordpress/config'

const SENTINEL = 'wp-login.php'

export function wordpressSentinel(config: ProvisionConfig): string {
  return path.join(config.webRoot, SENTINEL)
}

export function wpConfigPath(config: ProvisionConfig): string {
  return path.join(config.webRoot, 'wp-config.php')
}

export const installWordPressStep: ProvisionStep = {
  name: 'install-wordpress',
  description: 'Install WordPress',
  check({ config }) {
    return isFile(wordpressSentinel(config))
  },
  async apply({ config, runner }) {
    const workspace = await createWorkspace(config.workDir, 'wordpress')

    try {
      const archive = path.join(workspace, 'latest.tar.gz')
      await downloadFile(config.wordpress.url, archive, config.network)
      await extractArchive(runner, archive, workspace)

      const source = path.join(workspace, 'wordpress')
      if (!await isDirectory(source)) {
        throw new ProvisionError(`Archive from ${config.wordpress.url} has no wordpress/ directory`, 'INVALID_ARCHIVE')
      }

      // The sentinel is held back and put in place only once everything
      // else is copied and owned, so an interrupted install is retried
      const heldSentinel = path.join(workspace, SENTINEL)
      if (!await isFile(path.join(source, SENTINEL))) {
        throw new ProvisionError(`Archive from ${config.wordpress.url} has no wordpress/${SENTINEL}`, 'INVALID_ARCHIVE')
      }
      await fs.promises.rename(path.join(source, SENTINEL), heldSentinel)

      await makeDirectory(runner, config.webRoot)
      await copyTree(runner, source, config.webRoot)
      await changeOwner(runner, config.webRoot, config.webUser, config.webGroup)
      await changeMode(runner, config.webRoot, '755')

      const staged = path.join(config.webRoot, `.${SENTINEL}.partial`)
      await copyFile(runner, heldSentinel, staged)
      await changeOwner(runner, staged, config.webUser, config.webGroup, false)
      await changeMode(runner, staged, '755', false)
      await movePath(runner, staged, wordpressSentinel(config))
    }
    finally {
      await removeWorkspace(workspace)
    }

    logDebug(`WordPress installed at ${config.webRoot}`)
  },
}

export const configureWordPressStep: ProvisionStep = {
  name: 'configure-wordpress',
  description: 'Write wp-config.php',
  check({ config }) {
    return isFile(wpConfigPath(config))
  },
  async apply({ config, runner }) {
    const samplePath = path.join(config.webRoot, 'wp-config-sample.php')
    if (!await isFile(samplePath)) {
      throw new ProvisionError(`${samplePath} not found; is WordPress installed?`, 'MISSING_FILE')
    }

    const sample = await fs.promises.readFile(samplePath, 'utf-8')
    const rendered = renderWpConfig(sample, {
      database: config.database,
      tablePrefix: config.wordpress.tablePrefix,
    })

    const target = wpConfigPath(config)
    await writeFilePrivileged(runner, target, rendered)
    await changeOwner(runner, target, config.webUser, config.webGroup, false)
  },
}
