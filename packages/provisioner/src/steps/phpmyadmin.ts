import type { ProvisionConfig, ProvisionStep } from '../types'
import fs from 'node:fs'
import path from 'node:path'
import { createWorkspace, downloadFile, extractArchive, removeWorkspace } from '../download'
import { changeOwner, copyTree, makeDirectory, movePath, removePath } from '../filesystem'
import { isDirectory } from '../utils'

export function phpMyAdminPath(config: ProvisionConfig): string {
  return path.join(config.webRoot, config.phpMyAdmin.directory)
}

/**
 * Sibling of the install directory that is filled and owned before being
 * renamed into place
 */
export function phpMyAdminStagingPath(config: ProvisionConfig): string {
  return path.join(config.webRoot, `.${config.phpMyAdmin.directory}.partial`)
}

function archiveName(url: string): string {
  return path.basename(new URL(url).pathname) || 'phpMyAdmin.tar.gz'
}

export const installPhpMyAdminStep: ProvisionStep = {
  name: 'install-phpmyadmin',
  description: 'Install phpMyAdmin',
  check({ config }) {
    return isDirectory(phpMyAdminPath(config))
  },
  async apply({ config, runner }) {
    const workspace = await createWorkspace(config.workDir, 'phpmyadmin')

    try {
      const archive = path.join(workspace, archiveName(config.phpMyAdmin.url))
      await downloadFile(config.phpMyAdmin.url, archive, config.network)

      const extracted = path.join(workspace, 'extracted')
      await fs.promises.mkdir(extracted)
      await extractArchive(runner, archive, extracted, { stripComponents: 1 })

      // leftovers from an interrupted run
      const staging = phpMyAdminStagingPath(config)
      await removePath(runner, staging)

      await makeDirectory(runner, staging)
      await copyTree(runner, extracted, staging)
      await changeOwner(runner, staging, config.webUser, config.webGroup)
      await movePath(runner, staging, phpMyAdminPath(config))
    }
    finally {
      await removeWorkspace(workspace)
    }
  },
}
