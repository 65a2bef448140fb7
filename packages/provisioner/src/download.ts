import type { CommandRunner, NetworkConfig } from './types'
import fs from 'node:fs'
import path from 'node:path'
import process from 'node:process'
import { DownloadError, errorMessage } from './errors'
import { runChecked } from './exec'
import { logDebug, suspendSpinner } from './logging'
import { formatBytes } from './progress'

/**
 * Download a URL to a file. Returns the number of bytes written.
 */
export async function downloadFile(url: string, destination: string, network: NetworkConfig): Promise<number> {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => {
    controller.abort()
  }, network.timeout)

  try {
    logDebug(`Downloading ${url}`)

    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': network.userAgent,
      },
    })

    if (!response.ok) {
      throw new DownloadError(url, `HTTP ${response.status} ${response.statusText}`.trim(), response.status)
    }

    const contentLength = response.headers.get('content-length')
    const totalBytes = contentLength ? Number.parseInt(contentLength, 10) : 0
    const showProgress = totalBytes > 0 && Boolean(process.stdout.isTTY)
    const resumeSpinner = showProgress ? suspendSpinner() : undefined

    const chunks: Uint8Array[] = []
    let downloadedBytes = 0
    let lastProgressUpdate = 0

    const reader = response.body?.getReader()
    if (reader) {
      while (true) {
        const { done, value } = await reader.read()
        if (done)
          break

        chunks.push(value)
        downloadedBytes += value.length

        // Throttle progress updates to every 100ms
        const now = Date.now()
        if (showProgress && (now - lastProgressUpdate > 100 || downloadedBytes >= totalBytes)) {
          const percent = Math.floor(downloadedBytes / totalBytes * 100)
          process.stdout.write(`\r⬇️  ${formatBytes(downloadedBytes)}/${formatBytes(totalBytes)} (${percent}%)`)
          lastProgressUpdate = now
        }
      }
    }

    if (showProgress) {
      process.stdout.write('\r\x1B[K')
    }
    resumeSpinner?.()

    await fs.promises.mkdir(path.dirname(destination), { recursive: true })
    await fs.promises.writeFile(destination, Buffer.concat(chunks))

    logDebug(`Downloaded ${formatBytes(downloadedBytes)} to ${destination}`)
    return downloadedBytes
  }
  catch (error) {
    if (error instanceof DownloadError)
      throw error
    if (error instanceof Error && error.name === 'AbortError') {
      throw new DownloadError(url, `timed out after ${network.timeout}ms`)
    }
    throw new DownloadError(url, errorMessage(error))
  }
  finally {
    clearTimeout(timeoutId)
  }
}

export interface ExtractOptions {
  stripComponents?: number
  sudo?: boolean
}

/**
 * Extract a .tar.gz archive into a directory with tar
 */
export async function extractArchive(runner: CommandRunner, archive: string, destination: string, options: ExtractOptions = {}): Promise<void> {
  const args = ['-xzf', archive, '-C', destination]
  if (options.stripComponents) {
    args.push('--strip-components', String(options.stripComponents))
  }
  await runChecked(runner, 'tar', args, { sudo: options.sudo })
}

/**
 * Create a private scratch directory under the work dir
 */
export async function createWorkspace(workDir: string, prefix: string): Promise<string> {
  await fs.promises.mkdir(workDir, { recursive: true })
  return fs.promises.mkdtemp(path.join(workDir, `${prefix}-`))
}

export async function removeWorkspace(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true })
}
