import fs from 'node:fs'

export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(filePath)).isFile()
  }
  catch {
    return false
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(dirPath)).isDirectory()
  }
  catch {
    return false
  }
}

/**
 * Mask secrets before a config object is printed
 */
export function maskSecret(value: string): string {
  return value ? '********' : ''
}
