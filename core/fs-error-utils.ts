/**
 * Filesystem helpers shared by the store and the installer
 */

import { rename, cp, rm } from 'fs/promises'
import { logDebug, errorMessage } from './error-handler'

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined
  }
  return undefined
}

/**
 * Errors for which rename() should fall back to copy + delete
 * - EXDEV: cross-device link (rename across filesystems)
 * - EPERM: permission error on some filesystems
 * - ENOTEMPTY: target directory exists with content
 */
export function isRenameFallbackError(error: unknown): boolean {
  const code = errnoCode(error)
  return code !== undefined && ['EXDEV', 'EPERM', 'ENOTEMPTY'].includes(code)
}

/**
 * Move a file or directory, using rename() and falling back to cp() + rm()
 */
export async function moveEntry(
  sourcePath: string,
  destPath: string,
): Promise<void> {
  try {
    await rename(sourcePath, destPath)
  } catch (error) {
    if (!isRenameFallbackError(error)) {
      throw error
    }
    await cp(sourcePath, destPath, { recursive: true, force: true })
    // The destination is complete at this point
    try {
      await rm(sourcePath, { recursive: true, force: true })
    } catch (cleanupError) {
      logDebug('Failed to clean up source after copy', {
        sourcePath,
        destPath,
        error: errorMessage(cleanupError),
      })
    }
  }
}
