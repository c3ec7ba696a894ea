/**
 * Activation Manager
 *
 * The active version is whatever `redis-server` resolves to in the system
 * bin directory. It is never recorded anywhere: current() runs the binary
 * and reads the version it reports.
 *
 * Activation links every binary of a store entry into the bin directory.
 * All links are created under temporary names first and then renamed over
 * the live names, so each command switches atomically and the window where
 * old and new binaries coexist is limited to the rename loop.
 */

import { existsSync } from 'fs'
import {
  lstat,
  mkdir,
  readdir,
  readlink,
  rename,
  rm,
  symlink,
  unlink,
} from 'fs/promises'
import { join, resolve, sep } from 'path'
import { defaults } from '../config/defaults'
import { findVersion, matchesProbe } from './version-parser'
import { spawnAsync } from './spawn-utils'
import type { VersionStore } from './version-store'
import {
  createActivationFailedError,
  createNotInstalledError,
  errorMessage,
  logDebug,
  logInfo,
} from './error-handler'
import type { SemanticVersion } from '../types'

export type ActivationManagerOptions = {
  store: VersionStore
  binDir: string
  probeTimeoutMs?: number
}

type StagedLink = {
  temp: string
  dest: string
}

export class ActivationManager {
  private readonly store: VersionStore
  readonly binDir: string
  private readonly probeTimeoutMs: number

  constructor(options: ActivationManagerOptions) {
    this.store = options.store
    this.binDir = resolve(options.binDir)
    this.probeTimeoutMs = options.probeTimeoutMs ?? defaults.probeTimeoutMs
  }

  /**
   * Probe the live server binary. Returns null when nothing runnable is there.
   */
  async current(): Promise<SemanticVersion | null> {
    const server = join(this.binDir, defaults.serverBinary)
    // existsSync follows symlinks, so a dangling link counts as absent
    if (!existsSync(server)) {
      return null
    }

    try {
      const { stdout } = await spawnAsync(server, ['--version'], {
        timeout: this.probeTimeoutMs,
      })
      return findVersion(stdout)
    } catch (error) {
      logDebug('Active binary probe failed', {
        server,
        error: errorMessage(error),
      })
      return null
    }
  }

  /**
   * Whether the live binary reports the given version
   */
  async isActive(version: SemanticVersion): Promise<boolean> {
    const active = await this.current()
    return active !== null && matchesProbe(version, active)
  }

  /**
   * Make an installed version the active one.
   *
   * @returns false when the version was already linked (nothing changed)
   * @throws RdvmError NOT_INSTALLED or ACTIVATION_FAILED
   */
  async activate(version: SemanticVersion): Promise<boolean> {
    if (!(await this.store.has(version))) {
      throw createNotInstalledError(version.raw)
    }

    const sourceBin = this.store.binPath(version)
    const binaries = await this.listBinaries(sourceBin)

    if (await this.isLinked(sourceBin, binaries)) {
      logDebug('Version already active', { version: version.raw })
      return false
    }

    const staged: StagedLink[] = []
    try {
      await mkdir(this.binDir, { recursive: true })

      for (const name of binaries) {
        const temp = join(this.binDir, `.${name}.rdvm-${process.pid}`)
        await rm(temp, { force: true })
        await symlink(join(sourceBin, name), temp)
        staged.push({ temp, dest: join(this.binDir, name) })
      }

      for (const link of staged) {
        await rename(link.temp, link.dest)
      }

      await this.pruneLinks((target) => !isInside(target, sourceBin))
    } catch (error) {
      for (const link of staged) {
        await rm(link.temp, { force: true })
      }
      throw createActivationFailedError(version.raw, this.binDir, error)
    }

    logInfo('Activated version', {
      version: version.raw,
      binDir: this.binDir,
      binaries,
    })
    return true
  }

  /**
   * Remove links into a version's store entry from the bin directory
   *
   * @returns the number of links removed
   */
  async deactivate(version: SemanticVersion): Promise<number> {
    const entryPath = this.store.path(version)
    try {
      return await this.pruneLinks((target) => isInside(target, entryPath))
    } catch (error) {
      throw createActivationFailedError(version.raw, this.binDir, error)
    }
  }

  private async listBinaries(sourceBin: string): Promise<string[]> {
    const entries = await readdir(sourceBin, { withFileTypes: true })
    return entries
      .filter((entry) => !entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
  }

  private async isLinked(
    sourceBin: string,
    binaries: string[],
  ): Promise<boolean> {
    for (const name of binaries) {
      const target = await this.linkTarget(join(this.binDir, name))
      if (target !== join(sourceBin, name)) {
        return false
      }
    }
    return binaries.length > 0
  }

  private async linkTarget(path: string): Promise<string | null> {
    if (!existsSync(path)) return null
    const stats = await lstat(path)
    return stats.isSymbolicLink() ? readlink(path) : null
  }

  /**
   * Unlink every link in the bin directory that points into the store and
   * matches the predicate. Files and foreign links are left alone.
   */
  private async pruneLinks(
    shouldRemove: (target: string) => boolean,
  ): Promise<number> {
    if (!existsSync(this.binDir)) return 0

    let removed = 0
    const entries = await readdir(this.binDir, { withFileTypes: true })
    for (const entry of entries) {
      if (!entry.isSymbolicLink()) continue
      const linkPath = join(this.binDir, entry.name)
      const target = await readlink(linkPath)
      if (isInside(target, this.store.root) && shouldRemove(target)) {
        await unlink(linkPath)
        removed++
      }
    }
    return removed
  }
}

function isInside(path: string, dir: string): boolean {
  return path.startsWith(dir + sep)
}
