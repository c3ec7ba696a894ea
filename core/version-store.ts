/**
 * Version Store
 *
 * Owns the on-disk layout of installed versions:
 *
 *   <root>/<version>/bin/redis-server   build output
 *   <root>/<version>/build-options      options used for the build, one per line
 *
 * An entry only counts as installed once its server binary exists in the
 * final directory. Placement happens in a staging directory that is renamed
 * into place as the last step, so an interrupted placement never produces a
 * directory that has() accepts.
 */

import { existsSync } from 'fs'
import {
  mkdir,
  mkdtemp,
  readdir,
  readFile,
  rename,
  rm,
  writeFile,
} from 'fs/promises'
import { join, resolve } from 'path'
import { defaults } from '../config/defaults'
import { compareVersions, parseVersion } from './version-parser'
import { moveEntry } from './fs-error-utils'
import { createNotInstalledError, logDebug } from './error-handler'
import type { InstalledVersion, SemanticVersion } from '../types'

export const CONFIG_FILE = 'build-options'

export class VersionStore {
  readonly root: string

  constructor(root: string) {
    this.root = resolve(root)
  }

  path(version: SemanticVersion): string {
    return join(this.root, version.raw)
  }

  binPath(version: SemanticVersion): string {
    return join(this.path(version), 'bin')
  }

  async has(version: SemanticVersion): Promise<boolean> {
    return existsSync(join(this.binPath(version), defaults.serverBinary))
  }

  /**
   * Bin directory of an installed version
   *
   * @throws RdvmError NOT_INSTALLED when the version is not in the store
   */
  async requireBinPath(version: SemanticVersion): Promise<string> {
    if (!(await this.has(version))) {
      throw createNotInstalledError(version.raw)
    }
    return this.binPath(version)
  }

  /**
   * Move a built artifact tree into the store and record its build options.
   * An existing entry for the version is replaced wholesale.
   *
   * @returns the store directory of the version
   */
  async place(
    version: SemanticVersion,
    sourceDir: string,
    config: string[],
  ): Promise<string> {
    await mkdir(this.root, { recursive: true })
    const staging = await mkdtemp(join(this.root, `.staging-${version.raw}-`))
    const target = this.path(version)
    const previous = `${staging}.previous`

    let placed = false
    try {
      await this.moveArtifacts(sourceDir, staging)
      await this.writeConfig(staging, config)

      if (existsSync(target)) {
        await rename(target, previous)
      }
      await rename(staging, target)
      placed = true
    } finally {
      if (!placed) {
        await rm(staging, { recursive: true, force: true })
        // Put a displaced entry back if the final rename failed
        if (existsSync(previous) && !existsSync(target)) {
          await rename(previous, target)
        }
      }
      await rm(previous, { recursive: true, force: true })
    }

    logDebug('Placed version in store', { version: version.raw, target })
    return target
  }

  /**
   * Delete a version. Removing a version that is not installed is a no-op.
   */
  async remove(version: SemanticVersion): Promise<void> {
    await rm(this.path(version), { recursive: true, force: true })
  }

  /**
   * Build options recorded for a version, or null when none were recorded
   */
  async configOf(version: SemanticVersion): Promise<string[] | null> {
    const configPath = join(this.path(version), CONFIG_FILE)
    if (!existsSync(configPath)) {
      return null
    }
    const content = await readFile(configPath, 'utf8')
    return content.split('\n').filter((line) => line.length > 0)
  }

  /**
   * All complete entries in the store, ascending
   */
  async list(): Promise<InstalledVersion[]> {
    if (!existsSync(this.root)) {
      return []
    }

    const entries = await readdir(this.root, { withFileTypes: true })
    const installed: InstalledVersion[] = []

    for (const entry of entries) {
      if (!entry.isDirectory()) continue
      // Staging directories and anything else that is not a version
      const version = parseVersion(entry.name)
      if (!version || !(await this.has(version))) continue

      installed.push({
        version,
        path: this.path(version),
        config: await this.configOf(version),
      })
    }

    return installed.sort((a, b) => compareVersions(a.version, b.version))
  }

  protected async moveArtifacts(
    sourceDir: string,
    destDir: string,
  ): Promise<void> {
    const entries = await readdir(sourceDir)
    for (const name of entries) {
      await moveEntry(join(sourceDir, name), join(destDir, name))
    }
  }

  protected async writeConfig(dir: string, config: string[]): Promise<void> {
    const content = config.length > 0 ? config.join('\n') + '\n' : ''
    await writeFile(join(dir, CONFIG_FILE), content)
  }
}
