/**
 * Installer
 *
 * Resolves a target, then fetches, extracts, builds and places it in the
 * store unless it is already there, and finally activates it.
 *
 * Each build runs in its own work directory under the tmp root:
 *
 *   <tmp>/<version>-XXXXXX/source.tar.gz   downloaded archive
 *   <tmp>/<version>-XXXXXX/src/            extracted sources
 *   <tmp>/<version>-XXXXXX/prefix/         install prefix handed to make
 *
 * The work directory is removed on every exit path once it exists. A process
 * killed mid-build leaves it behind; later runs do not sweep it.
 */

import { createReadStream, createWriteStream } from 'fs'
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'fs/promises'
import { basename, join } from 'path'
import type { Readable } from 'stream'
import { pipeline } from 'stream/promises'
import { x as extractTar } from 'tar'
import { findVersion, parseVersion } from './version-parser'
import type { VersionCatalog } from './version-catalog'
import type { VersionStore } from './version-store'
import type { ActivationManager } from './activation-manager'
import type { Fetcher } from './fetcher'
import type { BuildToolchain } from './build-toolchain'
import {
  createInstallFailedError,
  createInvalidVersionError,
  errorMessage,
  ErrorCodes,
  logDebug,
  logWarning,
  RdvmError,
} from './error-handler'
import type { ProgressCallback, SemanticVersion } from '../types'

export type InstallerOptions = {
  catalog: VersionCatalog
  store: VersionStore
  activation: ActivationManager
  fetcher: Fetcher
  toolchain: BuildToolchain
  /** Source tarball location for a version */
  archiveUrl: (version: SemanticVersion) => string
  tmpDir: string
  logDir: string
}

export type InstallResult = {
  version: SemanticVersion
  /** False when the version was already in the store */
  built: boolean
  activated: boolean
  /** Set when the install completed but switching to it failed */
  activationError?: RdvmError
}

type SourceOpener = () => Promise<Readable>

const ARCHIVE_NAME = 'source.tar.gz'

export class Installer {
  constructor(private readonly options: InstallerOptions) {}

  /**
   * Install a version by name, "latest" or "stable", then activate it
   */
  async install(
    target: string,
    buildOptions: string[],
    onProgress?: ProgressCallback,
  ): Promise<InstallResult> {
    onProgress?.({ stage: 'resolving', message: `Resolving ${target}...` })
    const version = await this.options.catalog.resolve(target)
    const url = this.options.archiveUrl(version)

    return this.installVersion(
      version,
      buildOptions,
      () => this.options.fetcher.fetchStream(url),
      onProgress,
    )
  }

  /**
   * Install from a local source tarball. The version comes from
   * `versionName` or, failing that, from the archive file name.
   */
  async installArchive(
    archivePath: string,
    buildOptions: string[],
    versionName?: string,
    onProgress?: ProgressCallback,
  ): Promise<InstallResult> {
    const version = versionName
      ? parseVersion(versionName)
      : findVersion(basename(archivePath))
    if (!version) {
      throw createInvalidVersionError(versionName ?? basename(archivePath))
    }

    return this.installVersion(
      version,
      buildOptions,
      async () => createReadStream(archivePath),
      onProgress,
    )
  }

  /**
   * Build a version into the store without activating it
   *
   * @returns the store directory of the version
   * @throws RdvmError INSTALL_FAILED
   */
  async fetchAndBuild(
    version: SemanticVersion,
    buildOptions: string[],
    openSource: SourceOpener,
    onProgress?: ProgressCallback,
  ): Promise<string> {
    const { tmpDir, toolchain, store } = this.options

    await mkdir(tmpDir, { recursive: true })
    const workDir = await mkdtemp(join(tmpDir, `${version.raw}-`))

    try {
      const sourceDir = join(workDir, 'src')
      const prefix = join(workDir, 'prefix')

      onProgress?.({
        stage: 'downloading',
        message: `Downloading Redis ${version.raw} sources...`,
      })
      await this.stage(version, 'could not fetch sources', () =>
        this.fetchArchive(openSource, join(workDir, ARCHIVE_NAME)),
      )

      onProgress?.({ stage: 'extracting', message: 'Extracting sources...' })
      await this.stage(version, 'could not extract sources', () =>
        this.extract(join(workDir, ARCHIVE_NAME), sourceDir),
      )

      onProgress?.({
        stage: 'building',
        message: `Building Redis ${version.raw}...`,
      })
      const result = await this.stage(version, 'build did not run', () =>
        toolchain.build(sourceDir, prefix, buildOptions),
      )
      if (!result.success) {
        const logPath = await this.writeBuildLog(version, result.output)
        throw createInstallFailedError(
          version.raw,
          `build exited with code ${result.exitCode ?? 'unknown'}`,
          { logPath, buildOptions },
        )
      }

      onProgress?.({ stage: 'placing', message: 'Installing build output...' })
      return await this.stage(version, 'could not place build output', () =>
        store.place(version, prefix, buildOptions),
      )
    } finally {
      await rm(workDir, { recursive: true, force: true })
    }
  }

  private async installVersion(
    version: SemanticVersion,
    buildOptions: string[],
    openSource: SourceOpener,
    onProgress?: ProgressCallback,
  ): Promise<InstallResult> {
    let built = false
    if (await this.options.store.has(version)) {
      onProgress?.({
        stage: 'cached',
        message: `Redis ${version.raw} is already installed`,
      })
    } else {
      await this.fetchAndBuild(version, buildOptions, openSource, onProgress)
      built = true
    }

    onProgress?.({
      stage: 'activating',
      message: `Activating Redis ${version.raw}...`,
    })
    try {
      await this.options.activation.activate(version)
      return { version, built, activated: true }
    } catch (error) {
      // The install itself stands; only the switch failed
      const activationError = RdvmError.from(
        error,
        ErrorCodes.ACTIVATION_FAILED,
      )
      logWarning(`Redis ${version.raw} is installed but was not activated`, {
        version: version.raw,
        error: activationError.message,
      })
      return { version, built, activated: false, activationError }
    }
  }

  /**
   * Run one install step, reporting any failure as INSTALL_FAILED
   */
  private async stage<T>(
    version: SemanticVersion,
    reason: string,
    step: () => Promise<T>,
  ): Promise<T> {
    try {
      return await step()
    } catch (error) {
      if (error instanceof RdvmError && error.code === ErrorCodes.INSTALL_FAILED) {
        throw error
      }
      throw createInstallFailedError(
        version.raw,
        `${reason}: ${errorMessage(error)}`,
        { cause: errorMessage(error) },
      )
    }
  }

  private async fetchArchive(
    openSource: SourceOpener,
    archivePath: string,
  ): Promise<void> {
    const source = await openSource()
    await pipeline(source, createWriteStream(archivePath))
  }

  private async extract(archivePath: string, destDir: string): Promise<void> {
    await mkdir(destDir, { recursive: true })
    // Source tarballs wrap everything in a redis-<version>/ directory
    await extractTar({
      file: archivePath,
      cwd: destDir,
      strip: 1,
      strict: true,
    })

    const entries = await readdir(destDir)
    if (entries.length === 0) {
      throw new Error('archive contained no files')
    }
    logDebug('Extracted sources', { archivePath, entries: entries.length })
  }

  private async writeBuildLog(
    version: SemanticVersion,
    output: string,
  ): Promise<string> {
    await mkdir(this.options.logDir, { recursive: true })
    const logPath = join(this.options.logDir, `build-${version.raw}.log`)
    await writeFile(logPath, output)
    return logPath
  }
}
