/**
 * Wiring shared by all commands.
 *
 * Services are built per command from the resolved settings; there is no
 * process-wide singleton for the store or the active version.
 */

import { defaults, getArchiveUrl, getIndexUrl } from '../config/defaults'
import { ConfigManager } from '../core/config-manager'
import { HttpFetcher } from '../core/fetcher'
import { MakeToolchain } from '../core/build-toolchain'
import { VersionCatalog } from '../core/version-catalog'
import { VersionStore } from '../core/version-store'
import { ActivationManager } from '../core/activation-manager'
import { Installer } from '../core/installer'
import { parseVersion } from '../core/version-parser'
import {
  createInvalidVersionError,
  logRdvmError,
  RdvmError,
} from '../core/error-handler'
import type { SemanticVersion, Settings } from '../types'

export type Services = {
  settings: Settings
  catalog: VersionCatalog
  store: VersionStore
  activation: ActivationManager
  installer: Installer
}

export async function createServices(
  configManager: ConfigManager = new ConfigManager(),
): Promise<Services> {
  const settings = await configManager.resolveSettings()
  const fetcher = new HttpFetcher(defaults.fetchTimeoutMs)
  const catalog = new VersionCatalog(fetcher, getIndexUrl(settings.mirror))
  const store = new VersionStore(settings.storeDir)
  const activation = new ActivationManager({ store, binDir: settings.binDir })
  const installer = new Installer({
    catalog,
    store,
    activation,
    fetcher,
    toolchain: new MakeToolchain(settings.make),
    archiveUrl: (version) => getArchiveUrl(settings.mirror, version),
    tmpDir: settings.tmpDir,
    logDir: settings.logDir,
  })

  return { settings, catalog, store, activation, installer }
}

/**
 * Parse a version argument or throw INVALID_VERSION
 */
export function requireVersion(input: string): SemanticVersion {
  const version = parseVersion(input)
  if (!version) {
    throw createInvalidVersionError(input)
  }
  return version
}

/**
 * Report a command failure and exit non-zero
 */
export function exitWithError(error: unknown, json?: boolean): never {
  const err = RdvmError.from(error)
  if (json) {
    console.log(
      JSON.stringify({ error: err.message, code: err.code }, null, 2),
    )
  } else {
    logRdvmError(err)
  }
  process.exit(1)
}
