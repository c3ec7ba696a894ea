/**
 * Version Catalog
 *
 * Answers "which versions exist" by scraping the remote release listing.
 * Every query fetches the listing again; nothing is cached or persisted.
 */

import {
  extractStableVersions,
  extractVersions,
  parseVersion,
} from './version-parser'
import type { Fetcher } from './fetcher'
import {
  createCatalogEmptyError,
  createFetchFailedError,
  createInvalidVersionError,
  logDebug,
  RdvmError,
} from './error-handler'
import type { SemanticVersion, SymbolicTarget } from '../types'

export function isSymbolicTarget(target: string): target is SymbolicTarget {
  return target === 'latest' || target === 'stable'
}

export class VersionCatalog {
  constructor(
    private readonly fetcher: Fetcher,
    readonly indexUrl: string,
  ) {}

  /**
   * All versions in the listing, ascending
   */
  async list(): Promise<SemanticVersion[]> {
    return extractVersions(await this.fetchListing())
  }

  async latest(): Promise<SemanticVersion> {
    return this.newest(await this.list())
  }

  async latestStable(): Promise<SemanticVersion> {
    return this.newest(extractStableVersions(await this.fetchListing()))
  }

  /**
   * Turn an install target into a concrete version.
   *
   * Explicit versions are not checked against the listing; an unknown one
   * fails later when its tarball cannot be fetched.
   */
  async resolve(target: string): Promise<SemanticVersion> {
    if (isSymbolicTarget(target)) {
      return target === 'latest' ? this.latest() : this.latestStable()
    }

    const version = parseVersion(target)
    if (!version) {
      throw createInvalidVersionError(target)
    }
    return version
  }

  private newest(versions: SemanticVersion[]): SemanticVersion {
    if (versions.length === 0) {
      throw createCatalogEmptyError(this.indexUrl)
    }
    return versions[versions.length - 1]
  }

  private async fetchListing(): Promise<string> {
    try {
      const text = await this.fetcher.fetchText(this.indexUrl)
      logDebug('Fetched release listing', {
        url: this.indexUrl,
        bytes: text.length,
      })
      return text
    } catch (error) {
      if (error instanceof RdvmError) throw error
      throw createFetchFailedError(this.indexUrl, error)
    }
  }
}
