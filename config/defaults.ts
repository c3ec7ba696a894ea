import type { SemanticVersion } from '../types'

export type Defaults = {
  /** Release directory listing, also the base of source tarball URLs */
  mirror: string
  /** System directory the active version is linked into */
  binDir: string
  make: string
  /** Binary probed with --version to find the active version */
  serverBinary: string
  probeTimeoutMs: number
  fetchTimeoutMs: number
}

export const defaults: Defaults = {
  mirror: 'https://download.redis.io/releases',
  binDir: '/usr/local/bin',
  make: 'make',
  serverBinary: 'redis-server',
  probeTimeoutMs: 10_000,
  fetchTimeoutMs: 60_000,
}

/**
 * URL of the release listing scraped for versions
 */
export function getIndexUrl(mirror: string): string {
  return `${mirror.replace(/\/+$/, '')}/`
}

/**
 * URL of the source tarball for a version
 */
export function getArchiveUrl(mirror: string, version: SemanticVersion): string {
  return `${mirror.replace(/\/+$/, '')}/redis-${version.raw}.tar.gz`
}
