/**
 * Version Parser
 *
 * Pulls release versions out of arbitrary text such as an HTML directory
 * listing or `redis-server --version` output. Everything here is pure.
 *
 * Accepted forms: "7.2.4", "7.0.0-rc2", "2.6.0_rc1". By convention an even
 * minor number marks a stable release line and an odd one a development line.
 */

import type { SemanticVersion } from '../types'

const VERSION_SOURCE = String.raw`(\d+)\.(\d+)\.(\d+)(?:[-_]rc(\d+))?`

function versionPattern(): RegExp {
  return new RegExp(VERSION_SOURCE, 'g')
}

const EXACT_VERSION = new RegExp(`^${VERSION_SOURCE}$`)

function fromMatch(match: RegExpMatchArray, raw: string): SemanticVersion {
  return {
    major: parseInt(match[1], 10),
    minor: parseInt(match[2], 10),
    patch: parseInt(match[3], 10),
    prerelease: match[4] === undefined ? null : parseInt(match[4], 10),
    raw,
  }
}

/**
 * Compare two versions. Returns a negative number if a sorts first.
 *
 * A release candidate sorts before the final release of the same triple.
 * Two candidates compare by rc number, then by literal so that "-rc1" and
 * "_rc1" still get a stable order.
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): number {
  if (a.major !== b.major) return a.major - b.major
  if (a.minor !== b.minor) return a.minor - b.minor
  if (a.patch !== b.patch) return a.patch - b.patch

  if (a.prerelease !== b.prerelease) {
    if (a.prerelease === null) return 1
    if (b.prerelease === null) return -1
    return a.prerelease - b.prerelease
  }

  if (a.raw === b.raw) return 0
  return a.raw < b.raw ? -1 : 1
}

function sortUnique(versions: Iterable<SemanticVersion>): SemanticVersion[] {
  const byLiteral = new Map<string, SemanticVersion>()
  for (const version of versions) {
    if (!byLiteral.has(version.raw)) {
      byLiteral.set(version.raw, version)
    }
  }
  return [...byLiteral.values()].sort(compareVersions)
}

/**
 * Extract every version literal from text, deduplicated and sorted ascending
 */
export function extractVersions(text: string): SemanticVersion[] {
  const found: SemanticVersion[] = []
  for (const match of text.matchAll(versionPattern())) {
    found.push(fromMatch(match, match[0]))
  }
  return sortUnique(found)
}

/**
 * Extract stable versions (even minor) from text.
 *
 * Release-candidate markers are dropped: "2.8.0-rc1" contributes "2.8.0".
 */
export function extractStableVersions(text: string): SemanticVersion[] {
  const found: SemanticVersion[] = []
  for (const match of text.matchAll(versionPattern())) {
    const raw = `${match[1]}.${match[2]}.${match[3]}`
    const version = { ...fromMatch(match, raw), prerelease: null }
    if (isStable(version)) {
      found.push(version)
    }
  }
  return sortUnique(found)
}

/**
 * Parse a single version literal. The whole input must be a version.
 */
export function parseVersion(input: string): SemanticVersion | null {
  const literal = input.trim()
  const match = literal.match(EXACT_VERSION)
  return match ? fromMatch(match, literal) : null
}

/**
 * First version appearing anywhere in the text
 */
export function findVersion(text: string): SemanticVersion | null {
  const match = versionPattern().exec(text)
  return match ? fromMatch(match, match[0]) : null
}

export function isStable(version: SemanticVersion): boolean {
  return version.minor % 2 === 0
}

/**
 * Whether a probed version identifies the given version.
 *
 * `--version` output never carries the rc marker, so a probe without one
 * matches on the numeric triple alone.
 */
export function matchesProbe(
  version: SemanticVersion,
  probed: SemanticVersion,
): boolean {
  if (probed.raw === version.raw) return true
  return (
    probed.prerelease === null &&
    probed.major === version.major &&
    probed.minor === version.minor &&
    probed.patch === version.patch
  )
}

/**
 * The installed version a probe identifies, preferring an exact literal
 * match over a match on the numeric triple. With several candidates on the
 * same triple the newest wins.
 */
export function pickActive(
  installed: SemanticVersion[],
  probed: SemanticVersion | null,
): SemanticVersion | null {
  if (!probed) return null
  const exact = installed.find((version) => version.raw === probed.raw)
  if (exact) return exact

  const byTriple = installed
    .filter((version) => matchesProbe(version, probed))
    .sort(compareVersions)
  return byTriple.length > 0 ? byTriple[byTriple.length - 1] : null
}
