/**
 * A parsed release version such as "7.2.4" or "7.0.0-rc2".
 *
 * `raw` is the literal text the version was parsed from and is its identity:
 * store directories are named after it and duplicates are keyed on it.
 */
export type SemanticVersion = {
  readonly major: number
  readonly minor: number
  readonly patch: number
  /** Release-candidate number, or null for a final release */
  readonly prerelease: number | null
  readonly raw: string
}

/**
 * A symbolic install target, resolved against the remote catalog
 */
export type SymbolicTarget = 'latest' | 'stable'

export type ProgressCallback = (progress: {
  stage: string
  message: string
}) => void

export type InstalledVersion = {
  version: SemanticVersion
  /** Store directory holding bin/ and the build-options sidecar */
  path: string
  /** Build options recorded at install time, null when none were recorded */
  config: string[] | null
}

export type BuildResult =
  | { success: true; output: string }
  | { success: false; exitCode: number | null; output: string }

/**
 * Persisted user configuration (~/.rdvm/config.json)
 */
export type RdvmConfig = {
  mirror?: string
  binDir?: string
  make?: string
  buildOptions?: string[]
  updatedAt?: string
}

export type RdvmConfigKey = 'mirror' | 'binDir' | 'make' | 'buildOptions'

/**
 * Configuration after applying environment overrides and defaults
 */
export type Settings = {
  storeDir: string
  tmpDir: string
  logDir: string
  binDir: string
  mirror: string
  make: string
  buildOptions: string[]
}
