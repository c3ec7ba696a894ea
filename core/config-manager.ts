import { existsSync } from 'fs'
import { readFile, writeFile, mkdir } from 'fs/promises'
import { dirname } from 'path'
import { paths } from '../config/paths'
import { defaults } from '../config/defaults'
import { ErrorCodes, RdvmError, logWarning, errorMessage } from './error-handler'
import type { RdvmConfig, RdvmConfigKey, Settings } from '../types'

export const CONFIG_KEYS: readonly RdvmConfigKey[] = [
  'mirror',
  'binDir',
  'make',
  'buildOptions',
]

export function isConfigKey(key: string): key is RdvmConfigKey {
  return CONFIG_KEYS.some((k) => k === key)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string')
}

/**
 * Keep only well-typed known keys from parsed JSON
 */
function sanitize(raw: unknown): RdvmConfig {
  const config: RdvmConfig = {}
  if (typeof raw !== 'object' || raw === null) {
    return config
  }
  const record = new Map<string, unknown>(Object.entries(raw))
  const mirror = record.get('mirror')
  const binDir = record.get('binDir')
  const make = record.get('make')
  const buildOptions = record.get('buildOptions')
  const updatedAt = record.get('updatedAt')
  if (typeof mirror === 'string') config.mirror = mirror
  if (typeof binDir === 'string') config.binDir = binDir
  if (typeof make === 'string') config.make = make
  if (isStringArray(buildOptions)) config.buildOptions = buildOptions
  if (typeof updatedAt === 'string') config.updatedAt = updatedAt
  return config
}

export class ConfigManager {
  private config: RdvmConfig | null = null

  constructor(private readonly configPath: string = paths.config) {}

  /**
   * Load config from disk. A missing file yields an empty config; a corrupt
   * one is reset with a warning.
   */
  async load(): Promise<RdvmConfig> {
    if (this.config) {
      return this.config
    }

    if (!existsSync(this.configPath)) {
      this.config = {}
      return this.config
    }

    try {
      const content = await readFile(this.configPath, 'utf8')
      this.config = sanitize(JSON.parse(content))
      return this.config
    } catch (error) {
      logWarning('Config file corrupted, resetting to default', {
        configPath: this.configPath,
        error: errorMessage(error),
      })
      this.config = {}
      await this.save()
      return this.config
    }
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.configPath), { recursive: true })

    if (this.config) {
      this.config.updatedAt = new Date().toISOString()
      await writeFile(this.configPath, JSON.stringify(this.config, null, 2))
    }
  }

  /**
   * Set a key. `buildOptions` takes a whitespace-separated list.
   */
  async set(key: RdvmConfigKey, value: string): Promise<void> {
    const config = await this.load()
    if (key === 'buildOptions') {
      config.buildOptions = value.split(/\s+/).filter(Boolean)
    } else {
      if (value.trim() === '') {
        throw new RdvmError(
          ErrorCodes.INVALID_CONFIG,
          `Config value for "${key}" cannot be empty`,
          'error',
          `Use "rdvm config unset ${key}" to restore the default`,
        )
      }
      config[key] = value
    }
    await this.save()
  }

  async unset(key: RdvmConfigKey): Promise<void> {
    const config = await this.load()
    delete config[key]
    await this.save()
  }

  /**
   * Effective settings: environment, then config file, then defaults
   */
  async resolveSettings(
    env: NodeJS.ProcessEnv = process.env,
  ): Promise<Settings> {
    const config = await this.load()
    return {
      storeDir: paths.versions,
      tmpDir: paths.tmp,
      logDir: paths.logs,
      mirror: env.RDVM_MIRROR || config.mirror || defaults.mirror,
      binDir: env.RDVM_BIN_DIR || config.binDir || defaults.binDir,
      make: env.RDVM_MAKE || config.make || defaults.make,
      buildOptions: config.buildOptions ?? [],
    }
  }
}
