import { homedir } from 'os'
import { join } from 'path'

/**
 * Get the rdvm home directory. RDVM_DIR wins over ~/.rdvm.
 *
 * Read on every access so a changed environment (tests, wrappers) is honoured.
 */
function getRdvmHome(): string {
  return process.env.RDVM_DIR || join(homedir(), '.rdvm')
}

export const paths = {
  // Root directory for all rdvm data
  get root(): string {
    return getRdvmHome()
  },

  // One subdirectory per installed version
  get versions(): string {
    return join(getRdvmHome(), 'versions')
  },

  // Per-invocation work directories (archive, sources, install prefix)
  get tmp(): string {
    return join(getRdvmHome(), 'tmp')
  },

  // Build logs kept after a failed build
  get logs(): string {
    return join(getRdvmHome(), 'logs')
  },

  get config(): string {
    return join(getRdvmHome(), 'config.json')
  },

  get log(): string {
    return join(getRdvmHome(), 'rdvm.log')
  },
}
