/**
 * Source build toolchain
 *
 * Redis builds with a plain Makefile: `make [OPTIONS...] PREFIX=<dir> install`
 * compiles the tree and copies the binaries into <dir>/bin.
 */

import { spawnAsync, SpawnError } from './spawn-utils'
import { logDebug } from './error-handler'
import type { BuildResult } from '../types'

export interface BuildToolchain {
  /**
   * Build the extracted source tree and install it under `installPrefix`.
   * `options` are passed through untouched.
   */
  build(
    sourceDir: string,
    installPrefix: string,
    options: string[],
  ): Promise<BuildResult>
}

export class MakeToolchain implements BuildToolchain {
  constructor(private readonly command: string = 'make') {}

  async build(
    sourceDir: string,
    installPrefix: string,
    options: string[],
  ): Promise<BuildResult> {
    const args = [...options, `PREFIX=${installPrefix}`, 'install']
    logDebug('Running build', { command: this.command, args, sourceDir })

    try {
      const { stdout, stderr } = await spawnAsync(this.command, args, {
        cwd: sourceDir,
      })
      return { success: true, output: stdout + stderr }
    } catch (error) {
      if (error instanceof SpawnError) {
        return {
          success: false,
          exitCode: error.exitCode,
          output: [error.message, error.stdout, error.stderr]
            .filter(Boolean)
            .join('\n'),
        }
      }
      throw error
    }
  }
}
