/**
 * Exec Command
 *
 * Run a binary of an installed version without changing the active one.
 *
 * Usage:
 *   rdvm exec 7.2.4 redis-server --port 7000
 *   rdvm exec 6.2.14 redis-cli -p 7000 ping
 */

import { Command } from 'commander'
import { existsSync } from 'fs'
import { join } from 'path'
import { createServices, exitWithError, requireVersion } from '../helpers'
import { spawnInherit } from '../../core/spawn-utils'
import { ErrorCodes, RdvmError } from '../../core/error-handler'

export const execCommand = new Command('exec')
  .description('Run a binary from an installed version')
  .argument('<version>', 'Installed version')
  .argument('[binary]', 'Binary to run', 'redis-server')
  .argument('[args...]', 'Arguments for the binary')
  .passThroughOptions()
  .action(async (input: string, binary: string, args?: string[]) => {
    try {
      const version = requireVersion(input)
      const { store } = await createServices()
      const binPath = await store.requireBinPath(version)

      const executable = join(binPath, binary)
      if (binary.includes('/') || !existsSync(executable)) {
        throw new RdvmError(
          ErrorCodes.NOT_INSTALLED,
          `Redis ${version.raw} has no binary named "${binary}"`,
          'error',
          `Run "ls ${binPath}" to see the available binaries`,
          { version: version.raw, binary },
        )
      }

      process.exitCode = await spawnInherit(executable, args ?? [])
    } catch (error) {
      exitWithError(error)
    }
  })
