/**
 * Install Command
 *
 * Usage:
 *   rdvm install stable                      # newest even-minor release
 *   rdvm install 7.2.4 BUILD_TLS=yes -j8     # extra make options
 *   rdvm install --json 7.2.4                # flags go before the target
 *   rdvm install --archive ./redis-7.2.4.tar.gz
 *   rdvm install --archive ./patched.tgz --as 7.2.4
 *   rdvm install --archive ./redis.tgz -- -j8
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { createServices, exitWithError } from '../helpers'
import { createSpinner, spinnerProgress } from '../ui/spinner'
import { keyValue, uiWarning } from '../ui/theme'
import { logRdvmError } from '../../core/error-handler'
import type { InstallResult } from '../../core/installer'

export type InstallOptions = {
  archive?: string
  as?: string
  json?: boolean
}

export type InstallRequest = {
  target: string
  buildArgs: string[]
  options: InstallOptions
}

/**
 * Options after the target pass through to make untouched, including ones
 * that start with "-". Without a target (--archive) put them after "--".
 */
export function createInstallCommand(
  handler: (request: InstallRequest) => Promise<void>,
): Command {
  return new Command('install')
    .alias('i')
    .description('Build and activate a Redis version')
    .argument('[target]', 'Version, "latest" or "stable" (default: "stable")')
    .argument('[options...]', 'Options passed to make (e.g. BUILD_TLS=yes -j8)')
    .option('-a, --archive <file>', 'Build from a local source tarball')
    .option('--as <version>', 'Version name for --archive')
    .option('--json', 'Output result as JSON')
    .passThroughOptions()
    .action(
      async (
        target: string | undefined,
        buildArgs: string[] | undefined,
        options: InstallOptions,
      ) => {
        const rest = buildArgs ?? []
        // --archive takes no target, so the first operand is a make option
        if (options.archive) {
          await handler({
            target: options.archive,
            buildArgs: target === undefined ? rest : [target, ...rest],
            options,
          })
          return
        }
        await handler({ target: target ?? 'stable', buildArgs: rest, options })
      },
    )
}

async function runInstall({
  target,
  buildArgs,
  options,
}: InstallRequest): Promise<void> {
  try {
    const { installer, settings } = await createServices()
    // Arguments after the target replace the configured defaults
    const buildOptions =
      buildArgs.length > 0 ? buildArgs : settings.buildOptions

    const spinner = createSpinner(`Installing ${target}...`)
    if (!options.json) spinner.start()
    const onProgress = spinnerProgress(spinner)

    let result: InstallResult
    try {
      result = options.archive
        ? await installer.installArchive(
            options.archive,
            buildOptions,
            options.as,
            onProgress,
          )
        : await installer.install(target, buildOptions, onProgress)
    } catch (error) {
      spinner.fail()
      throw error
    }

    const { version } = result
    if (options.json) {
      spinner.stop()
    } else if (result.activated) {
      spinner.succeed(
        result.built
          ? `Installed and activated Redis ${version.raw}`
          : `Redis ${version.raw} was already installed, activated it`,
      )
    } else {
      spinner.warn(`Installed Redis ${version.raw}`)
    }

    if (options.json) {
      console.log(
        JSON.stringify({
          version: version.raw,
          built: result.built,
          activated: result.activated,
          buildOptions,
          error: result.activationError?.message,
        }),
      )
    } else if (buildOptions.length > 0 && result.built) {
      console.log(
        chalk.gray('  ') + keyValue('Build options', buildOptions.join(' ')),
      )
    }

    if (result.activationError) {
      if (!options.json) {
        console.log(uiWarning('The version is installed but not active'))
        logRdvmError(result.activationError)
      }
      process.exit(1)
    }
  } catch (error) {
    exitWithError(error, options.json)
  }
}

export const installCommand = createInstallCommand(runInstall)
