import { Command } from 'commander'
import chalk from 'chalk'
import { createServices, exitWithError } from '../helpers'
import { createSpinner } from '../ui/spinner'
import { padToWidth, theme } from '../ui/theme'
import { isStable, pickActive } from '../../core/version-parser'
import type { SemanticVersion } from '../../types'

export const availableCommand = new Command('available')
  .alias('ls-remote')
  .description('List Redis versions available on the release mirror')
  .option('-s, --stable', 'Only show stable (even minor) releases')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { stable?: boolean; json?: boolean }) => {
    try {
      const { catalog, store, activation } = await createServices()

      const spinner = createSpinner('Fetching release listing...')
      if (!options.json) spinner.start()

      let versions: SemanticVersion[]
      try {
        versions = await catalog.list()
      } catch (error) {
        spinner.fail()
        throw error
      }
      spinner.stop()

      if (options.stable) {
        versions = versions.filter(
          (version) => isStable(version) && version.prerelease === null,
        )
      }

      const installedVersions = (await store.list()).map(
        (entry) => entry.version,
      )
      const installed = new Set(installedVersions.map((version) => version.raw))
      const active = pickActive(installedVersions, await activation.current())

      const rows = versions.map((version) => ({
        version: version.raw,
        stable: isStable(version) && version.prerelease === null,
        installed: installed.has(version.raw),
        active: active?.raw === version.raw,
      }))

      if (options.json) {
        console.log(JSON.stringify(rows, null, 2))
        return
      }

      for (const row of rows) {
        const status = row.active
          ? theme.active
          : row.installed
            ? theme.installed
            : ''
        const version = row.stable
          ? theme.version(row.version)
          : chalk.gray(row.version)
        console.log(`  ${padToWidth(version, 16)}${status}`)
      }
    } catch (error) {
      exitWithError(error, options.json)
    }
  })
