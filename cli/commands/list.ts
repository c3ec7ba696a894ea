import { Command } from 'commander'
import chalk from 'chalk'
import { createServices, exitWithError } from '../helpers'
import { padToWidth, uiInfo, theme } from '../ui/theme'
import { pickActive } from '../../core/version-parser'

export const listCommand = new Command('list')
  .alias('ls')
  .description('List installed Redis versions')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    try {
      const { store, activation } = await createServices()
      const installed = await store.list()
      const active = pickActive(
        installed.map((entry) => entry.version),
        await activation.current(),
      )

      const rows = installed.map((entry) => ({
        version: entry.version.raw,
        path: entry.path,
        buildOptions: entry.config,
        active: active?.raw === entry.version.raw,
      }))

      if (options.json) {
        console.log(JSON.stringify(rows, null, 2))
        return
      }

      if (rows.length === 0) {
        console.log(
          uiInfo('No versions installed. Install one with: rdvm install stable'),
        )
        return
      }

      console.log()
      console.log(
        chalk.gray('  ') +
          chalk.bold.white('VERSION'.padEnd(14)) +
          chalk.bold.white('STATUS'.padEnd(16)) +
          chalk.bold.white('BUILD OPTIONS'),
      )
      console.log(chalk.gray('  ' + '─'.repeat(50)))

      for (const row of rows) {
        const status = row.active ? theme.active : theme.installed
        const buildOptions =
          row.buildOptions && row.buildOptions.length > 0
            ? row.buildOptions.join(' ')
            : chalk.gray('(default)')
        console.log(
          chalk.gray('  ') +
            theme.version(row.version.padEnd(14)) +
            padToWidth(status, 16) +
            buildOptions,
        )
      }
      console.log()
    } catch (error) {
      exitWithError(error, options.json)
    }
  })
