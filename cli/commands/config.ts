import { Command } from 'commander'
import chalk from 'chalk'
import {
  ConfigManager,
  CONFIG_KEYS,
  isConfigKey,
} from '../../core/config-manager'
import { ErrorCodes, RdvmError } from '../../core/error-handler'
import { exitWithError } from '../helpers'
import { header, keyValue, uiSuccess } from '../ui/theme'
import type { RdvmConfigKey } from '../../types'

function requireKey(key: string): RdvmConfigKey {
  if (!isConfigKey(key)) {
    throw new RdvmError(
      ErrorCodes.INVALID_CONFIG,
      `Unknown config key "${key}"`,
      'error',
      `Valid keys: ${CONFIG_KEYS.join(', ')}`,
      { key },
    )
  }
  return key
}

export const configCommand = new Command('config')
  .description('Show or change rdvm settings')
  .addCommand(
    new Command('show')
      .description('Show effective settings')
      .option('-j, --json', 'Output as JSON')
      .action(async (options: { json?: boolean }) => {
        try {
          const settings = await new ConfigManager().resolveSettings()
          if (options.json) {
            console.log(JSON.stringify(settings, null, 2))
            return
          }
          console.log(header('rdvm settings'))
          console.log(chalk.gray('  ') + keyValue('Mirror', settings.mirror))
          console.log(
            chalk.gray('  ') + keyValue('Bin directory', settings.binDir),
          )
          console.log(chalk.gray('  ') + keyValue('Store', settings.storeDir))
          console.log(chalk.gray('  ') + keyValue('Make', settings.make))
          console.log(
            chalk.gray('  ') +
              keyValue(
                'Build options',
                settings.buildOptions.join(' ') || chalk.gray('(none)'),
              ),
          )
        } catch (error) {
          exitWithError(error, options.json)
        }
      }),
  )
  .addCommand(
    new Command('set')
      .description('Set a config value (buildOptions takes a quoted list)')
      .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
      .argument('<value>', 'New value')
      .action(async (key: string, value: string) => {
        try {
          await new ConfigManager().set(requireKey(key), value)
          console.log(uiSuccess(`Set ${key}`))
        } catch (error) {
          exitWithError(error)
        }
      }),
  )
  .addCommand(
    new Command('unset')
      .description('Restore the default for a config value')
      .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
      .action(async (key: string) => {
        try {
          await new ConfigManager().unset(requireKey(key))
          console.log(uiSuccess(`Unset ${key}`))
        } catch (error) {
          exitWithError(error)
        }
      }),
  )
