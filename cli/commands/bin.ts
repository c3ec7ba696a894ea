import { Command } from 'commander'
import { createServices, exitWithError, requireVersion } from '../helpers'

/**
 * Print the bin directory of an installed version, for use in $(...)
 */
export const binCommand = new Command('bin')
  .description('Print the bin directory of an installed version')
  .argument('<version>', 'Installed version')
  .action(async (input: string) => {
    try {
      const version = requireVersion(input)
      const { store } = await createServices()
      console.log(await store.requireBinPath(version))
    } catch (error) {
      exitWithError(error)
    }
  })
