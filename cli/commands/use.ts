import { Command } from 'commander'
import { createServices, exitWithError, requireVersion } from '../helpers'
import { uiSuccess, uiInfo, theme } from '../ui/theme'

export const useCommand = new Command('use')
  .description('Switch the active Redis version')
  .argument('<version>', 'Installed version to activate')
  .action(async (input: string) => {
    try {
      const version = requireVersion(input)
      const { activation } = await createServices()

      const changed = await activation.activate(version)
      if (changed) {
        console.log(
          uiSuccess(
            `Now using Redis ${theme.version(version.raw)} from ${theme.path(activation.binDir)}`,
          ),
        )
      } else {
        console.log(
          uiInfo(`Redis ${theme.version(version.raw)} is already active`),
        )
      }
    } catch (error) {
      exitWithError(error)
    }
  })
