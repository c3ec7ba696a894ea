import { Command } from 'commander'
import { createServices, exitWithError, requireVersion } from '../helpers'
import { uiSuccess, uiInfo, uiWarning, theme } from '../ui/theme'

export const removeCommand = new Command('remove')
  .alias('rm')
  .description('Remove one or more installed versions')
  .argument('<versions...>', 'Versions to remove')
  .option('-j, --json', 'Output result as JSON')
  .action(async (inputs: string[], options: { json?: boolean }) => {
    try {
      // Validate everything before touching the store
      const versions = inputs.map(requireVersion)
      const { store, activation } = await createServices()
      const removed: string[] = []

      for (const version of versions) {
        if (!(await store.has(version))) {
          // Removal is repeatable; a missing version is not an error
          await store.remove(version)
          if (!options.json) {
            console.log(uiInfo(`Redis ${version.raw} is not installed`))
          }
          continue
        }

        const unlinked = await activation.deactivate(version)
        await store.remove(version)
        removed.push(version.raw)

        if (!options.json) {
          console.log(uiSuccess(`Removed Redis ${theme.version(version.raw)}`))
          if (unlinked > 0) {
            console.log(
              uiWarning(
                `It was the active version; no Redis is linked in ${activation.binDir} now`,
              ),
            )
          }
        }
      }

      if (options.json) {
        console.log(JSON.stringify({ success: true, removed }))
      }
    } catch (error) {
      exitWithError(error, options.json)
    }
  })
