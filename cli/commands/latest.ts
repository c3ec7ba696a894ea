import { Command } from 'commander'
import { createServices, exitWithError } from '../helpers'

async function printLatest(stable: boolean): Promise<void> {
  const { catalog } = await createServices()
  const version = stable ? await catalog.latestStable() : await catalog.latest()
  console.log(version.raw)
}

export const latestCommand = new Command('latest')
  .description('Print the newest version on the release mirror')
  .option('-s, --stable', 'Newest stable (even minor) version instead')
  .action(async (options: { stable?: boolean }) => {
    try {
      await printLatest(options.stable === true)
    } catch (error) {
      exitWithError(error)
    }
  })

export const stableCommand = new Command('stable')
  .description('Print the newest stable version on the release mirror')
  .action(async () => {
    try {
      await printLatest(true)
    } catch (error) {
      exitWithError(error)
    }
  })
