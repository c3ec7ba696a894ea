import { Command } from 'commander'
import { createServices, exitWithError } from '../helpers'

export const currentCommand = new Command('current')
  .description('Print the active Redis version')
  .action(async () => {
    try {
      const { activation } = await createServices()
      const active = await activation.current()
      console.log(active ? active.raw : 'none')
    } catch (error) {
      exitWithError(error)
    }
  })
