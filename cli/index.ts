import { program } from 'commander'
import { createRequire } from 'module'
import { listCommand } from './commands/list'
import { availableCommand } from './commands/available'
import { installCommand } from './commands/install'
import { useCommand } from './commands/use'
import { execCommand } from './commands/exec'
import { binCommand } from './commands/bin'
import { removeCommand } from './commands/remove'
import { latestCommand, stableCommand } from './commands/latest'
import { currentCommand } from './commands/current'
import { configCommand } from './commands/config'

const require = createRequire(import.meta.url)
const pkg = require('../package.json') as { version: string }

export async function run(): Promise<void> {
  program
    .name('rdvm')
    .description('Build, install and switch between Redis versions')
    .version(pkg.version, '-v, --version', 'output the version number')
    // exec forwards everything after the binary name untouched
    .enablePositionalOptions()

  program.addCommand(listCommand)
  program.addCommand(availableCommand)
  program.addCommand(installCommand)
  program.addCommand(useCommand)
  program.addCommand(execCommand)
  program.addCommand(binCommand)
  program.addCommand(removeCommand)
  program.addCommand(latestCommand)
  program.addCommand(stableCommand)
  program.addCommand(currentCommand)
  program.addCommand(configCommand)

  await program.parseAsync()
}
