import chalk from 'chalk'

/**
 * Color theme for the rdvm CLI
 */
export const theme = {
  version: chalk.yellow,
  path: chalk.gray,

  // Status badges
  active: chalk.green.bold('● active'),
  installed: chalk.blue('◐ installed'),

  icons: {
    success: chalk.green('✔'),
    warning: chalk.yellow('⚠'),
    info: chalk.blue('ℹ'),
  },
}

/**
 * Format a header box
 */
export function header(text: string): string {
  const line = '─'.repeat(text.length + 4)
  return `
${chalk.cyan('┌' + line + '┐')}
${chalk.cyan('│')}  ${chalk.bold(text)}  ${chalk.cyan('│')}
${chalk.cyan('└' + line + '┘')}
`.trim()
}

export function uiSuccess(message: string): string {
  return `${theme.icons.success} ${message}`
}

export function uiWarning(message: string): string {
  return `${theme.icons.warning} ${chalk.yellow(message)}`
}

export function uiInfo(message: string): string {
  return `${theme.icons.info} ${message}`
}

export function keyValue(key: string, value: string): string {
  return `${chalk.gray(key + ':')} ${value}`
}

/**
 * Strip ANSI escape codes to get the visible string length
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '')
}

/**
 * Pad a string (accounting for ANSI codes) to a visible width
 */
export function padToWidth(str: string, width: number): string {
  const padding = Math.max(0, width - stripAnsi(str).length)
  return str + ' '.repeat(padding)
}
