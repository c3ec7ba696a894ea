import ora, { type Ora } from 'ora'
import type { ProgressCallback } from '../../types'

/**
 * Create a spinner with consistent styling
 */
export function createSpinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  })
}

/**
 * Progress callback that mirrors each stage onto a spinner
 */
export function spinnerProgress(spinner: Ora): ProgressCallback {
  return ({ message }) => {
    spinner.text = message
  }
}
