/**
 * Error Handler
 *
 * Centralized error types and logging.
 * - Commands print the error with a suggestion and exit non-zero
 * - Every entry is also appended to ~/.rdvm/rdvm.log as JSON lines
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import chalk from 'chalk'
import { paths } from '../config/paths'

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info'

export type RdvmErrorInfo = {
  code: string
  message: string
  severity: ErrorSeverity
  suggestion?: string
  context?: Record<string, unknown>
}

export const ErrorCodes = {
  // Catalog errors
  CATALOG_EMPTY: 'CATALOG_EMPTY',
  FETCH_FAILED: 'FETCH_FAILED',

  // Install errors
  INSTALL_FAILED: 'INSTALL_FAILED',
  NOT_INSTALLED: 'NOT_INSTALLED',
  ACTIVATION_FAILED: 'ACTIVATION_FAILED',

  // Input errors
  INVALID_VERSION: 'INVALID_VERSION',
  INVALID_CONFIG: 'INVALID_CONFIG',

  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const

export class RdvmError extends Error {
  public readonly code: string
  public readonly severity: ErrorSeverity
  public readonly suggestion?: string
  public readonly context?: Record<string, unknown>

  constructor(
    code: string,
    message: string,
    severity: ErrorSeverity = 'error',
    suggestion?: string,
    context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'RdvmError'
    this.code = code
    this.severity = severity
    this.suggestion = suggestion
    this.context = context

    Error.captureStackTrace(this, RdvmError)
  }

  /**
   * Create RdvmError from an unknown error
   */
  static from(
    error: unknown,
    code: string = ErrorCodes.UNKNOWN_ERROR,
    suggestion?: string,
  ): RdvmError {
    if (error instanceof RdvmError) {
      return error
    }

    return new RdvmError(code, errorMessage(error), 'error', suggestion, {
      originalError: error instanceof Error ? error.stack : undefined,
    })
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function appendToLogFile(entry: RdvmErrorInfo): void {
  const logPath = paths.log
  try {
    const logDir = dirname(logPath)
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true })
    }
    const logEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
    }
    appendFileSync(logPath, JSON.stringify(logEntry) + '\n')
  } catch (error) {
    // The log file is best-effort; surface the failure only when debugging
    if (process.env.RDVM_DEBUG) {
      console.error(`rdvm: could not write ${logPath}: ${errorMessage(error)}`)
    }
  }
}

function formatSeverity(severity: ErrorSeverity): string {
  switch (severity) {
    case 'fatal':
      return chalk.red.bold('[FATAL]')
    case 'error':
      return chalk.red('[ERROR]')
    case 'warning':
      return chalk.yellow('[WARN]')
    case 'info':
      return chalk.blue('[INFO]')
  }
}

/**
 * Log an error to console and log file
 */
export function logError(error: RdvmErrorInfo): void {
  const prefix = formatSeverity(error.severity)
  console.error(`${prefix} [${error.code}] ${error.message}`)

  if (error.suggestion) {
    console.error(chalk.yellow(`  Suggestion: ${error.suggestion}`))
  }

  appendToLogFile(error)
}

export function logRdvmError(error: RdvmError): void {
  logError({
    code: error.code,
    message: error.message,
    severity: error.severity,
    suggestion: error.suggestion,
    context: error.context,
  })
}

/**
 * Log a warning (yellow output, non-blocking)
 */
export function logWarning(
  message: string,
  context?: Record<string, unknown>,
): void {
  console.warn(chalk.yellow(`  ⚠ ${message}`))

  appendToLogFile({
    code: 'WARNING',
    message,
    severity: 'warning',
    context,
  })
}

export function logInfo(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'INFO',
    message,
    severity: 'info',
    context,
  })
}

/**
 * Log a debug message (only to file, not console)
 */
export function logDebug(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'DEBUG',
    message,
    severity: 'info',
    context,
  })
}

export function createCatalogEmptyError(indexUrl: string): RdvmError {
  return new RdvmError(
    ErrorCodes.CATALOG_EMPTY,
    `No versions found in the release listing at ${indexUrl}`,
    'error',
    'The listing may have changed format or returned an empty page. Check the mirror with "rdvm config show"',
    { indexUrl },
  )
}

export function createFetchFailedError(url: string, cause: unknown): RdvmError {
  return new RdvmError(
    ErrorCodes.FETCH_FAILED,
    `Failed to fetch ${url}: ${errorMessage(cause)}`,
    'error',
    'Check your network connection and retry',
    { url, cause: errorMessage(cause) },
  )
}

export function createInstallFailedError(
  version: string,
  reason: string,
  context?: Record<string, unknown>,
): RdvmError {
  const logPath =
    typeof context?.logPath === 'string' ? context.logPath : undefined
  return new RdvmError(
    ErrorCodes.INSTALL_FAILED,
    `Failed to install Redis ${version}: ${reason}`,
    'error',
    logPath
      ? `See the build log at ${logPath}, then retry with "rdvm install ${version}"`
      : `Retry with "rdvm install ${version}"`,
    { version, ...context },
  )
}

export function createNotInstalledError(version: string): RdvmError {
  return new RdvmError(
    ErrorCodes.NOT_INSTALLED,
    `Redis ${version} is not installed`,
    'error',
    `Install it with "rdvm install ${version}"`,
    { version },
  )
}

export function createActivationFailedError(
  version: string,
  binDir: string,
  cause: unknown,
): RdvmError {
  return new RdvmError(
    ErrorCodes.ACTIVATION_FAILED,
    `Failed to activate Redis ${version} in ${binDir}: ${errorMessage(cause)}`,
    'error',
    'Make sure the bin directory is writable, or point RDVM_BIN_DIR at one that is',
    { version, binDir },
  )
}

export function createInvalidVersionError(input: string): RdvmError {
  return new RdvmError(
    ErrorCodes.INVALID_VERSION,
    `Invalid version "${input}"`,
    'error',
    'Use a version like 7.2.4 or 7.0.0-rc2, or one of "latest" and "stable"',
    { input },
  )
}
