/**
 * Promise-based wrappers around child_process.spawn
 *
 * Arguments are always passed as an array; nothing goes through a shell.
 */

import { spawn } from 'child_process'
import { constants } from 'os'

export type SpawnOptions = {
  cwd?: string
  timeout?: number
  env?: Record<string, string>
}

export type SpawnResult = {
  stdout: string
  stderr: string
}

/**
 * Raised when a command exits non-zero, times out or cannot be started.
 * `exitCode` is null when the process never produced one.
 */
export class SpawnError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stdout: string,
    public readonly stderr: string,
  ) {
    super(message)
    this.name = 'SpawnError'
  }
}

/**
 * Execute a command and collect its output
 *
 * @throws SpawnError if the command fails, times out, or cannot be executed
 */
export function spawnAsync(
  command: string,
  args: string[],
  options?: SpawnOptions,
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      cwd: options?.cwd,
      env: options?.env ? { ...process.env, ...options.env } : undefined,
    })

    let stdout = ''
    let stderr = ''
    let settled = false
    let timer: ReturnType<typeof setTimeout> | undefined

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      if (timer) clearTimeout(timer)
      fn()
    }

    if (options?.timeout && options.timeout > 0) {
      timer = setTimeout(() => {
        proc.kill('SIGKILL')
        settle(() =>
          reject(
            new SpawnError(
              `Command "${command} ${args.join(' ')}" timed out after ${options.timeout}ms`,
              null,
              stdout,
              stderr,
            ),
          ),
        )
      }, options.timeout)
    }

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    proc.on('close', (code) => {
      settle(() => {
        if (code === 0) {
          resolve({ stdout, stderr })
        } else {
          reject(
            new SpawnError(
              `Command "${command} ${args.join(' ')}" failed with code ${code}`,
              code,
              stdout,
              stderr,
            ),
          )
        }
      })
    })

    proc.on('error', (err) => {
      settle(() =>
        reject(
          new SpawnError(
            `Failed to execute "${command}": ${err.message}`,
            null,
            stdout,
            stderr,
          ),
        ),
      )
    })
  })
}

/**
 * Exit status as a shell reports it: the exit code, or 128 + the signal
 * number for a process killed by a signal
 */
export function exitStatus(
  code: number | null,
  signal: NodeJS.Signals | null,
): number {
  if (code !== null) return code
  if (signal) return 128 + constants.signals[signal]
  return 1
}

/**
 * Run a command attached to the current terminal and resolve with its exit code
 */
export function spawnInherit(command: string, args: string[]): Promise<number> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: 'inherit' })
    proc.on('close', (code, signal) => {
      resolve(exitStatus(code, signal))
    })
    proc.on('error', (err) => {
      reject(new Error(`Failed to execute "${command}": ${err.message}`))
    })
  })
}
