/**
 * Unit tests for the make-based build toolchain, using shell scripts in
 * place of make
 */

import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import { chmod, mkdir, readFile, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { MakeToolchain } from '../../core/build-toolchain'
import { createTestDir } from '../utils/fixtures'

async function writeScript(path: string, body: string): Promise<string> {
  await writeFile(path, `#!/bin/sh\n${body}\n`)
  await chmod(path, 0o755)
  return path
}

describe('MakeToolchain', () => {
  let testDir: string
  let sourceDir: string
  let prefix: string
  let originalRdvmDir: string | undefined

  before(async () => {
    testDir = await createTestDir('toolchain')
    originalRdvmDir = process.env.RDVM_DIR
    process.env.RDVM_DIR = testDir
    sourceDir = join(testDir, 'src')
    prefix = join(testDir, 'prefix')
    await mkdir(sourceDir, { recursive: true })
  })

  after(async () => {
    if (originalRdvmDir === undefined) {
      delete process.env.RDVM_DIR
    } else {
      process.env.RDVM_DIR = originalRdvmDir
    }
    await rm(testDir, { recursive: true, force: true })
  })

  it('should pass options, then the prefix, then the install target', async () => {
    const make = await writeScript(
      join(testDir, 'make-ok'),
      `printf '%s\\n' "$@" > args.txt\necho built`,
    )
    const toolchain = new MakeToolchain(make)

    const result = await toolchain.build(sourceDir, prefix, [
      'BUILD_TLS=yes',
      'MALLOC=libc',
    ])

    assert.deepEqual(result, { success: true, output: 'built\n' })
    // The script runs inside the source tree
    assert.equal(
      await readFile(join(sourceDir, 'args.txt'), 'utf8'),
      `BUILD_TLS=yes\nMALLOC=libc\nPREFIX=${prefix}\ninstall\n`,
    )
  })

  it('should report a failing build with its exit code and output', async () => {
    const make = await writeScript(
      join(testDir, 'make-fail'),
      'echo "server.c: error" >&2\nexit 2',
    )
    const toolchain = new MakeToolchain(make)

    const result = await toolchain.build(sourceDir, prefix, [])

    assert.deepEqual(result, {
      success: false,
      exitCode: 2,
      output: `Command "${make} PREFIX=${prefix} install" failed with code 2\nserver.c: error\n`,
    })
  })

  it('should report a missing build command without an exit code', async () => {
    const toolchain = new MakeToolchain(join(testDir, 'no-such-make'))

    const result = await toolchain.build(sourceDir, prefix, [])

    assert.equal(result.success, false)
    if (!result.success) {
      assert.equal(result.exitCode, null)
      assert.match(result.output, /^Failed to execute /)
    }
  })
})
