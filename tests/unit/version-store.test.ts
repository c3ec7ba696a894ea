import { describe, it, before, after, beforeEach } from 'node:test'
import assert from 'node:assert/strict'
import { existsSync } from 'fs'
import { mkdir, readdir, readFile, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { VersionStore, CONFIG_FILE } from '../../core/version-store'
import { parseVersion } from '../../core/version-parser'
import { ErrorCodes, RdvmError } from '../../core/error-handler'
import type { SemanticVersion } from '../../types'
import { createTestDir, writeBuildOutput } from '../utils/fixtures'

function version(raw: string): SemanticVersion {
  const parsed = parseVersion(raw)
  assert.ok(parsed)
  return parsed
}

class FailingConfigStore extends VersionStore {
  protected override async writeConfig(): Promise<void> {
    throw new Error('disk full')
  }
}

describe('VersionStore', () => {
  let testDir: string
  let buildDir: string
  let store: VersionStore
  let originalRdvmDir: string | undefined

  before(async () => {
    testDir = await createTestDir('store')
    originalRdvmDir = process.env.RDVM_DIR
    process.env.RDVM_DIR = testDir
  })

  after(async () => {
    if (originalRdvmDir === undefined) {
      delete process.env.RDVM_DIR
    } else {
      process.env.RDVM_DIR = originalRdvmDir
    }
    await rm(testDir, { recursive: true, force: true })
  })

  beforeEach(async () => {
    await rm(join(testDir, 'versions'), { recursive: true, force: true })
    await rm(join(testDir, 'build'), { recursive: true, force: true })
    buildDir = join(testDir, 'build')
    store = new VersionStore(join(testDir, 'versions'))
  })

  describe('place', () => {
    it('should make a version installed with its build options', async () => {
      const v = version('7.2.4')
      await writeBuildOutput(buildDir, '7.2.4')

      assert.equal(await store.has(v), false)
      const target = await store.place(v, buildDir, ['BUILD_TLS=yes', 'V=1'])

      assert.equal(target, join(testDir, 'versions', '7.2.4'))
      assert.equal(await store.has(v), true)
      assert.deepEqual(await store.configOf(v), ['BUILD_TLS=yes', 'V=1'])
      assert.equal(
        await readFile(join(target, CONFIG_FILE), 'utf8'),
        'BUILD_TLS=yes\nV=1\n',
      )
      assert.ok(existsSync(join(target, 'bin', 'redis-cli')))
    })

    it('should record an empty option list as an empty config', async () => {
      const v = version('7.2.4')
      await writeBuildOutput(buildDir, '7.2.4')
      await store.place(v, buildDir, [])
      assert.deepEqual(await store.configOf(v), [])
    })

    it('should replace an existing entry wholesale', async () => {
      const v = version('7.2.4')
      await writeBuildOutput(buildDir, '7.2.4', ['redis-cli', 'redis-benchmark'])
      await store.place(v, buildDir, ['OLD=1'])

      const rebuild = join(testDir, 'build-again')
      await writeBuildOutput(rebuild, '7.2.4', ['redis-cli'])
      await store.place(v, rebuild, ['NEW=1'])
      await rm(rebuild, { recursive: true, force: true })

      assert.deepEqual(await store.configOf(v), ['NEW=1'])
      assert.deepEqual((await readdir(store.binPath(v))).sort(), [
        'redis-cli',
        'redis-server',
      ])
      assert.deepEqual(await readdir(store.root), ['7.2.4'])
    })

    it('should leave nothing behind when placement is interrupted', async () => {
      const failing = new FailingConfigStore(join(testDir, 'versions'))
      const v = version('7.2.4')
      await writeBuildOutput(buildDir, '7.2.4')

      await assert.rejects(failing.place(v, buildDir, []), /disk full/)
      assert.equal(await failing.has(v), false)
      assert.deepEqual(await readdir(failing.root), [])
    })

    it('should keep the previous entry when a replacement is interrupted', async () => {
      const v = version('7.2.4')
      await writeBuildOutput(buildDir, '7.2.4')
      await store.place(v, buildDir, ['OLD=1'])

      const failing = new FailingConfigStore(join(testDir, 'versions'))
      const rebuild = join(testDir, 'build-again')
      await writeBuildOutput(rebuild, '7.2.4')
      await assert.rejects(failing.place(v, rebuild, ['NEW=1']), /disk full/)
      await rm(rebuild, { recursive: true, force: true })

      assert.equal(await store.has(v), true)
      assert.deepEqual(await store.configOf(v), ['OLD=1'])
    })
  })

  describe('has', () => {
    it('should not count a directory without the server binary', async () => {
      const v = version('7.2.4')
      await mkdir(join(store.path(v), 'bin'), { recursive: true })
      assert.equal(await store.has(v), false)
    })
  })

  describe('configOf', () => {
    it('should return null when no options were recorded', async () => {
      const v = version('6.2.14')
      await writeBuildOutput(store.path(v), '6.2.14')
      assert.equal(await store.configOf(v), null)
    })

    it('should return null for a version that is not installed', async () => {
      assert.equal(await store.configOf(version('1.0.0')), null)
    })
  })

  describe('remove', () => {
    it('should delete an installed version', async () => {
      const v = version('7.2.4')
      await writeBuildOutput(buildDir, '7.2.4')
      await store.place(v, buildDir, [])

      await store.remove(v)
      assert.equal(await store.has(v), false)
      assert.equal(existsSync(store.path(v)), false)
    })

    it('should be a no-op for a version that is not installed', async () => {
      await store.remove(version('1.0.0'))
      await store.remove(version('1.0.0'))
      assert.equal(await store.has(version('1.0.0')), false)
    })
  })

  describe('list', () => {
    it('should return an empty list before anything is installed', async () => {
      assert.deepEqual(await store.list(), [])
    })

    it('should list complete entries in version order', async () => {
      for (const raw of ['7.2.4', '6.2.14', '7.0.0-rc1']) {
        const dir = join(testDir, `build-${raw}`)
        await writeBuildOutput(dir, raw)
        await store.place(version(raw), dir, raw === '6.2.14' ? ['V=1'] : [])
        await rm(dir, { recursive: true, force: true })
      }
      // Incomplete entry, leftover staging directory and a stray file
      await mkdir(join(store.root, '5.0.0', 'bin'), { recursive: true })
      await mkdir(join(store.root, '.staging-7.2.5-abc123'), { recursive: true })
      await writeFile(join(store.root, 'notes.txt'), 'hello')

      const installed = await store.list()
      assert.deepEqual(
        installed.map((entry) => entry.version.raw),
        ['6.2.14', '7.0.0-rc1', '7.2.4'],
      )
      assert.deepEqual(installed[0].config, ['V=1'])
      assert.equal(installed[2].path, join(store.root, '7.2.4'))
    })
  })

  describe('requireBinPath', () => {
    it('should return the bin directory of an installed version', async () => {
      const v = version('7.2.4')
      await writeBuildOutput(buildDir, '7.2.4')
      await store.place(v, buildDir, [])
      assert.equal(
        await store.requireBinPath(v),
        join(store.root, '7.2.4', 'bin'),
      )
    })

    it('should fail with NOT_INSTALLED otherwise', async () => {
      await assert.rejects(
        store.requireBinPath(version('7.2.4')),
        (error: unknown) =>
          error instanceof RdvmError &&
          error.code === ErrorCodes.NOT_INSTALLED &&
          error.message === 'Redis 7.2.4 is not installed',
      )
    })
  })
})
