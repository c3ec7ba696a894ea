/**
 * Shared test fixtures: temp directories, fake server binaries, source
 * tarballs and in-process stand-ins for the fetch and build collaborators.
 */

import { createReadStream, existsSync } from 'fs'
import { chmod, mkdir, mkdtemp, readFile, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import type { Readable } from 'stream'
import { c as createTar } from 'tar'
import type { Fetcher } from '../../core/fetcher'
import type { BuildToolchain } from '../../core/build-toolchain'
import { createFetchFailedError } from '../../core/error-handler'
import type { BuildResult } from '../../types'

export const MIRROR = 'https://mirror.test/releases'
export const INDEX_URL = `${MIRROR}/`

export async function createTestDir(name: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `rdvm-${name}-`))
}

/**
 * Write an executable shell script that answers --version like redis-server
 */
export async function writeFakeServer(
  path: string,
  version: string,
): Promise<void> {
  await writeFile(
    path,
    `#!/bin/sh\necho "Redis server v=${version} sha=00000000:0 malloc=libc bits=64 build=0"\n`,
  )
  await chmod(path, 0o755)
}

/**
 * Create a build output tree (<dir>/bin/...) as `make install` would
 */
export async function writeBuildOutput(
  dir: string,
  version: string,
  extraBinaries: string[] = ['redis-cli'],
): Promise<void> {
  const binDir = join(dir, 'bin')
  await mkdir(binDir, { recursive: true })
  await writeFakeServer(join(binDir, 'redis-server'), version)
  for (const name of extraBinaries) {
    await writeFile(join(binDir, name), `#!/bin/sh\necho ${name}\n`)
    await chmod(join(binDir, name), 0o755)
  }
}

/**
 * Create redis-<version>.tar.gz in `dir`, wrapping its files in a
 * redis-<version>/ directory like the published source tarballs
 */
export async function createSourceTarball(
  dir: string,
  version: string,
  fileName = `redis-${version}.tar.gz`,
): Promise<string> {
  const topLevel = `redis-${version}`
  await mkdir(join(dir, topLevel, 'src'), { recursive: true })
  await writeFile(join(dir, topLevel, 'VERSION'), version)
  await writeFile(join(dir, topLevel, 'Makefile'), 'all:\n\techo build\n')
  await writeFile(join(dir, topLevel, 'src', 'server.c'), 'int main(void) {}\n')

  const file = join(dir, fileName)
  await createTar({ gzip: true, file, cwd: dir }, [topLevel])
  return file
}

/**
 * Serves a fixed listing and a set of local files keyed by URL
 */
export class FakeFetcher implements Fetcher {
  textRequests = 0
  streamRequests: string[] = []

  constructor(
    private readonly listing: string,
    private readonly archives: Map<string, string> = new Map(),
  ) {}

  async fetchText(url: string): Promise<string> {
    this.textRequests++
    if (url !== INDEX_URL) {
      throw createFetchFailedError(url, 'HTTP 404 Not Found')
    }
    return this.listing
  }

  async fetchStream(url: string): Promise<Readable> {
    this.streamRequests.push(url)
    const file = this.archives.get(url)
    if (!file) {
      throw createFetchFailedError(url, 'HTTP 404 Not Found')
    }
    return createReadStream(file)
  }
}

export type ToolchainCall = {
  sourceDir: string
  installPrefix: string
  options: string[]
}

/**
 * Stands in for make: installs a fake redis-server reporting the version
 * found in the extracted tree's VERSION file
 */
export class FakeToolchain implements BuildToolchain {
  calls: ToolchainCall[] = []

  constructor(private readonly fail = false) {}

  async build(
    sourceDir: string,
    installPrefix: string,
    options: string[],
  ): Promise<BuildResult> {
    this.calls.push({ sourceDir, installPrefix, options })

    if (this.fail) {
      return {
        success: false,
        exitCode: 2,
        output: 'server.c:1: error: expected declaration\nmake: *** [all] Error 2\n',
      }
    }

    const versionFile = join(sourceDir, 'VERSION')
    if (!existsSync(versionFile)) {
      return { success: false, exitCode: 2, output: 'no VERSION file\n' }
    }
    const version = (await readFile(versionFile, 'utf8')).trim()
    await writeBuildOutput(installPrefix, version)
    return { success: true, output: 'build ok\n' }
  }
}
