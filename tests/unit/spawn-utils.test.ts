import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { exitStatus, spawnAsync, spawnInherit, SpawnError } from '../../core/spawn-utils'

describe('exitStatus', () => {
  it('should return the exit code when there is one', () => {
    assert.equal(exitStatus(0, null), 0)
    assert.equal(exitStatus(3, null), 3)
  })

  it('should add the signal number to 128', () => {
    assert.equal(exitStatus(null, 'SIGINT'), 130)
    assert.equal(exitStatus(null, 'SIGKILL'), 137)
    assert.equal(exitStatus(null, 'SIGTERM'), 143)
  })

  it('should report 1 when neither is known', () => {
    assert.equal(exitStatus(null, null), 1)
  })
})

describe('spawnInherit', () => {
  it('should forward the exit code', async () => {
    assert.equal(await spawnInherit('/bin/sh', ['-c', 'exit 3']), 3)
  })

  it('should report a signal death as 128 + signal number', async () => {
    assert.equal(await spawnInherit('/bin/sh', ['-c', 'kill -TERM $$']), 143)
  })

  it('should reject when the command cannot be started', async () => {
    await assert.rejects(
      spawnInherit('/nonexistent/redis-server', []),
      /^Error: Failed to execute "\/nonexistent\/redis-server"/,
    )
  })
})

describe('spawnAsync', () => {
  it('should collect stdout and stderr', async () => {
    const result = await spawnAsync('/bin/sh', ['-c', 'echo out; echo err >&2'])
    assert.deepEqual(result, { stdout: 'out\n', stderr: 'err\n' })
  })

  it('should reject with the exit code on failure', async () => {
    await assert.rejects(
      spawnAsync('/bin/sh', ['-c', 'echo partial; exit 4']),
      (error: unknown) => {
        assert.ok(error instanceof SpawnError)
        assert.equal(error.exitCode, 4)
        assert.equal(error.stdout, 'partial\n')
        return true
      },
    )
  })

  it('should reject without an exit code on timeout', async () => {
    await assert.rejects(
      spawnAsync('/bin/sh', ['-c', 'sleep 5'], { timeout: 50 }),
      (error: unknown) => {
        assert.ok(error instanceof SpawnError)
        assert.equal(error.exitCode, null)
        assert.match(error.message, /timed out after 50ms$/)
        return true
      },
    )
  })
})
