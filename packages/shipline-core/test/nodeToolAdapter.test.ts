import { describe, expect, it } from 'vitest'

import { createNodeToolAdapter, LaunchFailure } from '../src/index.js'

const nodeCommand = (script: string): string => {
  return `${JSON.stringify(process.execPath)} -e ${JSON.stringify(script)}`
}

describe('createNodeToolAdapter', () => {
  const adapter = createNodeToolAdapter()

  it('captures output and a nonzero exit code as a normal result', async () => {
    const result = await adapter({
      command: nodeCommand("process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"),
      cwd: process.cwd(),
      env: {},
    })

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.exitCode).toBe(3)
      expect(result.value.stdout).toBe('out')
      expect(result.value.stderr).toBe('err')
      expect(result.value.signal).toBeNull()
    }
  })

  it('merges the request environment over the process environment', async () => {
    const result = await adapter({
      command: nodeCommand('process.stdout.write(process.env.SHIPLINE_TEST_VALUE ?? "")'),
      cwd: process.cwd(),
      env: { SHIPLINE_TEST_VALUE: 'from-request' },
    })

    expect(result.ok && result.value.stdout).toBe('from-request')
  })

  it('reports a missing command as a launch failure', async () => {
    const result = await adapter({
      command: 'shipline-missing-command-for-test',
      cwd: process.cwd(),
      env: {},
    })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(LaunchFailure)
      expect(result.error.message).toBe('Command not found: shipline-missing-command-for-test')
    }
  })

  it('reports a timeout as a launch failure', async () => {
    const result = await adapter({
      command: nodeCommand('setTimeout(() => undefined, 2000)'),
      cwd: process.cwd(),
      env: {},
      timeoutMs: 100,
    })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toMatch(/^Command timed out after 100ms: /)
    }
  })

  it('stops every process of a compound command on timeout', async () => {
    const startedAt = Date.now()
    const result = await adapter({
      command: `true && ${nodeCommand('setTimeout(() => undefined, 4000)')} && echo done`,
      cwd: process.cwd(),
      env: {},
      timeoutMs: 200,
    })

    expect(Date.now() - startedAt).toBeLessThan(2000)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toMatch(/^Command timed out after 200ms: true && /)
    }
  })
})
