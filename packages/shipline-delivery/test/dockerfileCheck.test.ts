import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { checkDockerfile, checkDockerfileContent } from '../src/checks/dockerfileCheck.js'

describe('checkDockerfileContent', () => {
  it('returns the last declared user', () => {
    const result = checkDockerfileContent(
      [
        'FROM maven:3-eclipse-temurin-17 AS build',
        'USER root',
        'FROM eclipse-temurin:17-jre',
        'USER app:app',
      ].join('\n')
    )

    expect(result).toEqual({ ok: true, value: { user: 'app:app' } })
  })

  it('rejects scratch base images', () => {
    const result = checkDockerfileContent('from scratch\nUSER 1000\n')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Dockerfile uses FROM scratch; use a maintained base image')
    }
  })

  it('rejects a missing USER', () => {
    const result = checkDockerfileContent('FROM eclipse-temurin:17-jre\nEXPOSE 8080\n')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Dockerfile does not define a USER; the container would run as root'
      )
    }
  })

  it.each(['USER root', 'USER 0:0'])('rejects %s', (line) => {
    const result = checkDockerfileContent(`FROM eclipse-temurin:17-jre\n${line}\n`)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Dockerfile sets USER to root; define a non-root user')
    }
  })
})

describe('checkDockerfile', () => {
  const createdDirectories: string[] = []

  afterEach(async () => {
    await Promise.all(
      createdDirectories.splice(0).map(async (directory) => {
        await rm(directory, { recursive: true, force: true })
      })
    )
  })

  it('reads the file from disk', async () => {
    const directory = await mkdtemp(join(tmpdir(), 'shipline-dockerfile-'))
    createdDirectories.push(directory)
    await writeFile(join(directory, 'Dockerfile'), 'FROM eclipse-temurin:17-jre\nUSER app\n')

    await expect(checkDockerfile(join(directory, 'Dockerfile'))).resolves.toEqual({
      ok: true,
      value: { user: 'app' },
    })
  })

  it('reports a missing file', async () => {
    const directory = await mkdtemp(join(tmpdir(), 'shipline-dockerfile-'))
    createdDirectories.push(directory)
    const path = join(directory, 'Dockerfile')

    const result = await checkDockerfile(path)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(`Dockerfile not found: ${path}`)
    }
  })
})
