import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { loadDeliverySettings, parseDeliverySettings } from '../src/settings/loadDeliverySettings.js'

const minimal = {
  repositoryUrl: 'https://git.example.com/acme/shop.git',
  imageRepository: 'acme/shop',
  staticAnalysis: { organization: 'acme', projectKey: 'acme_shop' },
  reportBucket: 's3://acme-reports',
}

describe('loadDeliverySettings', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'shipline-settings-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('loads the default settings file', async () => {
    await writeFile(
      join(directory, 'delivery.settings.json'),
      JSON.stringify({
        ...minimal,
        credentialsRef: 'GIT_TOKEN',
        projectDir: 'app',
        recipients: { alice: 'alice@example.com' },
        downstream: { baseUrl: 'https://ci.example.com', jobName: 'shop-deploy' },
        healthCheck: { attempts: 5, warmupMs: 0 },
      })
    )

    await expect(loadDeliverySettings(directory)).resolves.toEqual({
      repositoryUrl: 'https://git.example.com/acme/shop.git',
      credentialsRef: 'GIT_TOKEN',
      projectDir: 'app',
      dockerfile: undefined,
      imageRepository: 'acme/shop',
      staticAnalysis: { organization: 'acme', projectKey: 'acme_shop', hostUrl: undefined },
      reportBucket: 's3://acme-reports',
      trivyCacheDir: undefined,
      recipients: { alice: 'alice@example.com' },
      mailRelayUrl: undefined,
      downstream: { baseUrl: 'https://ci.example.com', jobName: 'shop-deploy' },
      healthCheck: { host: undefined, attempts: 5, intervalMs: undefined, warmupMs: 0 },
    })
  })

  it('reports a missing file', async () => {
    await expect(loadDeliverySettings(directory, 'ci/delivery.json')).rejects.toThrow(
      `Settings file not found: ${resolve(directory, 'ci/delivery.json')}`
    )
  })

  it('reports invalid JSON', async () => {
    await writeFile(join(directory, 'delivery.settings.json'), '{ "repositoryUrl": ')

    await expect(loadDeliverySettings(directory)).rejects.toThrow(
      `Settings file ${resolve(directory, 'delivery.settings.json')} is not valid JSON`
    )
  })
})

const invalidSettings: [unknown, string][] = [
  [[], 'Settings must be an object'],
  [{ ...minimal, repositoryUrl: '' }, 'repositoryUrl must be a non-empty string'],
  [{ ...minimal, credentialsRef: 'git-token' }, 'credentialsRef must be an environment variable name'],
  [{ ...minimal, staticAnalysis: 'acme' }, 'staticAnalysis must be an object'],
  [
    { ...minimal, staticAnalysis: { organization: 'acme' } },
    'staticAnalysis.projectKey must be a non-empty string',
  ],
  [{ ...minimal, recipients: { alice: 7 } }, 'recipients.alice must be a non-empty string'],
  [{ ...minimal, healthCheck: { attempts: 0 } }, 'healthCheck.attempts must be a positive integer'],
  [
    { ...minimal, healthCheck: { intervalMs: -1 } },
    'healthCheck.intervalMs must be a non-negative number',
  ],
]

describe('parseDeliverySettings', () => {
  it('applies defaults', () => {
    expect(parseDeliverySettings(minimal)).toMatchObject({ projectDir: '.', recipients: {} })
  })

  it.each(invalidSettings)('rejects invalid settings (%#)', (value, message) => {
    expect(() => parseDeliverySettings(value)).toThrow(message)
  })
})
