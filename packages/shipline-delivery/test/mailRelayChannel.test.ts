import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { ok, type HttpAdapter, type HttpRequest } from '@shipline/core'

import { createMailRelayChannel } from '../src/notification/mailRelayChannel.js'
import { createRecordingLogger } from './deliveryFakes.js'

describe('createMailRelayChannel', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'shipline-mail-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  const createHttp = (status: number): { http: HttpAdapter; requests: HttpRequest[] } => {
    const requests: HttpRequest[] = []
    return {
      http: async (request) => {
        requests.push(request)
        return ok({ status, body: '', durationMs: 1 })
      },
      requests,
    }
  }

  it('posts the message with readable attachments inlined', async () => {
    const reportPath = join(directory, 'trivy-report.html')
    const missingPath = join(directory, 'gitleaks-report.sarif')
    await writeFile(reportPath, 'report')
    const { http, requests } = createHttp(202)
    const { logger, lines } = createRecordingLogger()

    await createMailRelayChannel('https://mail.example.com/send', http, logger).send({
      to: ['alice@example.com'],
      subject: 'shop #42 delivered',
      htmlBody: '<p>done</p>',
      attachments: [reportPath, missingPath],
    })

    expect(requests).toHaveLength(1)
    expect(requests[0]).toMatchObject({
      url: 'https://mail.example.com/send',
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      timeoutMs: 30_000,
    })
    expect(JSON.parse(requests[0]?.body ?? '')).toEqual({
      to: ['alice@example.com'],
      subject: 'shop #42 delivered',
      html: '<p>done</p>',
      attachments: [{ filename: 'trivy-report.html', content: 'cmVwb3J0' }],
    })
    expect(lines).toEqual([`warn: Attachment not found, sending without it: ${missingPath}`])
  })

  it('throws for a non-2xx response', async () => {
    const { http } = createHttp(500)
    const { logger } = createRecordingLogger()

    await expect(
      createMailRelayChannel('https://mail.example.com/send', http, logger).send({
        to: ['alice@example.com'],
        subject: 'shop #42 failed',
        htmlBody: '<p>failed</p>',
        attachments: [],
      })
    ).rejects.toThrow('Mail relay responded with status 500')
  })
})
