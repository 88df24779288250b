import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'

import {
  ToolFailure,
  type HttpAdapter,
  type NotificationChannel,
  type NotificationMessage,
  type PipelineLogger,
} from '@shipline/core'

import { isMissingFileError } from '../checks/dockerfileCheck.js'

interface MailAttachment {
  readonly filename: string
  /** Base64 file content. */
  readonly content: string
}

/**
 * Creates a channel that hands messages to an HTTP mail relay.
 *
 * Attachments are read from disk and sent inline; missing files are left out with a warning.
 *
 * @param relayUrl Relay endpoint accepting `{ to, subject, html, attachments }` as JSON.
 * @param http HTTP adapter.
 * @param logger Logger for skipped attachments.
 * @throws From `send`: the adapter error, or a ToolFailure for a non-2xx response.
 */
export const createMailRelayChannel = (
  relayUrl: string,
  http: HttpAdapter,
  logger: PipelineLogger
): NotificationChannel => {
  return {
    send: async (message: NotificationMessage): Promise<void> => {
      const attachments: MailAttachment[] = []
      for (const path of message.attachments) {
        const attachment = await readAttachment(path)
        if (attachment) {
          attachments.push(attachment)
        } else {
          logger.warn(`Attachment not found, sending without it: ${path}`)
        }
      }

      const result = await http({
        url: relayUrl,
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          to: message.to,
          subject: message.subject,
          html: message.htmlBody,
          attachments,
        }),
        timeoutMs: 30_000,
      })

      if (!result.ok) {
        throw result.error
      }

      if (result.value.status < 200 || result.value.status >= 300) {
        throw new ToolFailure(`Mail relay responded with status ${result.value.status}`)
      }
    },
  }
}

const readAttachment = async (path: string): Promise<MailAttachment | null> => {
  try {
    const content = await readFile(path)
    return { filename: basename(path), content: content.toString('base64') }
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return null
    }
    throw error
  }
}
