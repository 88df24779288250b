import type { PipelineRun } from './run.js'

/**
 * Outgoing notification payload.
 */
export interface NotificationMessage {
  readonly to: readonly string[]
  readonly subject: string
  readonly htmlBody: string
  /** Local file paths attached to the message. */
  readonly attachments: readonly string[]
}

/**
 * Transport that delivers notification messages.
 */
export interface NotificationChannel {
  send(message: NotificationMessage): Promise<void>
}

/**
 * Dispatches the final report of a run.
 */
export interface Notifier {
  notify(run: PipelineRun): Promise<void> | void
}
