import type { ArtifactLink } from '../contracts/artifacts.js'
import type { NotificationChannel, Notifier } from '../contracts/notifier.js'
import type { PipelineRun, PipelineStatus } from '../contracts/run.js'
import {
  buildRunReport,
  renderRunReportHtml,
  renderSubject,
  type JobIdentity,
} from './runReport.js'

const DEFAULT_SUBJECT = '{{job}}: {{status}}'

/**
 * Options for a notifier backed by a notification channel.
 */
export interface ChannelNotifierOptions {
  readonly channel: NotificationChannel
  /** Recipient addresses. */
  readonly to: readonly string[]
  readonly job: JobIdentity
  /** Subject templates per terminal status. */
  readonly subjects?: Partial<Record<PipelineStatus, string>>
  /** Files attached to the message, computed from the final run. */
  readonly attachments?: (run: PipelineRun) => readonly string[]
  /** Links added to the report besides stage artifacts. */
  readonly links?: readonly ArtifactLink[]
}

/**
 * Creates a notifier that sends one HTML report per run through a channel.
 *
 * @param options Notifier options.
 */
export const createChannelNotifier = (options: ChannelNotifierOptions): Notifier => {
  return {
    notify: async (run: PipelineRun): Promise<void> => {
      const report = buildRunReport(run, options.job, options.links)
      const template = options.subjects?.[run.status] ?? DEFAULT_SUBJECT

      await options.channel.send({
        to: options.to,
        subject: renderSubject(template, report),
        htmlBody: renderRunReportHtml(report),
        attachments: options.attachments?.(run) ?? [],
      })
    },
  }
}

/**
 * Creates a notifier that does nothing.
 */
export const createNoopNotifier = (): Notifier => {
  return {
    notify: (): void => undefined,
  }
}
