import { resolve } from 'node:path'

import {
  createChannelNotifier,
  type JobIdentity,
  type NotificationChannel,
  type Notifier,
  type PipelineLogger,
  type PipelineRun,
  type PipelineStatus,
} from '@shipline/core'

const DELIVERY_SUBJECTS: Readonly<Record<PipelineStatus, string>> = {
  success: '{{job}} #{{build}} delivered',
  unstable: '{{job}} #{{build}} is unstable',
  failure: '{{job}} #{{build}} failed',
}

export interface DeliveryNotifierOptions {
  readonly channel: NotificationChannel
  readonly job: JobIdentity
  /** Run directory the scan report path is relative to. */
  readonly cwd: string
  readonly logger: PipelineLogger
}

/**
 * Mails the run report to the recipients resolved at run start, with the
 * vulnerability report attached when the scan ran.
 */
export const createDeliveryNotifier = (options: DeliveryNotifierOptions): Notifier => {
  return {
    notify: async (run: PipelineRun): Promise<void> => {
      const to = String(run.state.environment.NOTIFY_TO ?? '')
        .split(',')
        .filter((address) => address.length > 0)

      if (to.length === 0) {
        options.logger.info('No recipients selected; skipping notification')
        return
      }

      await createChannelNotifier({
        channel: options.channel,
        to,
        job: options.job,
        subjects: DELIVERY_SUBJECTS,
        attachments: scanReportAttachment(options.cwd),
      }).notify(run)
    },
  }
}

const scanReportAttachment = (cwd: string): ((run: PipelineRun) => readonly string[]) => {
  return (run: PipelineRun): readonly string[] => {
    const reportPath = run.state.environment.REPORT_PATH
    const scanRan = run.stages.some(
      (stage) => stage.id === 'vulnerability-scan' && stage.attempts > 0
    )

    return scanRan && typeof reportPath === 'string' ? [resolve(cwd, reportPath)] : []
  }
}
