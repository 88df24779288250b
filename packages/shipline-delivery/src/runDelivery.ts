import {
  createFetchHttpAdapter,
  createNodeToolAdapter,
  createPipelineRunner,
  createSilentLogger,
  type HttpAdapter,
  type JobIdentity,
  type NotificationChannel,
  type PipelineLogger,
  type PipelineReporter,
  type PipelineRun,
  type Sleep,
  type ToolAdapter,
} from '@shipline/core'

import type { CollaboratorFactory } from './collaborators/contracts.js'
import { createShellCollaborators } from './collaborators/shellCollaborators.js'
import { createDeliveryPipeline } from './deliveryPipeline.js'
import {
  createHttpDownstreamTrigger,
  DownstreamTriggerReporter,
  type DownstreamTrigger,
} from './downstream/downstreamTrigger.js'
import { createDeliveryNotifier } from './notification/deliveryNotifier.js'
import { createMailRelayChannel } from './notification/mailRelayChannel.js'
import type { DeliverySettings } from './settings/types.js'
import type { DeliveryVariant } from './variants.js'

/**
 * Runtime options for one delivery run.
 */
export interface RunDeliveryOptions {
  readonly variant: DeliveryVariant
  readonly settings: DeliverySettings
  /** Raw parameter values, validated by the runner. */
  readonly parameters?: Readonly<Record<string, unknown>>
  /** Workspace directory. */
  readonly cwd: string
  /** Collaborators, shell-backed by default. */
  readonly collaborators?: CollaboratorFactory
  /** Command adapter used by shell-backed collaborators. */
  readonly adapter?: ToolAdapter
  readonly http?: HttpAdapter
  /** Mail transport, the relay from settings by default. */
  readonly channel?: NotificationChannel
  /** Downstream trigger, the CI server from settings by default. */
  readonly trigger?: DownstreamTrigger
  readonly reporters?: readonly PipelineReporter[]
  readonly logger?: PipelineLogger
  readonly job?: JobIdentity
  /** Marks the parallel quality group failed on its first fatal member. */
  readonly failFast?: boolean
  readonly signal?: AbortSignal
  readonly now?: () => number
  readonly sleep?: Sleep
}

/**
 * Runs the delivery pipeline with notification and downstream trigger wired in.
 *
 * @param options Run options.
 * @returns Final run data.
 */
export const runDelivery = async (options: RunDeliveryOptions): Promise<PipelineRun> => {
  const { settings, variant } = options
  const http = options.http ?? createFetchHttpAdapter()
  const logger = options.logger ?? createSilentLogger()

  const pipeline = createDeliveryPipeline({
    variant,
    settings,
    collaborators:
      options.collaborators ??
      createShellCollaborators({
        reportBucket: settings.reportBucket,
        analysisHostUrl: settings.staticAnalysis.hostUrl,
      }),
  })

  const reporters = [...(options.reporters ?? [])]
  if (settings.downstream) {
    reporters.push(
      new DownstreamTriggerReporter({
        trigger: options.trigger ?? createHttpDownstreamTrigger(settings.downstream.baseUrl, http),
        jobName: settings.downstream.jobName,
        logger,
      })
    )
  }

  const channel =
    options.channel ??
    (settings.mailRelayUrl ? createMailRelayChannel(settings.mailRelayUrl, http, logger) : undefined)

  return await createPipelineRunner({
    pipeline,
    parameters: options.parameters,
    adapter: options.adapter ?? createNodeToolAdapter(),
    http,
    reporters,
    notifier: channel
      ? createDeliveryNotifier({
          channel,
          job: options.job ?? { jobName: pipeline.id },
          cwd: options.cwd,
          logger,
        })
      : undefined,
    logger,
    cwd: options.cwd,
    failFast: options.failFast,
    signal: options.signal,
    now: options.now,
    sleep: options.sleep,
  }).run()
}
