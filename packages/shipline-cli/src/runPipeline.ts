import {
  createChannelNotifier,
  createConsoleLogger,
  createFetchHttpAdapter,
  createNodeToolAdapter,
  createPipelineRunner,
  formatPipelineRunAsJson,
  type HttpAdapter,
  type Notifier,
  type PipelineRun,
  type ToolAdapter,
} from '@shipline/core'

import { loadShiplineConfig } from './config/loadConfig.js'
import { mapConfigToPipeline, type ExcludedPipelineStage } from './config/mapConfigToPipeline.js'
import type { CliOutputFormat, ShiplineConfig, ShiplineVariant } from './config/types.js'
import { createWebhookChannel } from './notification/webhookChannel.js'
import { PrettyReporter } from './reporters/prettyReporter.js'

/**
 * Runtime options for a CLI execution.
 */
export interface RunCliPipelineOptions {
  /** Base working directory. */
  readonly cwd: string
  /** Optional explicit config path. */
  readonly configPath?: string
  /** Optional selected variant id from config. */
  readonly variant?: string
  /** Prints configured variants and exits when true. */
  readonly listVariants: boolean
  /** Parameter values from the command line. */
  readonly parameters: Readonly<Record<string, string>>
  /** Output format selection. */
  readonly format: CliOutputFormat
  /** Set when the format came from a CLI flag and overrides the config. */
  readonly formatProvided?: true
  /** Verbose output mode. */
  readonly verbose: boolean
  /** Enables fail-fast behavior. */
  readonly failFast: boolean
  /** Command adapter, the Node.js shell adapter by default. */
  readonly adapter?: ToolAdapter
  /** HTTP adapter, the fetch adapter by default. */
  readonly http?: HttpAdapter
  /** Process environment used for `when.env` checks and commands. */
  readonly processEnv?: NodeJS.ProcessEnv
}

/**
 * Executes the pipeline according to CLI options.
 *
 * @param options CLI runtime options.
 * @returns Final exit code.
 * @throws ConfigurationError when the config cannot be loaded or mapped.
 */
export const runCliPipeline = async (options: RunCliPipelineOptions): Promise<number> => {
  const loadedConfig = await loadShiplineConfig(options.cwd, options.configPath)
  const config = loadedConfig.config

  const effectiveFormat = options.formatProvided
    ? options.format
    : (config.output?.format ?? options.format)
  const effectiveVerbose = options.verbose || (config.output?.verbose ?? false)

  if (options.listVariants) {
    printConfiguredVariants(config.variants ?? [], effectiveFormat)
    return 0
  }

  const processEnv = options.processEnv ?? process.env
  const mapped = mapConfigToPipeline(config, {
    cwd: options.cwd,
    variantId: options.variant,
    failFast: options.failFast,
    processEnv,
  })
  printExcludedStageHints(mapped.excludedStages, effectiveFormat)

  const http = options.http ?? createFetchHttpAdapter()
  const logger = createConsoleLogger({
    level: effectiveVerbose ? 'debug' : 'info',
    json: effectiveFormat === 'json',
  })

  const abortController = new AbortController()
  const abort = (): void => {
    logger.warn('Interrupted; finishing alwaysRun stages')
    abortController.abort()
  }
  process.once('SIGINT', abort)
  process.once('SIGTERM', abort)

  let run: PipelineRun
  try {
    run = await createPipelineRunner({
      pipeline: mapped.pipeline,
      parameters: { ...mapped.parameters, ...options.parameters },
      adapter: options.adapter ?? createNodeToolAdapter(),
      http,
      reporters:
        effectiveFormat === 'pretty' ? [new PrettyReporter({ verbose: effectiveVerbose })] : [],
      notifier: createWebhookNotifier(config, mapped.variant, http, processEnv),
      logger,
      cwd: mapped.cwd,
      env: mapped.env,
      failFast: mapped.failFast,
      failOnUnstable: mapped.failOnUnstable,
      signal: abortController.signal,
    }).run()
  } finally {
    process.off('SIGINT', abort)
    process.off('SIGTERM', abort)
  }

  if (effectiveFormat === 'json') {
    process.stdout.write(`${formatPipelineRunAsJson(run)}\n`)
  }

  return run.exitCode
}

const createWebhookNotifier = (
  config: ShiplineConfig,
  variant: ShiplineVariant | undefined,
  http: HttpAdapter,
  processEnv: NodeJS.ProcessEnv
): Notifier | undefined => {
  const notify = config.notify
  if (!notify) {
    return undefined
  }

  const jobName = [config.name ?? 'pipeline', variant?.id].filter(Boolean).join(':')

  return createChannelNotifier({
    channel: createWebhookChannel(notify.webhookUrl, http),
    to: notify.to ?? [],
    job: {
      jobName,
      buildId: processEnv.BUILD_NUMBER,
      buildUrl: processEnv.BUILD_URL,
    },
    subjects: notify.subject
      ? { success: notify.subject, unstable: notify.subject, failure: notify.subject }
      : undefined,
  })
}

const printExcludedStageHints = (
  excludedStages: readonly ExcludedPipelineStage[],
  format: CliOutputFormat
): void => {
  if (format !== 'pretty' || excludedStages.length === 0) {
    return
  }

  for (const stage of excludedStages) {
    if (stage.reason === 'disabled') {
      process.stdout.write(`ℹ️  Skipping ${stage.name} (enabled=false)\n`)
      continue
    }

    if (stage.reason === 'env_mismatch' && stage.requiredEnv) {
      process.stdout.write(
        `ℹ️  Skipping ${stage.name} (set ${formatRequiredEnv(stage.requiredEnv)} to enable)\n`
      )
      continue
    }

    if (stage.reason === 'variant') {
      process.stdout.write(`ℹ️  Skipping ${stage.name} (not part of the selected variant)\n`)
      continue
    }

    process.stdout.write(`ℹ️  Skipping ${stage.name}\n`)
  }
}

const printConfiguredVariants = (
  variants: readonly ShiplineVariant[],
  format: CliOutputFormat
): void => {
  if (format === 'json') {
    const payload = {
      variants: variants.map((variant) => ({
        id: variant.id,
        name: variant.name,
        description: variant.description,
      })),
    }
    process.stdout.write(`${JSON.stringify(payload)}\n`)
    return
  }

  if (variants.length === 0) {
    process.stdout.write('No variants configured.\n')
    return
  }

  process.stdout.write('Configured variants:\n')
  for (const variant of variants) {
    const suffix = variant.description ? ` - ${variant.description}` : ''
    process.stdout.write(`- ${variant.id}: ${variant.name}${suffix}\n`)
  }
}

const formatRequiredEnv = (requiredEnv: Readonly<Record<string, string>>): string => {
  return Object.entries(requiredEnv)
    .sort(([leftKey], [rightKey]) => leftKey.localeCompare(rightKey))
    .map(([key, value]) => `${key}=${value}`)
    .join(' ')
}
