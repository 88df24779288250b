#!/usr/bin/env node

import { parseCliOptions, PrettyReporter } from '@shipline/cli'
import {
  ConfigurationError,
  createConsoleLogger,
  formatPipelineRunAsJson,
} from '@shipline/core'

import { runDelivery } from './runDelivery.js'
import { loadDeliverySettings } from './settings/loadDeliverySettings.js'
import { DELIVERY_VARIANTS, findDeliveryVariant } from './variants.js'

const DEFAULT_VARIANT = 'dockerhub'

const writeLine = (line: string): void => {
  process.stdout.write(`${line}\n`)
}

const helpText = (): string => {
  return [
    'Usage: shipline-delivery [options]',
    '',
    'Options:',
    '  --config <path>       Settings file (default: delivery.settings.json)',
    `  --variant <id>        Target registry variant (default: ${DEFAULT_VARIANT})`,
    '  --list-variants       Print registry variants and exit',
    '  --param <NAME=VALUE>  Set a pipeline parameter (repeatable)',
    '  --format <type>       Output format: pretty | json (default: pretty)',
    '  --verbose             Show stage notes and debug diagnostics',
    '  --fail-fast           Fail the quality group on its first fatal member',
    '  --cwd <path>          Workspace directory',
    '  -h, --help            Show this help',
  ].join('\n')
}

const run = async (): Promise<void> => {
  const options = parseCliOptions(process.argv.slice(2), process.cwd())

  if (options.help) {
    writeLine(helpText())
    return
  }

  if (options.listVariants) {
    for (const variant of DELIVERY_VARIANTS) {
      writeLine(`- ${variant.id}: ${variant.name} (${variant.registryHost})`)
    }
    return
  }

  const variant = findDeliveryVariant(options.variant ?? DEFAULT_VARIANT)
  const settings = await loadDeliverySettings(options.cwd, options.configPath)
  const logger = createConsoleLogger({
    level: options.verbose ? 'debug' : 'info',
    json: options.format === 'json',
  })

  const abortController = new AbortController()
  const abort = (): void => {
    logger.warn('Interrupted; finishing cleanup')
    abortController.abort()
  }
  process.once('SIGINT', abort)
  process.once('SIGTERM', abort)

  try {
    const result = await runDelivery({
      variant,
      settings,
      parameters: options.parameters,
      cwd: options.cwd,
      reporters: options.format === 'pretty' ? [new PrettyReporter({ verbose: options.verbose })] : [],
      logger,
      failFast: options.failFast,
      signal: abortController.signal,
      job: {
        jobName: `delivery:${variant.id}`,
        buildId: process.env.BUILD_NUMBER,
        buildUrl: process.env.BUILD_URL,
      },
    })

    if (options.format === 'json') {
      writeLine(formatPipelineRunAsJson(result))
    }

    process.exitCode = result.exitCode
  } finally {
    process.off('SIGINT', abort)
    process.off('SIGTERM', abort)
  }
}

void run().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
  process.stderr.write(`${message}\n`)
  process.exitCode = error instanceof ConfigurationError ? 2 : 1
})
