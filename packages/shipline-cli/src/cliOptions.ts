import { resolve } from 'node:path'

import { ConfigurationError } from '@shipline/core'

import type { CliOutputFormat } from './config/types.js'

/**
 * Parsed CLI runtime options.
 */
export interface CliOptions {
  /** Absolute working directory for config and execution. */
  readonly cwd: string
  /** Optional explicit config file path. */
  readonly configPath?: string
  /** Optional variant id selecting parameter values and a subset of configured stages. */
  readonly variant?: string
  /** Prints configured variants and exits when true. */
  readonly listVariants: boolean
  /** Parameter values given with `--param NAME=VALUE`. */
  readonly parameters: Readonly<Record<string, string>>
  /** Selected output format. */
  readonly format: CliOutputFormat
  /** Indicates whether output format was explicitly set via CLI flag. */
  readonly formatProvided?: true
  /** Prints stage notes and debug diagnostics when true. */
  readonly verbose: boolean
  /** Cancels running parallel siblings on the first fatal failure when true. */
  readonly failFast: boolean
  /** Prints usage and exits when true. */
  readonly help: boolean
}

/**
 * Parses process arguments for the shipline CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws ConfigurationError when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let configPath: string | undefined
  let variant: string | undefined
  let listVariants = false
  const parameters: Record<string, string> = {}
  let format: CliOutputFormat = 'pretty'
  let formatProvided = false
  let verbose = false
  let failFast = false
  let help = false
  let cwd = baseCwd

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      help = true
      continue
    }

    if (argument === '--verbose') {
      verbose = true
      continue
    }

    if (argument === '--fail-fast') {
      failFast = true
      continue
    }

    if (argument === '--list-variants') {
      listVariants = true
      continue
    }

    if (argument === '--param') {
      const nextValue = argv[index + 1]
      if (!nextValue) {
        throw new ConfigurationError('--param requires a value')
      }
      const [name, value] = parseParameterAssignment(nextValue)
      parameters[name] = value
      index += 1
      continue
    }

    if (argument.startsWith('--param=')) {
      const [name, value] = parseParameterAssignment(argument.slice('--param='.length))
      parameters[name] = value
      continue
    }

    if (argument === '--format') {
      const nextValue = argv[index + 1]
      if (!nextValue) {
        throw new ConfigurationError('--format requires a value')
      }
      if (nextValue !== 'pretty' && nextValue !== 'json') {
        throw new ConfigurationError('--format must be "pretty" or "json"')
      }
      format = nextValue
      formatProvided = true
      index += 1
      continue
    }

    if (argument.startsWith('--format=')) {
      const value = argument.slice('--format='.length)
      if (value !== 'pretty' && value !== 'json') {
        throw new ConfigurationError('--format must be "pretty" or "json"')
      }
      format = value
      formatProvided = true
      continue
    }

    if (argument === '--config') {
      const nextValue = argv[index + 1]
      if (!nextValue) {
        throw new ConfigurationError('--config requires a value')
      }
      configPath = nextValue
      index += 1
      continue
    }

    if (argument.startsWith('--config=')) {
      configPath = argument.slice('--config='.length)
      continue
    }

    if (argument === '--variant') {
      const nextValue = argv[index + 1]
      if (!nextValue) {
        throw new ConfigurationError('--variant requires a value')
      }
      variant = nextValue
      index += 1
      continue
    }

    if (argument.startsWith('--variant=')) {
      variant = argument.slice('--variant='.length)
      continue
    }

    if (argument === '--cwd') {
      const nextValue = argv[index + 1]
      if (!nextValue) {
        throw new ConfigurationError('--cwd requires a value')
      }
      cwd = resolve(baseCwd, nextValue)
      index += 1
      continue
    }

    if (argument.startsWith('--cwd=')) {
      cwd = resolve(baseCwd, argument.slice('--cwd='.length))
      continue
    }

    throw new ConfigurationError(`Unknown argument: ${argument}`)
  }

  return {
    cwd,
    configPath,
    variant,
    listVariants,
    parameters,
    format,
    ...(formatProvided ? { formatProvided: true as const } : {}),
    verbose,
    failFast,
    help,
  }
}

/**
 * Returns help text for the shipline CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: shipline [options]',
    '',
    'Options:',
    '  --config <path>       Config file path (default: pipeline.config.ts or pipeline.config.json)',
    '  --variant <id>        Run the selected variant from config',
    '  --list-variants       Print configured variants and exit',
    '  --param <NAME=VALUE>  Set a pipeline parameter (repeatable)',
    '  --format <type>       Output format: pretty | json (default: pretty)',
    '  --verbose             Show stage notes and debug diagnostics',
    '  --fail-fast           Cancel parallel siblings after the first fatal failure',
    '  --cwd <path>          Base working directory',
    '  -h, --help            Show this help',
  ].join('\n')
}

const parseParameterAssignment = (assignment: string): readonly [string, string] => {
  const separatorIndex = assignment.indexOf('=')
  if (separatorIndex <= 0) {
    throw new ConfigurationError(`--param must look like NAME=VALUE (got "${assignment}")`)
  }

  return [assignment.slice(0, separatorIndex), assignment.slice(separatorIndex + 1)]
}
