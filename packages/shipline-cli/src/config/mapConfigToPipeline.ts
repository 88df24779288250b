import { resolve } from 'node:path'

import {
  canProceed,
  ConfigurationError,
  definePipeline,
  fail,
  markUnstable,
  succeed,
  ToolFailure,
  type PipelineDefinition,
  type StageContext,
  type StageDefinition,
  type StageOutcome,
  type StateReader,
  type StateValue,
  type ToolOutput,
} from '@shipline/core'

import type { ConfigStage, ConfigStageCondition, ShiplineConfig, ShiplineVariant } from './types.js'

/**
 * Pipeline definition and run settings derived from a config.
 */
export interface MappedPipeline {
  /** Validated pipeline definition. */
  readonly pipeline: PipelineDefinition
  /** Stages excluded from execution with reason metadata. */
  readonly excludedStages: readonly ExcludedPipelineStage[]
  /** Parameter values selected by the variant. */
  readonly parameters: Readonly<Record<string, StateValue>>
  /** Base working directory for commands. */
  readonly cwd: string
  /** Base environment for commands. */
  readonly env: NodeJS.ProcessEnv
  readonly failFast: boolean
  readonly failOnUnstable: boolean
  /** Selected variant, if any. */
  readonly variant?: ShiplineVariant
}

/**
 * Exclusion metadata for one configured stage.
 */
export interface ExcludedPipelineStage {
  /** Stable stage id. */
  readonly id: string
  /** Display name shown in output. */
  readonly name: string
  /** Machine-readable exclusion reason. */
  readonly reason: 'disabled' | 'env_mismatch' | 'variant'
  /** Required environment values when excluded by env mismatch. */
  readonly requiredEnv?: Readonly<Record<string, string>>
}

/**
 * Inputs for mapping a config onto a pipeline.
 */
export interface MapConfigOptions {
  /** Base working directory. */
  readonly cwd: string
  /** Selected variant id. */
  readonly variantId?: string
  /** CLI fail-fast override. */
  readonly failFast?: boolean
  /** Environment used for `when.env` checks and as the command base. */
  readonly processEnv?: NodeJS.ProcessEnv
}

interface StageExclusion {
  readonly reason: ExcludedPipelineStage['reason']
  readonly requiredEnv?: Readonly<Record<string, string>>
}

const TEMPLATE_PATTERN = /\$\{(\w+)\}/gu

/**
 * Maps a loaded config onto a validated pipeline definition.
 *
 * @param config Parsed config.
 * @param options Mapping inputs.
 * @returns Pipeline and run settings.
 * @throws ConfigurationError when the variant is unknown or the resulting pipeline is invalid.
 */
export const mapConfigToPipeline = (
  config: ShiplineConfig,
  options: MapConfigOptions
): MappedPipeline => {
  const runCwd = config.cwd ? resolve(options.cwd, config.cwd) : options.cwd
  const env: NodeJS.ProcessEnv = { ...(options.processEnv ?? process.env), ...config.env }
  const variant = selectVariant(config.variants ?? [], options.variantId)

  const builder = definePipeline(config.name ?? 'pipeline')
  for (const parameter of config.parameters ?? []) {
    builder.parameter(parameter)
  }

  const environmentEntries = Object.entries(config.environment ?? {})
  assertKnownTemplateNames(
    environmentEntries,
    (config.parameters ?? []).map((parameter) => parameter.name)
  )
  for (const [index, [name]] of environmentEntries.entries()) {
    const visibleEntries = environmentEntries.slice(0, index + 1)
    builder.environment(name, (parameters) => {
      return evaluateEnvironment(visibleEntries, parameters)[name] ?? ''
    })
  }

  const excludedStages: ExcludedPipelineStage[] = []

  for (const stage of config.stages) {
    const exclusion = getExclusion(stage, env, variant)
    if (exclusion) {
      excludedStages.push({
        id: stage.id,
        name: stage.name ?? stage.id,
        reason: exclusion.reason,
        requiredEnv: exclusion.requiredEnv,
      })
      continue
    }

    builder.stage(mapStage(stage, runCwd))
  }

  return {
    pipeline: builder.build(),
    excludedStages,
    parameters: variant?.parameters ?? {},
    cwd: runCwd,
    env,
    failFast: options.failFast === true || config.failFast === true,
    failOnUnstable: config.failOnUnstable ?? false,
    variant,
  }
}

const selectVariant = (
  variants: readonly ShiplineVariant[],
  variantId: string | undefined
): ShiplineVariant | undefined => {
  if (variantId === undefined) {
    return undefined
  }

  const variant = variants.find((candidate) => candidate.id === variantId)
  if (!variant) {
    const known = variants.map((candidate) => candidate.id).join(', ')
    throw new ConfigurationError(
      `Unknown variant: ${variantId}${known.length > 0 ? ` (known: ${known})` : ''}`
    )
  }

  return variant
}

const mapStage = (stage: ConfigStage, runCwd: string): StageDefinition => {
  const outputs = (stage.captures ?? []).map((capture) => capture.key)
  const reads = new Set(stage.reads ?? [])
  for (const key of Object.keys(stage.when?.outputs ?? {})) {
    reads.add(key)
  }
  if (stage.when?.scanGate) {
    reads.add(stage.when.scanGate.statusKey)
  }

  const condition = stage.when
  const when =
    condition &&
    (condition.params !== undefined ||
      condition.outputs !== undefined ||
      condition.scanGate !== undefined)
      ? (state: StateReader): boolean => evaluateCondition(condition, state)
      : undefined

  return {
    id: stage.id,
    name: stage.name ?? stage.id,
    failurePolicy: stage.failurePolicy,
    retry: stage.retry,
    alwaysRun: stage.alwaysRun,
    parallelGroup: stage.parallelGroup,
    outputs,
    reads: [...reads],
    when,
    run: async (context) => await runCommands(stage, context, runCwd),
  }
}

const runCommands = async (
  stage: ConfigStage,
  context: StageContext,
  runCwd: string
): Promise<StageOutcome> => {
  const commands = stage.commands ?? (stage.command === undefined ? [] : [stage.command])
  const successCodes = stage.exitCodes?.success ?? [0]
  const unstableCodes = stage.exitCodes?.unstable ?? []
  const cwd = stage.cwd ? resolve(runCwd, stage.cwd) : runCwd

  let unstableCommand: string | undefined
  let lastOutput: ToolOutput | undefined

  for (const command of commands) {
    const result = await context.exec(command, {
      cwd,
      env: stage.env,
      timeoutMs: stage.timeoutMs,
    })
    if (!result.ok) {
      return fail(result.error)
    }

    lastOutput = result.value
    const exitCode = result.value.exitCode

    if (exitCode !== null && successCodes.includes(exitCode)) {
      continue
    }

    if (exitCode !== null && unstableCodes.includes(exitCode)) {
      unstableCommand = command
      continue
    }

    const detail = tailOutput(result.value)
    return fail(
      new ToolFailure(
        exitCode === null
          ? `Command ended by ${result.value.signal ?? 'signal'}: ${command}`
          : `Command exited with code ${exitCode}: ${command}`,
        exitCode,
        { cause: detail.length > 0 ? new Error(detail) : undefined }
      ),
      { exitCode, outputs: captureOutputs(stage, result.value) }
    )
  }

  const outputs = lastOutput ? captureOutputs(stage, lastOutput) : {}
  const exitCode = lastOutput?.exitCode

  if (unstableCommand !== undefined) {
    return markUnstable(`Command reported unstable: ${unstableCommand}`, outputs, { exitCode })
  }

  return succeed(outputs, { exitCode })
}

const captureOutputs = (stage: ConfigStage, output: ToolOutput): Record<string, StateValue> => {
  const captured: Record<string, StateValue> = {}

  for (const capture of stage.captures ?? []) {
    if (capture.from === 'exitCode') {
      if (output.exitCode !== null) {
        captured[capture.key] = output.exitCode
      }
      continue
    }

    const match = new RegExp(capture.pattern, 'u').exec(output.stdout)
    const value = match?.[1] ?? match?.[0]
    if (value !== undefined) {
      captured[capture.key] = value
    }
  }

  return captured
}

const evaluateCondition = (condition: ConfigStageCondition, state: StateReader): boolean => {
  for (const [key, expected] of Object.entries(condition.params ?? {})) {
    if (String(state.get(key)) !== String(expected)) {
      return false
    }
  }

  for (const [key, expected] of Object.entries(condition.outputs ?? {})) {
    if (String(state.get(key)) !== String(expected)) {
      return false
    }
  }

  const gate = condition.scanGate
  if (gate) {
    const status = state.get(gate.statusKey)
    if (typeof status !== 'number') {
      return false
    }

    return canProceed(status, String(state.get(gate.severityParam) ?? ''), gate.tolerated)
  }

  return true
}

const getExclusion = (
  stage: ConfigStage,
  env: NodeJS.ProcessEnv,
  variant: ShiplineVariant | undefined
): StageExclusion | null => {
  if (stage.enabled === false) {
    return { reason: 'disabled' }
  }

  if (variant?.includeStageIds && !variant.includeStageIds.includes(stage.id)) {
    return { reason: 'variant' }
  }

  if (variant?.excludeStageIds?.includes(stage.id)) {
    return { reason: 'variant' }
  }

  const envConditions = stage.when?.env
  if (!envConditions) {
    return null
  }

  const missingConditions: Record<string, string> = {}

  for (const [key, expectedValue] of Object.entries(envConditions)) {
    if (env[key] !== expectedValue) {
      missingConditions[key] = expectedValue
    }
  }

  if (Object.keys(missingConditions).length > 0) {
    return {
      reason: 'env_mismatch',
      requiredEnv: missingConditions,
    }
  }

  return null
}

const assertKnownTemplateNames = (
  entries: readonly (readonly [string, string])[],
  parameterNames: readonly string[]
): void => {
  const known = new Set(parameterNames)
  const issues: string[] = []

  for (const [name, template] of entries) {
    for (const match of template.matchAll(TEMPLATE_PATTERN)) {
      const reference = match[1]
      if (reference !== undefined && !known.has(reference)) {
        issues.push(`environment ${name} references unknown name ${reference}`)
      }
    }
    known.add(name)
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, issues)
  }
}

const evaluateEnvironment = (
  entries: readonly (readonly [string, string])[],
  parameters: Readonly<Record<string, StateValue>>
): Record<string, string> => {
  const values: Record<string, string> = {}

  for (const [name, template] of entries) {
    values[name] = template.replace(TEMPLATE_PATTERN, (placeholder, key: string) => {
      const value = values[key] ?? parameters[key]
      return value === undefined ? placeholder : String(value)
    })
  }

  return values
}

const tailOutput = (output: ToolOutput, maxLines = 20): string => {
  const lines = `${output.stdout}\n${output.stderr}`
    .split(/\r?\n/u)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0)

  return lines.slice(-maxLines).join('\n')
}
