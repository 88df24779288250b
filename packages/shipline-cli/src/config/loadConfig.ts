import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import ts from 'typescript'

import { ConfigurationError, type ParameterDefinition, type StateValue } from '@shipline/core'

import type {
  ConfigScanGate,
  ConfigStage,
  ConfigStageCapture,
  ShiplineConfig,
  ShiplineVariant,
} from './types.js'

/**
 * Loads and validates a shipline config file.
 *
 * @param cwd Base working directory.
 * @param configPath Optional explicit config file path.
 * @returns Parsed config with resolved metadata.
 * @throws ConfigurationError when config cannot be loaded or is invalid.
 */
export const loadShiplineConfig = async (
  cwd: string,
  configPath?: string
): Promise<{ config: ShiplineConfig; configFilePath: string }> => {
  const resolvedConfigPath = await resolveConfigPath(cwd, configPath)
  if (!resolvedConfigPath) {
    throw new ConfigurationError(
      'No config file found. Expected pipeline.config.ts or pipeline.config.json'
    )
  }

  const loadedConfig = await loadConfigByExtension(resolvedConfigPath)
  const config = parseShiplineConfig(loadedConfig)

  return {
    config,
    configFilePath: resolvedConfigPath,
  }
}

const resolveConfigPath = async (cwd: string, configPath?: string): Promise<string | null> => {
  if (configPath) {
    return resolve(cwd, configPath)
  }

  const candidates = [resolve(cwd, 'pipeline.config.ts'), resolve(cwd, 'pipeline.config.json')]

  for (const candidate of candidates) {
    try {
      await readFile(candidate, 'utf8')
      return candidate
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        continue
      }
      throw error
    }
  }

  return null
}

const loadConfigByExtension = async (configFilePath: string): Promise<unknown> => {
  if (configFilePath.endsWith('.json')) {
    const content = await readFile(configFilePath, 'utf8')
    try {
      return JSON.parse(content) as unknown
    } catch (error: unknown) {
      throw new ConfigurationError(`Config file ${configFilePath} is not valid JSON`, [], {
        cause: error,
      })
    }
  }

  if (configFilePath.endsWith('.ts')) {
    return await loadTypeScriptConfig(configFilePath)
  }

  throw new ConfigurationError(`Unsupported config extension: ${configFilePath}`)
}

const loadTypeScriptConfig = async (configFilePath: string): Promise<unknown> => {
  const source = await readFile(configFilePath, 'utf8')
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: configFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnosticsWithColorAndContext(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(configFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new ConfigurationError(`Failed to transpile ${configFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'shipline-config-'))
  const tempFilePath = resolve(tempDirectory, 'config.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule = (await import(moduleUrl)) as {
      readonly default?: unknown
      readonly config?: unknown
    }

    if (loadedModule.default !== undefined) {
      return unwrapNestedDefault(loadedModule.default)
    }

    if (loadedModule.config !== undefined) {
      return loadedModule.config
    }

    throw new ConfigurationError(
      `Config module ${configFilePath} must export default or named "config"`
    )
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

const unwrapNestedDefault = (value: unknown): unknown => {
  if (!isRecord(value)) {
    return value
  }

  if ('default' in value) {
    return value.default
  }

  return value
}

const parseShiplineConfig = (value: unknown): ShiplineConfig => {
  if (!isRecord(value)) {
    throw new ConfigurationError('Config must be an object')
  }

  const stagesValue = value.stages
  if (!Array.isArray(stagesValue)) {
    throw new ConfigurationError('Config must provide a stages array')
  }

  const name = parseOptionalString(value.name, 'name')
  const parameters = parseParameters(value.parameters)
  const environment = parseOptionalStringRecord(value.environment, 'environment')
  const stages = stagesValue.map(parseConfigStage)
  const variants = parseVariants(value.variants, stages)

  const failFast = parseOptionalBoolean(value.failFast, 'failFast')
  const failOnUnstable = parseOptionalBoolean(value.failOnUnstable, 'failOnUnstable')
  const env = parseOptionalStringRecord(value.env, 'env')
  const cwd = parseOptionalString(value.cwd, 'cwd')

  const output = parseOutputConfig(value.output)
  const notify = parseNotifyConfig(value.notify)

  return {
    name,
    parameters,
    environment,
    stages,
    variants,
    failFast,
    failOnUnstable,
    env,
    cwd,
    output,
    notify,
  }
}

const parseParameters = (value: unknown): readonly ParameterDefinition[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ConfigurationError('parameters must be an array')
  }

  return value.map(parseParameter)
}

const parseParameter = (value: unknown, index: number): ParameterDefinition => {
  const path = `parameters[${index}]`
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  const name = parseRequiredString(value.name, `${path}.name`)
  const description = parseOptionalString(value.description, `${path}.description`)

  switch (value.type) {
    case 'string':
      return {
        type: 'string',
        name,
        description,
        defaultValue: parseOptionalString(value.defaultValue, `${path}.defaultValue`),
      }
    case 'choice': {
      const choices = parseOptionalStringArray(value.choices, `${path}.choices`)
      if (!choices || choices.length === 0) {
        throw new ConfigurationError(`${path}.choices must be a non-empty array`)
      }
      return {
        type: 'choice',
        name,
        description,
        choices,
        defaultValue: parseOptionalString(value.defaultValue, `${path}.defaultValue`),
      }
    }
    case 'boolean':
      return {
        type: 'boolean',
        name,
        description,
        defaultValue: parseOptionalBoolean(value.defaultValue, `${path}.defaultValue`),
      }
    default:
      throw new ConfigurationError(`${path}.type must be "string", "choice" or "boolean"`)
  }
}

const parseConfigStage = (value: unknown, index: number): ConfigStage => {
  const path = `stages[${index}]`
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  const id = parseRequiredString(value.id, `${path}.id`)
  const name = parseOptionalString(value.name, `${path}.name`)
  const command = parseOptionalString(value.command, `${path}.command`)
  const commands = parseOptionalStringArray(value.commands, `${path}.commands`)
  if ((command === undefined) === (commands === undefined)) {
    throw new ConfigurationError(`${path} must provide exactly one of command or commands`)
  }
  if (commands?.length === 0) {
    throw new ConfigurationError(`${path}.commands must not be empty`)
  }

  return {
    id,
    name,
    command,
    commands,
    enabled: parseOptionalBoolean(value.enabled, `${path}.enabled`),
    cwd: parseOptionalString(value.cwd, `${path}.cwd`),
    env: parseOptionalStringRecord(value.env, `${path}.env`),
    timeoutMs: parseOptionalNumber(value.timeoutMs, `${path}.timeoutMs`),
    retry: parseOptionalRetry(value.retry, `${path}.retry`),
    failurePolicy: parseOptionalFailurePolicy(value.failurePolicy, `${path}.failurePolicy`),
    alwaysRun: parseOptionalBoolean(value.alwaysRun, `${path}.alwaysRun`),
    parallelGroup: parseOptionalString(value.parallelGroup, `${path}.parallelGroup`),
    exitCodes: parseOptionalExitCodes(value.exitCodes, `${path}.exitCodes`),
    captures: parseOptionalCaptures(value.captures, `${path}.captures`),
    reads: parseOptionalStringArray(value.reads, `${path}.reads`),
    when: parseOptionalCondition(value.when, `${path}.when`),
  }
}

const parseOutputConfig = (value: unknown): ShiplineConfig['output'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('output must be an object')
  }

  const format = value.format
  if (format !== undefined && format !== 'pretty' && format !== 'json') {
    throw new ConfigurationError('output.format must be "pretty" or "json"')
  }

  const verbose = parseOptionalBoolean(value.verbose, 'output.verbose')

  return {
    format,
    verbose,
  }
}

const parseNotifyConfig = (value: unknown): ShiplineConfig['notify'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('notify must be an object')
  }

  return {
    webhookUrl: parseRequiredString(value.webhookUrl, 'notify.webhookUrl'),
    to: parseOptionalStringArray(value.to, 'notify.to'),
    subject: parseOptionalString(value.subject, 'notify.subject'),
  }
}

const parseVariants = (
  value: unknown,
  stages: readonly ConfigStage[]
): readonly ShiplineVariant[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ConfigurationError('variants must be an array')
  }

  const variants = value.map(parseVariant)
  assertUniqueVariantIds(variants)
  assertKnownVariantStageReferences(variants, stages)
  return variants
}

const parseVariant = (value: unknown, index: number): ShiplineVariant => {
  if (!isRecord(value)) {
    throw new ConfigurationError(`variants[${index}] must be an object`)
  }

  const id = parseRequiredString(value.id, `variants[${index}].id`)
  const name = parseRequiredString(value.name, `variants[${index}].name`)
  const description = parseOptionalString(value.description, `variants[${index}].description`)
  const parameters = parseOptionalValueRecord(value.parameters, `variants[${index}].parameters`)
  const includeStageIds = parseOptionalStringArray(
    value.includeStageIds,
    `variants[${index}].includeStageIds`
  )
  const excludeStageIds = parseOptionalStringArray(
    value.excludeStageIds,
    `variants[${index}].excludeStageIds`
  )

  return {
    id,
    name,
    description,
    parameters,
    includeStageIds,
    excludeStageIds,
  }
}

const assertUniqueVariantIds = (variants: readonly ShiplineVariant[]): void => {
  const seenById = new Set<string>()

  for (const variant of variants) {
    if (seenById.has(variant.id)) {
      throw new ConfigurationError(`variants must use unique ids (duplicate: ${variant.id})`)
    }

    seenById.add(variant.id)
  }
}

const assertKnownVariantStageReferences = (
  variants: readonly ShiplineVariant[],
  stages: readonly ConfigStage[]
): void => {
  const knownStageIds = new Set(stages.map((stage) => stage.id))

  for (const [variantIndex, variant] of variants.entries()) {
    if (variant.includeStageIds) {
      assertVariantStageArray(
        knownStageIds,
        variant.includeStageIds,
        `variants[${variantIndex}].includeStageIds`
      )
    }

    if (variant.excludeStageIds) {
      assertVariantStageArray(
        knownStageIds,
        variant.excludeStageIds,
        `variants[${variantIndex}].excludeStageIds`
      )
    }
  }
}

const assertVariantStageArray = (
  knownStageIds: ReadonlySet<string>,
  referencedStageIds: readonly string[],
  path: string
): void => {
  for (const [index, stageId] of referencedStageIds.entries()) {
    if (!knownStageIds.has(stageId)) {
      throw new ConfigurationError(`${path}[${index}] references unknown stage id: ${stageId}`)
    }
  }
}

const parseOptionalRetry = (value: unknown, path: string): ConfigStage['retry'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  const maxAttempts = parseRequiredNumber(value.maxAttempts, `${path}.maxAttempts`)
  const delayMs = parseOptionalNumber(value.delayMs, `${path}.delayMs`)

  return {
    maxAttempts,
    delayMs,
  }
}

const parseOptionalFailurePolicy = (
  value: unknown,
  path: string
): ConfigStage['failurePolicy'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (value !== 'fatal' && value !== 'unstable' && value !== 'ignored') {
    throw new ConfigurationError(`${path} must be "fatal", "unstable" or "ignored"`)
  }

  return value
}

const parseOptionalExitCodes = (value: unknown, path: string): ConfigStage['exitCodes'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  return {
    success: parseOptionalIntegerArray(value.success, `${path}.success`),
    unstable: parseOptionalIntegerArray(value.unstable, `${path}.unstable`),
  }
}

const parseOptionalCaptures = (
  value: unknown,
  path: string
): readonly ConfigStageCapture[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${path} must be an array`)
  }

  return value.map((entry: unknown, index: number): ConfigStageCapture => {
    const entryPath = `${path}[${index}]`
    if (!isRecord(entry)) {
      throw new ConfigurationError(`${entryPath} must be an object`)
    }

    const key = parseRequiredString(entry.key, `${entryPath}.key`)
    if (entry.from === 'exitCode') {
      return { key, from: 'exitCode' }
    }

    if (entry.from === 'stdout') {
      const pattern = parseRequiredString(entry.pattern, `${entryPath}.pattern`)
      try {
        new RegExp(pattern, 'u')
      } catch (error: unknown) {
        throw new ConfigurationError(`${entryPath}.pattern is not a valid regular expression`, [], {
          cause: error,
        })
      }
      return { key, from: 'stdout', pattern }
    }

    throw new ConfigurationError(`${entryPath}.from must be "exitCode" or "stdout"`)
  })
}

const parseOptionalCondition = (
  value: unknown,
  path: string
): ConfigStage['when'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  const params = parseOptionalValueRecord(value.params, `${path}.params`)
  const outputs = parseOptionalValueRecord(value.outputs, `${path}.outputs`)
  const env = parseOptionalStringRecord(value.env, `${path}.env`)
  const scanGate = parseOptionalScanGate(value.scanGate, `${path}.scanGate`)

  return {
    params,
    outputs,
    env,
    scanGate,
  }
}

const parseOptionalScanGate = (value: unknown, path: string): ConfigScanGate | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  return {
    statusKey: parseRequiredString(value.statusKey, `${path}.statusKey`),
    severityParam: parseRequiredString(value.severityParam, `${path}.severityParam`),
    tolerated: parseOptionalStringArray(value.tolerated, `${path}.tolerated`) ?? [],
  }
}

const parseRequiredString = (value: unknown, path: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigurationError(`${path} must be a non-empty string`)
  }

  return value
}

const parseRequiredNumber = (value: unknown, path: string): number => {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigurationError(`${path} must be a valid number`)
  }

  return value
}

const parseOptionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ConfigurationError(`${path} must be a string`)
  }

  return value
}

const parseOptionalNumber = (value: unknown, path: string): number | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigurationError(`${path} must be a valid number`)
  }

  return value
}

const parseOptionalBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${path} must be a boolean`)
  }

  return value
}

const parseOptionalStringArray = (value: unknown, path: string): readonly string[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${path} must be an array`)
  }

  const result: string[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new ConfigurationError(`${path}[${index}] must be a non-empty string`)
    }
    result.push(entry)
  }

  return result
}

const parseOptionalStringRecord = (
  value: unknown,
  path: string
): Readonly<Record<string, string>> | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  const entries = Object.entries(value)
  const parsed: Record<string, string> = {}

  for (const [key, entryValue] of entries) {
    if (typeof entryValue !== 'string') {
      throw new ConfigurationError(`${path}.${key} must be a string`)
    }
    parsed[key] = entryValue
  }

  return parsed
}

const parseOptionalIntegerArray = (value: unknown, path: string): readonly number[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${path} must be an array`)
  }

  const result: number[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'number' || !Number.isInteger(entry)) {
      throw new ConfigurationError(`${path}[${index}] must be an integer`)
    }
    result.push(entry)
  }

  return result
}

const parseOptionalValueRecord = (
  value: unknown,
  path: string
): Readonly<Record<string, StateValue>> | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  const parsed: Record<string, StateValue> = {}

  for (const [key, entryValue] of Object.entries(value)) {
    if (
      typeof entryValue !== 'string' &&
      typeof entryValue !== 'number' &&
      typeof entryValue !== 'boolean'
    ) {
      throw new ConfigurationError(`${path}.${key} must be a string, number or boolean`)
    }
    parsed[key] = entryValue
  }

  return parsed
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
