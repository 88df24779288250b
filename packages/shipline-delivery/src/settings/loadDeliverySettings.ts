import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'

import { ConfigurationError } from '@shipline/core'

import type {
  DeliverySettings,
  DownstreamSettings,
  HealthCheckSettings,
  StaticAnalysisSettings,
} from './types.js'

const ENV_NAME_PATTERN = /^[A-Za-z_]\w*$/u

/**
 * Loads delivery settings from a JSON file.
 *
 * @param cwd Base working directory.
 * @param settingsPath Settings file path, relative to `cwd`.
 * @returns Validated settings.
 * @throws ConfigurationError when the file is missing or invalid.
 */
export const loadDeliverySettings = async (
  cwd: string,
  settingsPath = 'delivery.settings.json'
): Promise<DeliverySettings> => {
  const filePath = resolve(cwd, settingsPath)

  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error: unknown) {
    throw new ConfigurationError(`Settings file not found: ${filePath}`, [], { cause: error })
  }

  let value: unknown
  try {
    value = JSON.parse(content)
  } catch (error: unknown) {
    throw new ConfigurationError(`Settings file ${filePath} is not valid JSON`, [], { cause: error })
  }

  return parseDeliverySettings(value)
}

/**
 * Validates raw settings.
 *
 * @param value Parsed JSON value.
 * @throws ConfigurationError naming the first invalid field.
 */
export const parseDeliverySettings = (value: unknown): DeliverySettings => {
  if (!isRecord(value)) {
    throw new ConfigurationError('Settings must be an object')
  }

  const credentialsRef = parseOptionalString(value.credentialsRef, 'credentialsRef')
  if (credentialsRef !== undefined && !ENV_NAME_PATTERN.test(credentialsRef)) {
    throw new ConfigurationError('credentialsRef must be an environment variable name')
  }

  return {
    repositoryUrl: parseRequiredString(value.repositoryUrl, 'repositoryUrl'),
    credentialsRef,
    projectDir: parseOptionalString(value.projectDir, 'projectDir') ?? '.',
    dockerfile: parseOptionalString(value.dockerfile, 'dockerfile'),
    imageRepository: parseRequiredString(value.imageRepository, 'imageRepository'),
    staticAnalysis: parseStaticAnalysis(value.staticAnalysis),
    reportBucket: parseRequiredString(value.reportBucket, 'reportBucket'),
    trivyCacheDir: parseOptionalString(value.trivyCacheDir, 'trivyCacheDir'),
    recipients: parseRecipients(value.recipients),
    mailRelayUrl: parseOptionalString(value.mailRelayUrl, 'mailRelayUrl'),
    downstream: parseDownstream(value.downstream),
    healthCheck: parseHealthCheck(value.healthCheck),
  }
}

const parseStaticAnalysis = (value: unknown): StaticAnalysisSettings => {
  if (!isRecord(value)) {
    throw new ConfigurationError('staticAnalysis must be an object')
  }

  return {
    organization: parseRequiredString(value.organization, 'staticAnalysis.organization'),
    projectKey: parseRequiredString(value.projectKey, 'staticAnalysis.projectKey'),
    hostUrl: parseOptionalString(value.hostUrl, 'staticAnalysis.hostUrl'),
  }
}

const parseRecipients = (value: unknown): Readonly<Record<string, string>> => {
  if (value === undefined) {
    return {}
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('recipients must be an object')
  }

  const recipients: Record<string, string> = {}
  for (const [userId, address] of Object.entries(value)) {
    recipients[userId] = parseRequiredString(address, `recipients.${userId}`)
  }

  return recipients
}

const parseDownstream = (value: unknown): DownstreamSettings | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('downstream must be an object')
  }

  return {
    baseUrl: parseRequiredString(value.baseUrl, 'downstream.baseUrl'),
    jobName: parseRequiredString(value.jobName, 'downstream.jobName'),
  }
}

const parseHealthCheck = (value: unknown): HealthCheckSettings | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('healthCheck must be an object')
  }

  const attempts = parseOptionalNumber(value.attempts, 'healthCheck.attempts')
  if (attempts !== undefined && (!Number.isInteger(attempts) || attempts < 1)) {
    throw new ConfigurationError('healthCheck.attempts must be a positive integer')
  }

  return {
    host: parseOptionalString(value.host, 'healthCheck.host'),
    attempts,
    intervalMs: parseOptionalNumber(value.intervalMs, 'healthCheck.intervalMs'),
    warmupMs: parseOptionalNumber(value.warmupMs, 'healthCheck.warmupMs'),
  }
}

const parseRequiredString = (value: unknown, path: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigurationError(`${path} must be a non-empty string`)
  }

  return value
}

const parseOptionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  return parseRequiredString(value, path)
}

const parseOptionalNumber = (value: unknown, path: string): number | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'number' || Number.isNaN(value) || value < 0) {
    throw new ConfigurationError(`${path} must be a non-negative number`)
  }

  return value
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
