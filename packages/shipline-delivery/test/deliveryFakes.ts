import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'

import {
  err,
  ok,
  ToolFailure,
  type NotificationChannel,
  type NotificationMessage,
  type PipelineError,
  type PipelineLogger,
  type Result,
} from '@shipline/core'

import type { CollaboratorFactory } from '../src/collaborators/contracts.js'
import type { DownstreamTrigger } from '../src/downstream/downstreamTrigger.js'
import type { DeliverySettings } from '../src/settings/types.js'

export const testSettings: DeliverySettings = {
  repositoryUrl: 'https://git.example.com/acme/shop.git',
  projectDir: 'app',
  imageRepository: 'acme/shop',
  staticAnalysis: {
    organization: 'acme',
    projectKey: 'acme_shop',
    hostUrl: 'https://sonar.example.com',
  },
  reportBucket: 's3://acme-reports',
  recipients: {
    alice: 'alice@example.com',
    bob: 'bob@example.com',
  },
  downstream: {
    baseUrl: 'https://ci.example.com',
    jobName: 'shop-deploy',
  },
}

/**
 * Scripted collaborator behavior.
 */
export interface FakeScript {
  readonly leaksFound?: boolean
  readonly build?: Result<readonly string[], PipelineError>
  readonly scanExitCode?: number
  /** Leaves the scan report unwritten. */
  readonly skipReport?: boolean
  readonly databaseFailures?: number
  readonly pushFailures?: number
  /** Health check status per attempt; the last entry repeats. */
  readonly healthStatuses?: readonly number[]
  readonly cleanupFails?: boolean
}

export interface FakeCollaborators {
  readonly factory: CollaboratorFactory
  /** Every collaborator call, in order. */
  readonly calls: string[]
}

export const createFakeCollaborators = (script: FakeScript = {}): FakeCollaborators => {
  const calls: string[] = []
  let databaseAttempts = 0
  let pushAttempts = 0
  let healthAttempts = 0

  const cleanupResult = (label: string): Result<void, PipelineError> => {
    calls.push(label)
    return script.cleanupFails ? err(new ToolFailure(`${label} failed`, 1)) : ok(undefined)
  }

  const factory: CollaboratorFactory = (session) => ({
    sourceControl: {
      checkout: async (request) => {
        calls.push(`checkout ${request.branchName}`)
        return ok(session.cwd)
      },
    },
    secretScanner: {
      detect: async (request) => {
        calls.push(`secret-scan ${request.sourcePath}`)
        return ok({ leaksFound: script.leaksFound ?? false, reportPath: request.reportPath })
      },
    },
    buildTool: {
      build: async (request) => {
        calls.push(`build skipTests=${String(request.skipTests)}`)
        return script.build ?? ok([`${request.projectPath}/target/shop.jar`])
      },
      deploy: async (projectPath) => {
        calls.push(`deploy ${projectPath}`)
        return ok(undefined)
      },
    },
    staticAnalyzer: {
      analyze: async (request) => {
        calls.push(`analyze ${request.projectKey}@${request.projectVersion}`)
        return ok(`https://sonar.example.com/dashboard?id=${request.projectKey}`)
      },
    },
    containerRuntime: {
      buildImage: async (request) => {
        calls.push(`build-image ${request.imageRef}`)
        return ok(undefined)
      },
      push: async (imageRef) => {
        calls.push(`push ${imageRef}`)
        pushAttempts += 1
        return pushAttempts <= (script.pushFailures ?? 0)
          ? err(new ToolFailure('denied: registry unavailable', 1))
          : ok(undefined)
      },
      run: async (request) => {
        calls.push(`run ${request.containerName} ${request.portMap}`)
        return ok('c0ffee')
      },
      stop: async (containerName) => cleanupResult(`stop ${containerName}`),
      remove: async (containerName) => cleanupResult(`remove ${containerName}`),
      removeImage: async (imageRef) => cleanupResult(`remove-image ${imageRef}`),
    },
    vulnerabilityScanner: {
      downloadDatabase: async (cacheDir) => {
        calls.push(`download-db ${cacheDir}`)
        databaseAttempts += 1
        return databaseAttempts <= (script.databaseFailures ?? 0)
          ? err(new ToolFailure('database download timed out', 1))
          : ok(undefined)
      },
      scanImage: async (request) => {
        calls.push(`scan ${request.imageRef} ${request.severityFilter}`)
        if (!script.skipReport) {
          const reportPath = resolve(session.cwd, request.reportPath)
          await mkdir(dirname(reportPath), { recursive: true })
          await writeFile(reportPath, '<html>scan report</html>', 'utf8')
        }
        return ok({ exitCode: script.scanExitCode ?? 0, reportPath: request.reportPath })
      },
    },
    artifactStore: {
      upload: async (localPath, remoteKey) => {
        calls.push(`upload ${localPath}`)
        return ok(`s3://acme-reports/${remoteKey}`)
      },
      download: async (_remoteKey, localPath) => ok(localPath),
    },
    healthProbe: {
      httpGet: async (url) => {
        calls.push(`health ${url}`)
        const statuses = script.healthStatuses ?? [200]
        const status = statuses[Math.min(healthAttempts, statuses.length - 1)] ?? 200
        healthAttempts += 1
        return ok(status)
      },
    },
  })

  return { factory, calls }
}

export const createRecordingChannel = (): {
  channel: NotificationChannel
  messages: NotificationMessage[]
} => {
  const messages: NotificationMessage[] = []
  return {
    channel: {
      send: async (message) => {
        messages.push(message)
      },
    },
    messages,
  }
}

export const createRecordingTrigger = (): {
  trigger: DownstreamTrigger
  triggered: { jobName: string; parameters: Readonly<Record<string, string>> }[]
} => {
  const triggered: { jobName: string; parameters: Readonly<Record<string, string>> }[] = []
  return {
    trigger: {
      triggerJob: async (jobName, parameters) => {
        triggered.push({ jobName, parameters })
        return ok('accepted')
      },
    },
    triggered,
  }
}

/**
 * Logger keeping `level: message` lines.
 */
export const createRecordingLogger = (): { logger: PipelineLogger; lines: string[] } => {
  const lines: string[] = []
  const logger: PipelineLogger = {
    debug: (message) => lines.push(`debug: ${message}`),
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
    child: () => logger,
  }

  return { logger, lines }
}
