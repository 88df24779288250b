import { stat } from 'node:fs/promises'
import { resolve } from 'node:path'

import {
  canProceed,
  CleanupError,
  deepestMessage,
  definePipeline,
  err,
  fail,
  markUnstable,
  scanStatusFromExitCode,
  skip,
  succeed,
  ToolFailure,
  withRetry,
  type PipelineDefinition,
  type PipelineError,
  type Result,
  type StageContext,
  type StageOutcome,
  type StateReader,
} from '@shipline/core'

import { checkDockerfile, isMissingFileError } from './checks/dockerfileCheck.js'
import type { CollaboratorFactory, DeliveryCollaborators } from './collaborators/contracts.js'
import { resolveRecipients } from './recipients.js'
import type { DeliverySettings } from './settings/types.js'
import type { DeliveryVariant } from './variants.js'

export const SECRET_REPORT_PATH = 'gitleaks-reports/gitleaks-report.sarif'
export const SCAN_REPORT_PATH = 'trivy-reports/trivy-report.html'

const DATABASE_DOWNLOAD_ATTEMPTS = 3
const PUSH_ATTEMPTS = 3
const DEFAULT_HEALTH_CHECK = {
  host: 'localhost',
  attempts: 3,
  intervalMs: 5_000,
  warmupMs: 30_000,
}

/**
 * Inputs for the delivery pipeline definition.
 */
export interface DeliveryPipelineOptions {
  readonly variant: DeliveryVariant
  readonly settings: DeliverySettings
  readonly collaborators: CollaboratorFactory
}

/**
 * Builds the container delivery pipeline for one registry variant.
 *
 * Stages: checkout, secret scan, build, optional artifact publishing, static
 * analysis and Dockerfile check in parallel, image build, vulnerability scan,
 * report upload, gated push, smoke test and best-effort cleanup.
 *
 * @param options Variant, settings and collaborators.
 * @returns Validated pipeline definition.
 */
export const createDeliveryPipeline = (options: DeliveryPipelineOptions): PipelineDefinition => {
  const { variant, settings } = options
  const tools = (context: StageContext): DeliveryCollaborators => {
    return options.collaborators({
      exec: context.exec,
      http: context.http,
      cwd: context.cwd,
      logger: context.logger,
    })
  }
  const healthCheck = {
    host: settings.healthCheck?.host ?? DEFAULT_HEALTH_CHECK.host,
    attempts: settings.healthCheck?.attempts ?? DEFAULT_HEALTH_CHECK.attempts,
    intervalMs: settings.healthCheck?.intervalMs ?? DEFAULT_HEALTH_CHECK.intervalMs,
    warmupMs: settings.healthCheck?.warmupMs ?? DEFAULT_HEALTH_CHECK.warmupMs,
  }
  const containerName = `${settings.imageRepository.split('/').at(-1) ?? 'app'}-smoke`

  const builder = definePipeline(`delivery-${variant.id}`)
    .parameter({ type: 'string', name: 'BRANCH_NAME', defaultValue: 'main' })
    .parameter({ type: 'string', name: 'PROJECT_VERSION', defaultValue: '1.0.0' })
    .parameter({ type: 'choice', name: 'TRIVY_SEVERITY', choices: variant.severityChoices })
    .parameter({ type: 'boolean', name: 'FAIL_ON_LEAKS', defaultValue: false })
    .parameter({ type: 'boolean', name: 'SKIP_TESTS', defaultValue: true })
    .parameter({ type: 'boolean', name: 'DEPLOY_ARTIFACTS', defaultValue: false })
    .parameter({ type: 'string', name: 'HOST_PORT', defaultValue: '8084' })
    .parameter({ type: 'string', name: 'CONTAINER_PORT', defaultValue: '8080' })
    .parameter({
      type: 'string',
      name: 'RECIPIENTS',
      description: 'Comma-separated user ids notified about the result',
      defaultValue: '',
    })
    .environment(
      'IMAGE_NAME',
      (parameters) =>
        `${variant.registryHost}/${settings.imageRepository}:${String(parameters.PROJECT_VERSION)}`
    )
    .environment('CONTAINER_NAME', () => containerName)
    .environment('DOCKERFILE', () => settings.dockerfile ?? `${settings.projectDir}/Dockerfile`)
    .environment('TRIVY_CACHE_DIR', () => settings.trivyCacheDir ?? '.trivy-cache')
    .environment('REPORT_PATH', () => SCAN_REPORT_PATH)
    .environment(
      'REPORT_KEY',
      (parameters) =>
        `trivy-reports/${variant.id}/${String(parameters.PROJECT_VERSION)}/trivy-report.html`
    )
    .environment('NOTIFY_TO', (parameters) =>
      resolveRecipients(String(parameters.RECIPIENTS), settings.recipients).join(',')
    )

  builder.stage({
    id: 'checkout',
    name: 'Checkout',
    run: async (context) => {
      const result = await tools(context).sourceControl.checkout({
        repositoryUrl: settings.repositoryUrl,
        branchName: text(context.state, 'BRANCH_NAME'),
        credentialsRef: settings.credentialsRef,
        directory: '.',
      })
      return result.ok
        ? succeed(undefined, { message: `Checked out into ${result.value}` })
        : fail(result.error)
    },
  })

  builder.stage({
    id: 'secret-scan',
    name: 'Secret Scan',
    outputs: ['LEAKS_FOUND'],
    run: async (context) => {
      const result = await tools(context).secretScanner.detect({
        sourcePath: settings.projectDir,
        reportPath: SECRET_REPORT_PATH,
      })
      if (!result.ok) {
        return fail(result.error)
      }

      const outputs = { LEAKS_FOUND: result.value.leaksFound }
      if (!result.value.leaksFound) {
        return succeed(outputs)
      }

      if (context.state.get('FAIL_ON_LEAKS') === true) {
        return fail(new ToolFailure(`Secrets detected; see ${result.value.reportPath}`, 1), {
          outputs,
          exitCode: 1,
        })
      }

      return markUnstable(`Secrets detected; see ${result.value.reportPath}`, outputs, { exitCode: 1 })
    },
  })

  builder.stage({
    id: 'build',
    name: 'Build',
    run: async (context) => {
      const result = await tools(context).buildTool.build({
        projectPath: settings.projectDir,
        skipTests: context.state.get('SKIP_TESTS') === true,
      })
      if (!result.ok) {
        return fail(result.error)
      }

      return succeed(undefined, { message: `Packaged ${result.value.length} artifacts` })
    },
  })

  builder.stage({
    id: 'publish-artifacts',
    name: 'Publish Artifacts',
    when: (state) => state.get('DEPLOY_ARTIFACTS') === true,
    run: async (context) => {
      const result = await tools(context).buildTool.deploy(settings.projectDir)
      return result.ok ? succeed() : fail(result.error)
    },
  })

  builder.parallel('quality', [
    {
      id: 'static-analysis',
      name: 'Static Analysis',
      run: async (context) => {
        const result = await tools(context).staticAnalyzer.analyze({
          binariesPath: `${settings.projectDir}/target`,
          projectKey: settings.staticAnalysis.projectKey,
          organization: settings.staticAnalysis.organization,
          projectVersion: text(context.state, 'PROJECT_VERSION'),
        })
        if (!result.ok) {
          return fail(new ToolFailure('Static analysis failed', null, { cause: result.error }))
        }

        return succeed(undefined, { artifacts: [{ label: 'Static analysis', url: result.value }] })
      },
    },
    {
      id: 'dockerfile-check',
      name: 'Dockerfile Check',
      run: async (context) => {
        const result = await checkDockerfile(resolve(context.cwd, text(context.state, 'DOCKERFILE')))
        return result.ok
          ? succeed(undefined, { message: `Container runs as ${result.value.user}` })
          : fail(result.error)
      },
    },
  ])

  builder.stage({
    id: 'image-build',
    name: 'Image Build',
    run: async (context) => {
      const result = await tools(context).containerRuntime.buildImage({
        imageRef: text(context.state, 'IMAGE_NAME'),
        dockerfile: text(context.state, 'DOCKERFILE'),
        contextPath: '.',
      })
      return result.ok ? succeed() : fail(result.error)
    },
  })

  builder.stage({
    id: 'vulnerability-scan',
    name: 'Vulnerability Scan',
    outputs: ['SCAN_STATUS'],
    run: async (context) => await runVulnerabilityScan(context, tools(context), variant),
  })

  builder.stage({
    id: 'upload-report',
    name: 'Upload Report',
    run: async (context) => {
      const reportPath = text(context.state, 'REPORT_PATH')
      if ((await fileSize(resolve(context.cwd, reportPath))) === 0) {
        return skip('Scan report not found or empty; skipping upload')
      }

      const result = await tools(context).artifactStore.upload(
        reportPath,
        text(context.state, 'REPORT_KEY')
      )
      if (!result.ok) {
        return fail(result.error)
      }

      return succeed(undefined, {
        artifacts: [{ label: 'Vulnerability report', url: result.value }],
      })
    },
  })

  builder.stage({
    id: 'push-image',
    name: 'Push Image',
    reads: ['SCAN_STATUS'],
    retry: { maxAttempts: PUSH_ATTEMPTS },
    when: (state) => {
      const status = state.get('SCAN_STATUS')
      return (
        typeof status === 'number' &&
        canProceed(status, text(state, 'TRIVY_SEVERITY'), variant.toleratedSeverities)
      )
    },
    run: async (context) => {
      const imageRef = text(context.state, 'IMAGE_NAME')
      const result = await tools(context).containerRuntime.push(imageRef)
      return result.ok ? succeed(undefined, { message: `Pushed ${imageRef}` }) : fail(result.error)
    },
  })

  if (variant.smokeTest) {
    builder.stage({
      id: 'smoke-test',
      name: 'Smoke Test',
      outputs: ['CONTAINER_ID'],
      run: async (context) => {
        const collaborators = tools(context)
        const hostPort = text(context.state, 'HOST_PORT')
        const started = await collaborators.containerRuntime.run({
          imageRef: text(context.state, 'IMAGE_NAME'),
          containerName: text(context.state, 'CONTAINER_NAME'),
          portMap: `${hostPort}:${text(context.state, 'CONTAINER_PORT')}`,
        })
        if (!started.ok) {
          return fail(started.error)
        }

        const outputs = { CONTAINER_ID: started.value }
        await context.sleep(healthCheck.warmupMs)

        const url = `http://${healthCheck.host}:${hostPort}`
        const probe = await withRetry(
          async (): Promise<Result<number, PipelineError>> => {
            const response = await collaborators.healthProbe.httpGet(url)
            if (!response.ok || response.value === 200) {
              return response
            }
            return err(new ToolFailure(`${url} responded with status ${response.value}`))
          },
          {
            maxAttempts: healthCheck.attempts,
            delayMs: healthCheck.intervalMs,
            signal: context.signal,
            sleep: async (durationMs) => {
              await context.sleep(durationMs)
            },
            onRetry: (attempt, error) => {
              context.logger.warn(`Health check attempt ${attempt} failed: ${deepestMessage(error)}`)
            },
          }
        )

        if (!probe.result.ok) {
          return fail(
            new ToolFailure(`Health check failed after ${probe.attempts} attempts`, null, {
              cause: probe.result.error,
            }),
            { outputs }
          )
        }

        return succeed(outputs, { message: `${url} is healthy` })
      },
    })
  }

  builder.stage({
    id: 'cleanup',
    name: 'Cleanup',
    alwaysRun: true,
    failurePolicy: 'ignored',
    run: async (context) => {
      const runtime = tools(context).containerRuntime
      const containerName = text(context.state, 'CONTAINER_NAME')
      const imageRef = text(context.state, 'IMAGE_NAME')
      const steps: readonly (readonly [string, () => Promise<Result<void, PipelineError>>])[] = [
        [`stop ${containerName}`, async () => await runtime.stop(containerName)],
        [`remove ${containerName}`, async () => await runtime.remove(containerName)],
        [`remove image ${imageRef}`, async () => await runtime.removeImage(imageRef)],
      ]

      const failures: string[] = []
      for (const [label, step] of steps) {
        const result = await step()
        if (!result.ok) {
          const error = new CleanupError(`Could not ${label}`, { cause: result.error })
          context.logger.warn(`${error.message}: ${deepestMessage(error)}`)
          failures.push(label)
        }
      }

      if (failures.length > 0) {
        return fail(new CleanupError(`Cleanup incomplete: ${failures.join('; ')}`))
      }

      return succeed()
    },
  })

  return builder.build()
}

const runVulnerabilityScan = async (
  context: StageContext,
  collaborators: DeliveryCollaborators,
  variant: DeliveryVariant
): Promise<StageOutcome> => {
  const scanner = collaborators.vulnerabilityScanner
  const cacheDir = text(context.state, 'TRIVY_CACHE_DIR')

  const download = await withRetry(async () => await scanner.downloadDatabase(cacheDir), {
    maxAttempts: DATABASE_DOWNLOAD_ATTEMPTS,
    signal: context.signal,
    onRetry: (attempt, error) => {
      context.logger.warn(
        `Vulnerability database download attempt ${attempt} failed: ${deepestMessage(error)}`
      )
    },
  })
  if (!download.result.ok) {
    return fail(download.result.error)
  }

  const severityFilter = text(context.state, 'TRIVY_SEVERITY')
  const scanned = await scanner.scanImage({
    imageRef: text(context.state, 'IMAGE_NAME'),
    severityFilter,
    cacheDir,
    reportPath: text(context.state, 'REPORT_PATH'),
    ignoreUnfixed: variant.ignoreUnfixed,
  })
  if (!scanned.ok) {
    return fail(scanned.error)
  }

  const status = scanStatusFromExitCode(scanned.value.exitCode)
  const outputs = { SCAN_STATUS: scanned.value.exitCode }

  switch (status.verdict) {
    case 'clean':
      return succeed(outputs, {
        exitCode: status.code,
        message: `No ${severityFilter} vulnerabilities found`,
      })
    case 'findings':
      return markUnstable(`Vulnerabilities found with severity ${severityFilter}`, outputs, {
        exitCode: status.code,
      })
    case 'error':
      return fail(
        new ToolFailure(`Vulnerability scan failed with exit code ${status.code}`, status.code),
        { outputs, exitCode: status.code }
      )
  }
}

const text = (state: StateReader, key: string): string => {
  return String(state.require(key))
}

const fileSize = async (path: string): Promise<number> => {
  try {
    return (await stat(path)).size
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return 0
    }
    throw error
  }
}
