import { readdir } from 'node:fs/promises'
import { posix, resolve } from 'node:path'

import { err, ok, ToolFailure, type PipelineError, type Result } from '@shipline/core'

import type {
  AnalysisRequest,
  BuildTool,
  CheckoutRequest,
  CollaboratorFactory,
  CollaboratorSession,
  ContainerRuntime,
  HealthProbe,
  ImageScanRequest,
  SecretScanner,
  SourceControl,
  StaticAnalyzer,
  VulnerabilityScanner,
} from './contracts.js'
import { createS3ArtifactStore } from './s3ArtifactStore.js'
import { runTool, shellQuote } from './shellTool.js'

const DEFAULT_ANALYSIS_HOST = 'https://sonarcloud.io'
const HEALTH_CHECK_TIMEOUT_MS = 10_000
const PACKAGED_ARTIFACT_PATTERN = /\.(jar|war)$/u

/**
 * Options for the shell-backed collaborators.
 */
export interface ShellCollaboratorOptions {
  /** Bucket receiving uploaded reports. */
  readonly reportBucket: string
  /** Static analysis server URL. */
  readonly analysisHostUrl?: string
}

/**
 * Creates collaborators that drive git, gitleaks, mvn, sonar-scanner, docker,
 * trivy and the aws CLI through the stage's command launcher.
 */
export const createShellCollaborators = (options: ShellCollaboratorOptions): CollaboratorFactory => {
  return (session) => ({
    sourceControl: createGitSourceControl(session),
    secretScanner: createGitleaksScanner(session),
    buildTool: createMavenBuildTool(session),
    staticAnalyzer: createSonarScanner(session, options.analysisHostUrl ?? DEFAULT_ANALYSIS_HOST),
    containerRuntime: createDockerRuntime(session),
    vulnerabilityScanner: createTrivyScanner(session),
    artifactStore: createS3ArtifactStore(session, options.reportBucket),
    healthProbe: createHttpHealthProbe(session),
  })
}

export const createGitSourceControl = (session: CollaboratorSession): SourceControl => {
  return {
    checkout: async (request: CheckoutRequest): Promise<Result<string, PipelineError>> => {
      const directory = shellQuote(request.directory)
      const branch = request.branchName
      const auth = request.credentialsRef
        ? ` -c "http.extraHeader=Authorization: Bearer $${request.credentialsRef}"`
        : ''
      const commands = [
        `git init -q ${directory}`,
        `git${auth} -C ${directory} fetch --prune --depth 1 ${shellQuote(request.repositoryUrl)} ${shellQuote(`+refs/heads/${branch}:refs/remotes/origin/${branch}`)}`,
        `git -C ${directory} checkout -q -f -B ${shellQuote(branch)} ${shellQuote(`refs/remotes/origin/${branch}`)}`,
      ]

      for (const command of commands) {
        const result = await runTool(session, command)
        if (!result.ok) {
          return result
        }
      }

      return ok(resolve(session.cwd, request.directory))
    },
  }
}

export const createGitleaksScanner = (session: CollaboratorSession): SecretScanner => {
  return {
    detect: async (request) => {
      const reportDirectory = posix.dirname(request.reportPath)
      const command = [
        `mkdir -p ${shellQuote(reportDirectory)} &&`,
        'gitleaks detect',
        `--source ${shellQuote(request.sourcePath)}`,
        '--report-format sarif',
        `--report-path ${shellQuote(request.reportPath)}`,
        '--exit-code 1',
      ].join(' ')

      const result = await session.exec(command)
      if (!result.ok) {
        return err(result.error)
      }

      const { exitCode } = result.value
      if (exitCode !== 0 && exitCode !== 1) {
        return err(
          new ToolFailure(`Secret scan failed with exit code ${exitCode ?? 'null'}`, exitCode, {
            cause: new Error(result.value.stderr.trim() || result.value.stdout.trim()),
          })
        )
      }

      return ok({ leaksFound: exitCode === 1, reportPath: request.reportPath })
    },
  }
}

export const createMavenBuildTool = (session: CollaboratorSession): BuildTool => {
  return {
    build: async (request) => {
      const command = `mvn -B clean package${request.skipTests ? ' -DskipTests' : ''}`
      const result = await runTool(session, command, { cwd: request.projectPath })
      if (!result.ok) {
        return result
      }

      const targetDirectory = resolve(session.cwd, request.projectPath, 'target')
      let entries: string[]
      try {
        entries = await readdir(targetDirectory)
      } catch (error: unknown) {
        return err(
          new ToolFailure(`Build output directory not found: ${targetDirectory}`, null, {
            cause: error,
          })
        )
      }

      return ok(
        entries
          .filter((entry) => PACKAGED_ARTIFACT_PATTERN.test(entry))
          .sort()
          .map((entry) => resolve(targetDirectory, entry))
      )
    },
    deploy: async (projectPath) => {
      const result = await runTool(session, 'mvn -B deploy -DskipTests', { cwd: projectPath })
      return result.ok ? ok(undefined) : result
    },
  }
}

export const createSonarScanner = (session: CollaboratorSession, hostUrl: string): StaticAnalyzer => {
  return {
    analyze: async (request: AnalysisRequest) => {
      const command = [
        'sonar-scanner',
        `-Dsonar.host.url=${shellQuote(hostUrl)}`,
        `-Dsonar.organization=${shellQuote(request.organization)}`,
        `-Dsonar.projectKey=${shellQuote(request.projectKey)}`,
        `-Dsonar.projectVersion=${shellQuote(request.projectVersion)}`,
        `-Dsonar.java.binaries=${shellQuote(request.binariesPath)}`,
      ].join(' ')

      const result = await runTool(session, command)
      if (!result.ok) {
        return result
      }

      const dashboard = new URL('/dashboard', hostUrl)
      dashboard.searchParams.set('id', request.projectKey)
      return ok(dashboard.toString())
    },
  }
}

export const createDockerRuntime = (session: CollaboratorSession): ContainerRuntime => {
  const runVoid = async (command: string): Promise<Result<void, PipelineError>> => {
    const result = await runTool(session, command)
    return result.ok ? ok(undefined) : result
  }

  return {
    buildImage: async (request) => {
      return await runVoid(
        `docker build --no-cache --pull -t ${shellQuote(request.imageRef)} -f ${shellQuote(request.dockerfile)} ${shellQuote(request.contextPath)}`
      )
    },
    push: async (imageRef) => await runVoid(`docker push ${shellQuote(imageRef)}`),
    run: async (request) => {
      const result = await runTool(
        session,
        `docker run --name ${shellQuote(request.containerName)} -d -p ${shellQuote(request.portMap)} ${shellQuote(request.imageRef)}`
      )
      return result.ok ? ok(result.value.stdout.trim()) : result
    },
    stop: async (containerName) => await runVoid(`docker stop ${shellQuote(containerName)}`),
    remove: async (containerName) => await runVoid(`docker rm -f ${shellQuote(containerName)}`),
    removeImage: async (imageRef) => await runVoid(`docker rmi -f ${shellQuote(imageRef)}`),
  }
}

export const createTrivyScanner = (session: CollaboratorSession): VulnerabilityScanner => {
  return {
    downloadDatabase: async (cacheDir) => {
      const quoted = shellQuote(cacheDir)
      const result = await runTool(
        session,
        `mkdir -p ${quoted} && trivy image --download-db-only --cache-dir ${quoted}`
      )
      return result.ok ? ok(undefined) : result
    },
    scanImage: async (request: ImageScanRequest) => {
      const command = [
        `mkdir -p ${shellQuote(posix.dirname(request.reportPath))} &&`,
        'trivy image',
        '--exit-code 1',
        `--cache-dir ${shellQuote(request.cacheDir)}`,
        `--severity ${shellQuote(request.severityFilter)}`,
        '--no-progress',
        '--format table',
        `--output ${shellQuote(request.reportPath)}`,
        ...(request.ignoreUnfixed ? ['--ignore-unfixed'] : []),
        shellQuote(request.imageRef),
      ].join(' ')

      const result = await session.exec(command)
      if (!result.ok) {
        return err(result.error)
      }

      return ok({ exitCode: result.value.exitCode ?? -1, reportPath: request.reportPath })
    },
  }
}

export const createHttpHealthProbe = (session: CollaboratorSession): HealthProbe => {
  return {
    httpGet: async (url) => {
      const result = await session.http({ url, method: 'GET', timeoutMs: HEALTH_CHECK_TIMEOUT_MS })
      return result.ok ? ok(result.value.status) : err(result.error)
    },
  }
}
