import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import {
  createSilentLogger,
  deepestMessage,
  ok,
  type HttpRequest,
  type StageCommandOptions,
  type ToolOutput,
} from '@shipline/core'

import type { CollaboratorSession } from '../src/collaborators/contracts.js'
import { createS3ArtifactStore, normalizeBucketName } from '../src/collaborators/s3ArtifactStore.js'
import {
  createDockerRuntime,
  createGitleaksScanner,
  createGitSourceControl,
  createHttpHealthProbe,
  createMavenBuildTool,
  createSonarScanner,
  createTrivyScanner,
} from '../src/collaborators/shellCollaborators.js'
import { shellQuote } from '../src/collaborators/shellTool.js'

interface RecordedCommand {
  readonly command: string
  readonly options?: StageCommandOptions
}

const createSession = (
  outputs: readonly Partial<ToolOutput>[] = [],
  cwd = '/workspace'
): { session: CollaboratorSession; commands: RecordedCommand[]; requests: HttpRequest[] } => {
  const commands: RecordedCommand[] = []
  const requests: HttpRequest[] = []

  const session: CollaboratorSession = {
    exec: async (command, options) => {
      const output = outputs[commands.length] ?? {}
      commands.push({ command, options })
      return ok({ exitCode: 0, signal: null, stdout: '', stderr: '', durationMs: 1, ...output })
    },
    http: async (request) => {
      requests.push(request)
      return ok({ status: 200, body: 'OK', durationMs: 1 })
    },
    cwd,
    logger: createSilentLogger(),
  }

  return { session, commands, requests }
}

const commandLines = (commands: readonly RecordedCommand[]): string[] => {
  return commands.map((entry) => entry.command)
}

describe('shellQuote', () => {
  it('leaves plain arguments alone', () => {
    expect(shellQuote('docker.io/acme/shop:1.0.0')).toBe('docker.io/acme/shop:1.0.0')
    expect(shellQuote('HIGH,CRITICAL')).toBe('HIGH,CRITICAL')
  })

  it('single-quotes everything else', () => {
    expect(shellQuote('')).toBe("''")
    expect(shellQuote('release notes')).toBe("'release notes'")
    expect(shellQuote("it's")).toBe(String.raw`'it'\''s'`)
  })
})

describe('createGitSourceControl', () => {
  it('fetches and checks out the branch with a token header', async () => {
    const { session, commands } = createSession()

    const result = await createGitSourceControl(session).checkout({
      repositoryUrl: 'https://git.example.com/acme/shop.git',
      branchName: 'feature/cart',
      credentialsRef: 'GIT_TOKEN',
      directory: '.',
    })

    expect(result).toEqual({ ok: true, value: '/workspace' })
    expect(commandLines(commands)).toEqual([
      'git init -q .',
      'git -c "http.extraHeader=Authorization: Bearer $GIT_TOKEN" -C . fetch --prune --depth 1 https://git.example.com/acme/shop.git +refs/heads/feature/cart:refs/remotes/origin/feature/cart',
      'git -C . checkout -q -f -B feature/cart refs/remotes/origin/feature/cart',
    ])
  })

  it('stops at the first failing git command', async () => {
    const { session, commands } = createSession([
      {},
      { exitCode: 128, stderr: "fatal: couldn't find remote ref refs/heads/missing\n" },
    ])

    const result = await createGitSourceControl(session).checkout({
      repositoryUrl: 'https://git.example.com/acme/shop.git',
      branchName: 'missing',
      directory: 'src',
    })

    expect(commands).toHaveLength(2)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Command exited with code 128: git -C src fetch --prune --depth 1 https://git.example.com/acme/shop.git +refs/heads/missing:refs/remotes/origin/missing'
      )
      expect(deepestMessage(result.error)).toBe("fatal: couldn't find remote ref refs/heads/missing")
    }
  })
})

describe('createGitleaksScanner', () => {
  it('reports leaks through exit code 1', async () => {
    const { session, commands } = createSession([{ exitCode: 1 }])

    const result = await createGitleaksScanner(session).detect({
      sourcePath: 'app',
      reportPath: 'gitleaks-reports/gitleaks-report.sarif',
    })

    expect(result).toEqual({
      ok: true,
      value: { leaksFound: true, reportPath: 'gitleaks-reports/gitleaks-report.sarif' },
    })
    expect(commandLines(commands)).toEqual([
      'mkdir -p gitleaks-reports && gitleaks detect --source app --report-format sarif --report-path gitleaks-reports/gitleaks-report.sarif --exit-code 1',
    ])
  })

  it('treats other exit codes as scanner failures', async () => {
    const { session } = createSession([{ exitCode: 2, stderr: 'invalid config\n' }])

    const result = await createGitleaksScanner(session).detect({
      sourcePath: 'app',
      reportPath: 'gitleaks-reports/gitleaks-report.sarif',
    })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Secret scan failed with exit code 2')
      expect(deepestMessage(result.error)).toBe('invalid config')
    }
  })
})

describe('createMavenBuildTool', () => {
  const createdDirectories: string[] = []

  afterEach(async () => {
    await Promise.all(
      createdDirectories.splice(0).map(async (directory) => {
        await rm(directory, { recursive: true, force: true })
      })
    )
  })

  it('packages the project and lists the archives in target', async () => {
    const workspace = await mkdtemp(join(tmpdir(), 'shipline-maven-'))
    createdDirectories.push(workspace)
    await mkdir(join(workspace, 'app', 'target', 'classes'), { recursive: true })
    await writeFile(join(workspace, 'app', 'target', 'shop.war'), '')
    await writeFile(join(workspace, 'app', 'target', 'shop-api.jar'), '')
    await writeFile(join(workspace, 'app', 'target', 'build.log'), '')
    const { session, commands } = createSession([], workspace)

    const result = await createMavenBuildTool(session).build({ projectPath: 'app', skipTests: true })

    expect(commands).toEqual([{ command: 'mvn -B clean package -DskipTests', options: { cwd: 'app' } }])
    expect(result).toEqual({
      ok: true,
      value: [
        resolve(workspace, 'app', 'target', 'shop-api.jar'),
        resolve(workspace, 'app', 'target', 'shop.war'),
      ],
    })
  })

  it('deploys from the project directory', async () => {
    const { session, commands } = createSession()

    const result = await createMavenBuildTool(session).deploy('app')

    expect(result.ok).toBe(true)
    expect(commands).toEqual([{ command: 'mvn -B deploy -DskipTests', options: { cwd: 'app' } }])
  })
})

describe('createSonarScanner', () => {
  it('runs the scanner and links the dashboard', async () => {
    const { session, commands } = createSession()

    const result = await createSonarScanner(session, 'https://sonar.example.com').analyze({
      binariesPath: 'app/target',
      projectKey: 'acme_shop',
      organization: 'acme',
      projectVersion: '1.0.0',
    })

    expect(result).toEqual({ ok: true, value: 'https://sonar.example.com/dashboard?id=acme_shop' })
    expect(commandLines(commands)).toEqual([
      'sonar-scanner -Dsonar.host.url=https://sonar.example.com -Dsonar.organization=acme -Dsonar.projectKey=acme_shop -Dsonar.projectVersion=1.0.0 -Dsonar.java.binaries=app/target',
    ])
  })
})

describe('createDockerRuntime', () => {
  it('returns the id of a started container', async () => {
    const { session, commands } = createSession([{ stdout: 'c0ffee\n' }])

    const result = await createDockerRuntime(session).run({
      imageRef: 'docker.io/acme/shop:1.0.0',
      containerName: 'shop-smoke',
      portMap: '8084:8080',
    })

    expect(result).toEqual({ ok: true, value: 'c0ffee' })
    expect(commandLines(commands)).toEqual([
      'docker run --name shop-smoke -d -p 8084:8080 docker.io/acme/shop:1.0.0',
    ])
  })

  it('builds without cache and removes forcefully', async () => {
    const { session, commands } = createSession()
    const runtime = createDockerRuntime(session)

    await runtime.buildImage({
      imageRef: 'docker.io/acme/shop:1.0.0',
      dockerfile: 'app/Dockerfile',
      contextPath: '.',
    })
    await runtime.remove('shop-smoke')
    await runtime.removeImage('docker.io/acme/shop:1.0.0')

    expect(commandLines(commands)).toEqual([
      'docker build --no-cache --pull -t docker.io/acme/shop:1.0.0 -f app/Dockerfile .',
      'docker rm -f shop-smoke',
      'docker rmi -f docker.io/acme/shop:1.0.0',
    ])
  })

  it('keeps the command output tail as the failure cause', async () => {
    const { session } = createSession([
      { exitCode: 1, stdout: 'The push refers to repository\n', stderr: 'denied: access forbidden\n' },
    ])

    const result = await createDockerRuntime(session).push('docker.io/acme/shop:1.0.0')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Command exited with code 1: docker push docker.io/acme/shop:1.0.0')
      expect(deepestMessage(result.error)).toBe('The push refers to repository\ndenied: access forbidden')
    }
  })
})

describe('createTrivyScanner', () => {
  it('passes findings through as the exit code', async () => {
    const { session, commands } = createSession([{ exitCode: 1 }])

    const result = await createTrivyScanner(session).scanImage({
      imageRef: 'ghcr.io/acme/shop:1.0.0',
      severityFilter: 'HIGH,CRITICAL',
      cacheDir: '.trivy-cache',
      reportPath: 'trivy-reports/trivy-report.html',
      ignoreUnfixed: true,
    })

    expect(result).toEqual({
      ok: true,
      value: { exitCode: 1, reportPath: 'trivy-reports/trivy-report.html' },
    })
    expect(commandLines(commands)).toEqual([
      'mkdir -p trivy-reports && trivy image --exit-code 1 --cache-dir .trivy-cache --severity HIGH,CRITICAL --no-progress --format table --output trivy-reports/trivy-report.html --ignore-unfixed ghcr.io/acme/shop:1.0.0',
    ])
  })

  it('reports a scan ended by a signal as exit code -1', async () => {
    const { session } = createSession([{ exitCode: null, signal: 'SIGKILL' }])

    const result = await createTrivyScanner(session).scanImage({
      imageRef: 'docker.io/acme/shop:1.0.0',
      severityFilter: 'CRITICAL',
      cacheDir: '.trivy-cache',
      reportPath: 'trivy-reports/trivy-report.html',
      ignoreUnfixed: false,
    })

    expect(result).toEqual({
      ok: true,
      value: { exitCode: -1, reportPath: 'trivy-reports/trivy-report.html' },
    })
  })

  it('downloads the database into the cache directory', async () => {
    const { session, commands } = createSession()

    const result = await createTrivyScanner(session).downloadDatabase('.trivy-cache')

    expect(result.ok).toBe(true)
    expect(commandLines(commands)).toEqual([
      'mkdir -p .trivy-cache && trivy image --download-db-only --cache-dir .trivy-cache',
    ])
  })
})

describe('createHttpHealthProbe', () => {
  it('returns the response status', async () => {
    const { session, requests } = createSession()

    const result = await createHttpHealthProbe(session).httpGet('http://localhost:8084')

    expect(result).toEqual({ ok: true, value: 200 })
    expect(requests).toEqual([{ url: 'http://localhost:8084', method: 'GET', timeoutMs: 10_000 }])
  })
})

describe('createS3ArtifactStore', () => {
  it('normalizes bucket names', () => {
    expect(normalizeBucketName('s3://acme-reports/')).toBe('acme-reports')
    expect(normalizeBucketName('acme-reports')).toBe('acme-reports')
  })

  it('uploads with the aws CLI and returns the object URL', async () => {
    const { session, commands } = createSession()

    const result = await createS3ArtifactStore(session, 's3://acme-reports').upload(
      'trivy-reports/trivy-report.html',
      'trivy-reports/dockerhub/1.0.0/trivy-report.html'
    )

    expect(result).toEqual({
      ok: true,
      value: 's3://acme-reports/trivy-reports/dockerhub/1.0.0/trivy-report.html',
    })
    expect(commandLines(commands)).toEqual([
      'aws s3 cp trivy-reports/trivy-report.html s3://acme-reports/trivy-reports/dockerhub/1.0.0/trivy-report.html',
    ])
  })

  it('downloads to the given path', async () => {
    const { session, commands } = createSession()

    const result = await createS3ArtifactStore(session, 'acme-reports').download(
      '/reports/latest.html',
      'latest.html'
    )

    expect(result).toEqual({ ok: true, value: 'latest.html' })
    expect(commandLines(commands)).toEqual(['aws s3 cp s3://acme-reports/reports/latest.html latest.html'])
  })
})
