import type {
  ArtifactStore,
  HttpAdapter,
  PipelineError,
  PipelineLogger,
  Result,
  StageContext,
} from '@shipline/core'

/**
 * Services of the running stage that collaborators act through.
 */
export interface CollaboratorSession {
  /** Command launcher of the current stage. */
  readonly exec: StageContext['exec']
  readonly http: HttpAdapter
  /** Run working directory. */
  readonly cwd: string
  readonly logger: PipelineLogger
}

export interface CheckoutRequest {
  readonly repositoryUrl: string
  readonly branchName: string
  /** Environment variable holding the access token. */
  readonly credentialsRef?: string
  /** Target directory, relative to the run directory. */
  readonly directory: string
}

/**
 * Source-control system.
 */
export interface SourceControl {
  /**
   * Fetches a shallow copy of a branch.
   *
   * @returns Path of the working directory.
   */
  checkout(request: CheckoutRequest): Promise<Result<string, PipelineError>>
}

export interface SecretScanReport {
  readonly leaksFound: boolean
  readonly reportPath: string
}

/**
 * Secret scanner run over the source tree.
 */
export interface SecretScanner {
  detect(request: {
    readonly sourcePath: string
    readonly reportPath: string
  }): Promise<Result<SecretScanReport, PipelineError>>
}

/**
 * Language build tool.
 */
export interface BuildTool {
  /**
   * Compiles and packages the project.
   *
   * @returns Paths of the packaged artifacts.
   */
  build(request: {
    readonly projectPath: string
    readonly skipTests: boolean
  }): Promise<Result<readonly string[], PipelineError>>

  /** Publishes packaged artifacts to the artifact repository. */
  deploy(projectPath: string): Promise<Result<void, PipelineError>>
}

export interface AnalysisRequest {
  readonly binariesPath: string
  readonly projectKey: string
  readonly organization: string
  readonly projectVersion: string
}

/**
 * Static-analysis service.
 */
export interface StaticAnalyzer {
  /**
   * @returns Link to the analysis report.
   */
  analyze(request: AnalysisRequest): Promise<Result<string, PipelineError>>
}

export interface RunContainerRequest {
  readonly imageRef: string
  readonly containerName: string
  /** `host:container` port mapping. */
  readonly portMap: string
}

/**
 * Container runtime and registry client.
 */
export interface ContainerRuntime {
  buildImage(request: {
    readonly imageRef: string
    readonly dockerfile: string
    readonly contextPath: string
  }): Promise<Result<void, PipelineError>>
  push(imageRef: string): Promise<Result<void, PipelineError>>
  /**
   * Starts a detached container.
   *
   * @returns Container id.
   */
  run(request: RunContainerRequest): Promise<Result<string, PipelineError>>
  stop(containerName: string): Promise<Result<void, PipelineError>>
  remove(containerName: string): Promise<Result<void, PipelineError>>
  removeImage(imageRef: string): Promise<Result<void, PipelineError>>
}

export interface ImageScanRequest {
  readonly imageRef: string
  /** Comma-separated severities the scan reports on. */
  readonly severityFilter: string
  readonly cacheDir: string
  readonly reportPath: string
  readonly ignoreUnfixed: boolean
}

export interface ImageScanReport {
  /** Scanner exit code: 0 clean, 1 findings, anything else an error. */
  readonly exitCode: number
  readonly reportPath: string
}

/**
 * Container image vulnerability scanner.
 */
export interface VulnerabilityScanner {
  downloadDatabase(cacheDir: string): Promise<Result<void, PipelineError>>
  /**
   * Scans an image. Findings are reported through the exit code, not as an error.
   */
  scanImage(request: ImageScanRequest): Promise<Result<ImageScanReport, PipelineError>>
}

/**
 * HTTP reachability check.
 */
export interface HealthProbe {
  /**
   * @returns Response status code.
   */
  httpGet(url: string): Promise<Result<number, PipelineError>>
}

/**
 * Every external system the delivery pipeline talks to.
 */
export interface DeliveryCollaborators {
  readonly sourceControl: SourceControl
  readonly secretScanner: SecretScanner
  readonly buildTool: BuildTool
  readonly staticAnalyzer: StaticAnalyzer
  readonly containerRuntime: ContainerRuntime
  readonly vulnerabilityScanner: VulnerabilityScanner
  readonly artifactStore: ArtifactStore
  readonly healthProbe: HealthProbe
}

/**
 * Binds collaborators to the session of one stage attempt.
 */
export type CollaboratorFactory = (session: CollaboratorSession) => DeliveryCollaborators
