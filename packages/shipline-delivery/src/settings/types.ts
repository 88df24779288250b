/**
 * Static analysis service coordinates.
 */
export interface StaticAnalysisSettings {
  readonly organization: string
  readonly projectKey: string
  /** Server URL. Defaults to SonarCloud. */
  readonly hostUrl?: string
}

/**
 * Smoke test timing.
 */
export interface HealthCheckSettings {
  /** Host the container port is published on. Defaults to `localhost`. */
  readonly host?: string
  /** Health check attempts. Defaults to 3. */
  readonly attempts?: number
  /** Wait between attempts in milliseconds. Defaults to 5000. */
  readonly intervalMs?: number
  /** Wait after the container starts in milliseconds. Defaults to 30000. */
  readonly warmupMs?: number
}

/**
 * Job triggered after a successful delivery.
 */
export interface DownstreamSettings {
  /** Base URL of the CI server. */
  readonly baseUrl: string
  readonly jobName: string
}

/**
 * Installation-specific settings shared by every delivery variant.
 */
export interface DeliverySettings {
  /** Git remote to check out. */
  readonly repositoryUrl: string
  /** Name of the environment variable holding the git access token. */
  readonly credentialsRef?: string
  /** Application directory containing the build descriptor. */
  readonly projectDir: string
  /** Dockerfile path. Defaults to `<projectDir>/Dockerfile`. */
  readonly dockerfile?: string
  /** Image repository without registry host, e.g. `acme/shop`. */
  readonly imageRepository: string
  readonly staticAnalysis: StaticAnalysisSettings
  /** Bucket receiving scan reports, with or without `s3://`. */
  readonly reportBucket: string
  /** Vulnerability database cache directory. Defaults to `.trivy-cache`. */
  readonly trivyCacheDir?: string
  /** Known recipients by user id. */
  readonly recipients: Readonly<Record<string, string>>
  /** Mail relay endpoint used for run reports. */
  readonly mailRelayUrl?: string
  readonly downstream?: DownstreamSettings
  readonly healthCheck?: HealthCheckSettings
}
