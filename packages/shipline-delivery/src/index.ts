export { checkDockerfile, checkDockerfileContent, type DockerfileCheckResult } from './checks/dockerfileCheck.js'
export type {
  AnalysisRequest,
  BuildTool,
  CheckoutRequest,
  CollaboratorFactory,
  CollaboratorSession,
  ContainerRuntime,
  DeliveryCollaborators,
  HealthProbe,
  ImageScanReport,
  ImageScanRequest,
  RunContainerRequest,
  SecretScanner,
  SecretScanReport,
  SourceControl,
  StaticAnalyzer,
  VulnerabilityScanner,
} from './collaborators/contracts.js'
export { createS3ArtifactStore, normalizeBucketName } from './collaborators/s3ArtifactStore.js'
export {
  createDockerRuntime,
  createGitleaksScanner,
  createGitSourceControl,
  createHttpHealthProbe,
  createMavenBuildTool,
  createShellCollaborators,
  createSonarScanner,
  createTrivyScanner,
  type ShellCollaboratorOptions,
} from './collaborators/shellCollaborators.js'
export { runTool, shellQuote, toToolFailure } from './collaborators/shellTool.js'

export {
  createDeliveryPipeline,
  SCAN_REPORT_PATH,
  SECRET_REPORT_PATH,
  type DeliveryPipelineOptions,
} from './deliveryPipeline.js'
export {
  createHttpDownstreamTrigger,
  DownstreamTriggerReporter,
  type DownstreamTrigger,
  type DownstreamTriggerReporterOptions,
  type TriggerVerdict,
} from './downstream/downstreamTrigger.js'
export { createDeliveryNotifier, type DeliveryNotifierOptions } from './notification/deliveryNotifier.js'
export { createMailRelayChannel } from './notification/mailRelayChannel.js'
export { resolveRecipients } from './recipients.js'
export { runDelivery, type RunDeliveryOptions } from './runDelivery.js'
export { loadDeliverySettings, parseDeliverySettings } from './settings/loadDeliverySettings.js'
export type {
  DeliverySettings,
  DownstreamSettings,
  HealthCheckSettings,
  StaticAnalysisSettings,
} from './settings/types.js'
export { DELIVERY_VARIANTS, findDeliveryVariant, type DeliveryVariant } from './variants.js'
