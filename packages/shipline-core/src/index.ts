export type { ArtifactLink, ArtifactStore } from './contracts/artifacts.js'
export type {
  HttpAdapter,
  HttpRequest,
  HttpResponse,
  ToolAdapter,
  ToolInvocationRequest,
  ToolOutput,
} from './contracts/executor.js'
export type { NotificationChannel, NotificationMessage, Notifier } from './contracts/notifier.js'
export type {
  BooleanParameterDefinition,
  ChoiceParameterDefinition,
  ParameterDefinition,
  ParameterType,
  ParameterValues,
  StateValue,
  StringParameterDefinition,
} from './contracts/parameter.js'
export type { PipelineReporter } from './contracts/reporter.js'
export { err, ok, type Result } from './contracts/result.js'
export type {
  EnvironmentComputer,
  PipelineDefinition,
  PipelineRun,
  PipelineRunOptions,
  PipelineStatus,
  PipelineSummary,
  RunErrorDetails,
  Sleep,
} from './contracts/run.js'
export type {
  FailurePolicy,
  StageCommandOptions,
  StageContext,
  StageDefinition,
  StageErrorDetails,
  StageOutcome,
  StageOutputs,
  StageResult,
  StageResultReason,
  StageRetryPolicy,
  StageStatus,
} from './contracts/stage.js'
export type { PipelineStateSnapshot, StateReader } from './contracts/state.js'

export { fail, markUnstable, skip, succeed } from './definition/outcomes.js'
export { collectParameterDefinitionIssues, resolveParameters } from './definition/parameters.js'
export { definePipeline, PipelineBuilder } from './definition/pipelineBuilder.js'
export { toStageUnits, type StageUnit } from './definition/stageUnits.js'
export { collectOutputOwners, validatePipelineDefinition } from './definition/validatePipeline.js'

export {
  CleanupError,
  ConfigurationError,
  deepestMessage,
  escalateTransient,
  LaunchFailure,
  PipelineError,
  toPipelineError,
  ToolFailure,
  TransientNetworkError,
  type PipelineErrorKind,
} from './errors/pipelineErrors.js'

export { createFetchHttpAdapter } from './execution/fetchHttpAdapter.js'
export { createNodeToolAdapter } from './execution/nodeToolAdapter.js'

export {
  canProceed,
  isToleratedFilter,
  normalizeSeverityFilter,
  scanStatusFromExitCode,
  type ScanStatus,
  type ScanVerdict,
} from './gating/scanGate.js'

export {
  createConsoleLogger,
  createSilentLogger,
  type ConsoleLoggerOptions,
  type LogFields,
  type LogLevel,
  type PipelineLogger,
} from './logging/logger.js'

export {
  createChannelNotifier,
  createNoopNotifier,
  type ChannelNotifierOptions,
} from './notification/channelNotifier.js'
export {
  buildRunReport,
  renderRunReportHtml,
  renderSubject,
  type JobIdentity,
  type RunReport,
  type RunReportStage,
} from './notification/runReport.js'

export { formatPipelineRunAsJson } from './reporters/jsonFormatter.js'
export { abortableSleep, withRetry, type RetryOptions, type RetryOutcome } from './retry/withRetry.js'
export { createPipelineRunner, deriveStatus, PipelineRunner } from './runner/pipelineRunner.js'
export { createStageStateView, PipelineState } from './state/pipelineState.js'
