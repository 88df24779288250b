export type { CliOptions } from './cliOptions.js'
export { getCliHelpText, parseCliOptions } from './cliOptions.js'

export type {
  CliOutputFormat,
  ConfigExitCodes,
  ConfigScanGate,
  ConfigStage,
  ConfigStageCapture,
  ConfigStageCondition,
  ConfigStageRetryPolicy,
  ShiplineConfig,
  ShiplineNotifyConfig,
  ShiplineVariant,
} from './config/types.js'
export { loadShiplineConfig } from './config/loadConfig.js'
export {
  mapConfigToPipeline,
  type ExcludedPipelineStage,
  type MapConfigOptions,
  type MappedPipeline,
} from './config/mapConfigToPipeline.js'

export { createWebhookChannel } from './notification/webhookChannel.js'
export { PrettyReporter, type PrettyReporterOptions } from './reporters/prettyReporter.js'

export type { RunCliPipelineOptions } from './runPipeline.js'
export { runCliPipeline } from './runPipeline.js'
