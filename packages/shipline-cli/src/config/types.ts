import type { FailurePolicy, ParameterDefinition, StateValue } from '@shipline/core'

/**
 * Supported output formats for the CLI.
 */
export type CliOutputFormat = 'pretty' | 'json'

/**
 * Retry behavior for a config stage.
 */
export interface ConfigStageRetryPolicy {
  /** Maximum execution attempts including the first run. */
  readonly maxAttempts: number
  /** Delay between retry attempts in milliseconds. */
  readonly delayMs?: number
}

/**
 * Scan gate evaluated before a publish-type stage.
 */
export interface ConfigScanGate {
  /** Output key holding the scanner exit code. */
  readonly statusKey: string
  /** Parameter holding the severity filter the scan ran with. */
  readonly severityParam: string
  /** Severity filters under which findings do not block the stage. */
  readonly tolerated: readonly string[]
}

/**
 * Run condition for one stage. Every listed check must hold.
 */
export interface ConfigStageCondition {
  /** Exact parameter matches, compared as strings. */
  readonly params?: Readonly<Record<string, StateValue>>
  /** Exact output matches, compared as strings. */
  readonly outputs?: Readonly<Record<string, StateValue>>
  /**
   * Exact process environment matches. Evaluated before the run; a mismatch
   * excludes the stage instead of skipping it.
   */
  readonly env?: Readonly<Record<string, string>>
  readonly scanGate?: ConfigScanGate
}

/**
 * Maps a command exit code onto a stage outcome.
 */
export interface ConfigExitCodes {
  /** Exit codes treated as success. Defaults to `[0]`. */
  readonly success?: readonly number[]
  /** Exit codes treated as unstable. */
  readonly unstable?: readonly number[]
}

/**
 * Stores part of the last command's result as a stage output.
 */
export type ConfigStageCapture =
  | {
      readonly key: string
      readonly from: 'exitCode'
    }
  | {
      readonly key: string
      readonly from: 'stdout'
      /** Regular expression; the first capture group, or the whole match, is stored. */
      readonly pattern: string
    }

/**
 * User-facing stage definition loaded from config.
 */
export interface ConfigStage {
  /** Stable stage id. */
  readonly id: string
  /** Display name shown in output. */
  readonly name?: string
  /** Shell command to execute. */
  readonly command?: string
  /** Shell commands executed in order; the first failing one ends the stage. */
  readonly commands?: readonly string[]
  /** Enables execution for this stage when true. */
  readonly enabled?: boolean
  /** Relative or absolute working directory for this stage. */
  readonly cwd?: string
  /** Environment additions for this stage. */
  readonly env?: Readonly<Record<string, string>>
  /** Command timeout in milliseconds. */
  readonly timeoutMs?: number
  /** Retry policy for this stage. */
  readonly retry?: ConfigStageRetryPolicy
  readonly failurePolicy?: FailurePolicy
  readonly alwaysRun?: boolean
  readonly parallelGroup?: string
  readonly exitCodes?: ConfigExitCodes
  readonly captures?: readonly ConfigStageCapture[]
  /** Output keys of earlier stages exposed to this stage's commands. */
  readonly reads?: readonly string[]
  readonly when?: ConfigStageCondition
}

/**
 * Named configuration record selecting parameter defaults and a subset of stages.
 */
export interface ShiplineVariant {
  /** Stable variant id used by CLI flags. */
  readonly id: string
  /** Display name. */
  readonly name: string
  /** Optional short details. */
  readonly description?: string
  /** Parameter values applied before values given on the command line. */
  readonly parameters?: Readonly<Record<string, StateValue>>
  /** Optional stage id allow-list. */
  readonly includeStageIds?: readonly string[]
  /** Optional stage id deny-list applied after include filtering. */
  readonly excludeStageIds?: readonly string[]
}

/**
 * Webhook notification settings.
 */
export interface ShiplineNotifyConfig {
  /** URL receiving the report as a JSON POST. */
  readonly webhookUrl: string
  /** Recipient addresses forwarded in the payload. */
  readonly to?: readonly string[]
  /** Subject template with `{{job}}`, `{{build}}` and `{{status}}` placeholders. */
  readonly subject?: string
}

/**
 * Top-level CLI config model.
 */
export interface ShiplineConfig {
  /** Pipeline id used in reports. Defaults to `pipeline`. */
  readonly name?: string
  readonly parameters?: readonly ParameterDefinition[]
  /** Environment templates using `${NAME}` over parameters and earlier entries. */
  readonly environment?: Readonly<Record<string, string>>
  /** Ordered stage list. */
  readonly stages: readonly ConfigStage[]
  readonly variants?: readonly ShiplineVariant[]
  /** Cancels running parallel siblings on the first fatal failure. */
  readonly failFast?: boolean
  /** Exits with code 1 on an unstable run. */
  readonly failOnUnstable?: boolean
  /** Base environment merged into all commands. */
  readonly env?: Readonly<Record<string, string>>
  /** Relative or absolute working directory for the whole pipeline. */
  readonly cwd?: string
  /** Default output behavior from config. */
  readonly output?: {
    readonly format?: CliOutputFormat
    /** Prints stage notes and retry details when true. */
    readonly verbose?: boolean
  }
  readonly notify?: ShiplineNotifyConfig
}
