import type { PipelineLogger } from '../logging/logger.js'
import type { ArtifactLink } from './artifacts.js'
import type { HttpAdapter, ToolAdapter } from './executor.js'
import type { Notifier } from './notifier.js'
import type { ParameterDefinition, ParameterValues, StateValue } from './parameter.js'
import type { PipelineReporter } from './reporter.js'
import type { StageDefinition, StageResult } from './stage.js'
import type { PipelineStateSnapshot } from './state.js'

/**
 * Overall status of a finished run. Worst stage status wins.
 */
export type PipelineStatus = 'success' | 'unstable' | 'failure'

/**
 * Computes one environment value from the validated parameters.
 */
export type EnvironmentComputer = (parameters: ParameterValues) => StateValue

/**
 * Validated, immutable pipeline graph.
 */
export interface PipelineDefinition {
  /** Stable pipeline id used in reports. */
  readonly id: string
  /** Declared parameters. */
  readonly parameters: readonly ParameterDefinition[]
  /** Environment values computed once at run start, in declaration order. */
  readonly environment: readonly (readonly [string, EnvironmentComputer])[]
  /** Stages in declared order. Adjacent stages sharing a group id form a parallel unit. */
  readonly stages: readonly StageDefinition[]
}

/**
 * Summary counts for one pipeline run.
 */
export interface PipelineSummary {
  readonly total: number
  readonly succeeded: number
  readonly failed: number
  readonly unstable: number
  readonly skipped: number
  /** Total pipeline runtime in milliseconds. */
  readonly durationMs: number
}

/**
 * Error that stopped the run before any stage executed.
 */
export interface RunErrorDetails {
  readonly name: string
  readonly message: string
  readonly issues: readonly string[]
}

/**
 * Final pipeline run data.
 */
export interface PipelineRun {
  readonly pipelineId: string
  readonly status: PipelineStatus
  /** Ordered stage results. Empty when configuration failed. */
  readonly stages: readonly StageResult[]
  readonly summary: PipelineSummary
  /** Process-style exit code: 0 pass, 1 failure, 2 configuration error. */
  readonly exitCode: 0 | 1 | 2
  /** True when a fatal failure or cancellation stopped the main sequence. */
  readonly aborted: boolean
  readonly error?: RunErrorDetails
  /** Final state, including outputs applied by stages. */
  readonly state: PipelineStateSnapshot
  /** Artifact links published by stages, in stage order. */
  readonly artifacts: readonly ArtifactLink[]
  /** Run start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Run finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
}

/**
 * Sleep function used for retry delays. Resolves early when the signal aborts.
 */
export type Sleep = (durationMs: number, signal?: AbortSignal) => Promise<void>

/**
 * Runtime options used by the pipeline runner.
 */
export interface PipelineRunOptions {
  /** Pipeline graph to execute. */
  readonly pipeline: PipelineDefinition
  /** Caller-supplied parameter values, validated before any stage runs. */
  readonly parameters?: Readonly<Record<string, unknown>>
  /** Command adapter implementation. */
  readonly adapter: ToolAdapter
  /** HTTP adapter, defaults to one backed by the global fetch. */
  readonly http?: HttpAdapter
  /** Optional reporters for lifecycle hooks. */
  readonly reporters?: readonly PipelineReporter[]
  /** Final report dispatcher, invoked at most once. Defaults to a no-op notifier. */
  readonly notifier?: Notifier
  /** Diagnostic logger, silent by default. */
  readonly logger?: PipelineLogger
  /** Default working directory for commands. */
  readonly cwd?: string
  /** Base environment merged into each command. */
  readonly env?: NodeJS.ProcessEnv
  /** Marks a parallel group failed on its first fatal member instead of waiting for all. */
  readonly failFast?: boolean
  /** Reports an unstable run with exit code 1. */
  readonly failOnUnstable?: boolean
  /** External cancellation. Aborting behaves like a fatal failure. */
  readonly signal?: AbortSignal
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
  /** Sleep function injection for deterministic retry tests. */
  readonly sleep?: Sleep
}
