import type { LaunchFailure, PipelineError, PipelineErrorKind } from '../errors/pipelineErrors.js'
import type { PipelineLogger } from '../logging/logger.js'
import type { ArtifactLink } from './artifacts.js'
import type { HttpAdapter, ToolOutput } from './executor.js'
import type { StateValue } from './parameter.js'
import type { Result } from './result.js'
import type { StateReader } from './state.js'

/**
 * Terminal status of a pipeline stage.
 */
export type StageStatus = 'success' | 'failure' | 'unstable' | 'skipped'

/**
 * Effect of a stage failure on the pipeline.
 */
export type FailurePolicy = 'fatal' | 'unstable' | 'ignored'

/**
 * Reason attached to a non-success stage result.
 */
export type StageResultReason =
  | 'condition_not_met'
  | 'aborted'
  | 'cancelled'
  | 'stage_failed'
  | 'launch_failure'
  | 'failure_tolerated'
  | 'failure_ignored'
  | 'reported_unstable'
  | 'skipped_by_stage'

/**
 * Retry behavior for a stage body.
 */
export interface StageRetryPolicy {
  /** Maximum execution attempts including the first run. */
  readonly maxAttempts: number
  /** Fixed delay between attempts in milliseconds. */
  readonly delayMs?: number
}

/**
 * Outputs written by a stage body.
 */
export type StageOutputs = Readonly<Record<string, StateValue>>

/**
 * Tagged result returned by a stage body.
 */
export type StageOutcome =
  | {
      readonly status: 'success'
      readonly outputs?: StageOutputs
      readonly exitCode?: number | null
      readonly message?: string
      readonly artifacts?: readonly ArtifactLink[]
    }
  | {
      readonly status: 'unstable'
      readonly message: string
      readonly outputs?: StageOutputs
      readonly exitCode?: number | null
      readonly artifacts?: readonly ArtifactLink[]
    }
  | {
      readonly status: 'failure'
      readonly error: PipelineError
      readonly outputs?: StageOutputs
      readonly exitCode?: number | null
    }
  | {
      readonly status: 'skipped'
      readonly message: string
    }

/**
 * Options for one command launched from a stage body.
 */
export interface StageCommandOptions {
  /** Working directory, relative to the run directory. */
  readonly cwd?: string
  /** Extra environment variables. */
  readonly env?: Readonly<Record<string, string>>
  /** Timeout in milliseconds. */
  readonly timeoutMs?: number
}

/**
 * Runtime services handed to a stage body.
 */
export interface StageContext {
  /** Id of the running stage. */
  readonly stageId: string
  /** One-based attempt number. */
  readonly attempt: number
  /** State view limited to parameters, environment, declared reads and own outputs. */
  readonly state: StateReader
  /** Aborted when the stage's results will be discarded. */
  readonly signal: AbortSignal
  /** Logger bound to the stage id. */
  readonly logger: PipelineLogger
  /** Run working directory. */
  readonly cwd: string
  /** HTTP adapter shared by the run. */
  readonly http: HttpAdapter

  /**
   * Runs a command through the tool adapter. Refuses to launch once `signal` is aborted.
   */
  exec(command: string, options?: StageCommandOptions): Promise<Result<ToolOutput, LaunchFailure>>

  /**
   * Records a declared output for this attempt.
   *
   * @throws ConfigurationError when the key is not a declared output.
   */
  setOutput(key: string, value: StateValue): void

  /**
   * Waits for the given time, returning early when `signal` is aborted.
   */
  sleep(durationMs: number): Promise<void>
}

/**
 * Immutable definition of one pipeline stage.
 */
export interface StageDefinition {
  /** Unique stage id. */
  readonly id: string
  /** Display name, defaults to the id. */
  readonly name?: string
  /** Run condition. The stage is skipped when it returns false. */
  readonly when?: (state: StateReader) => boolean
  /** Stage body. */
  readonly run: (context: StageContext) => Promise<StageOutcome> | StageOutcome
  /** Failure effect, `fatal` by default. */
  readonly failurePolicy?: FailurePolicy
  /** Retry policy for the whole body. */
  readonly retry?: StageRetryPolicy
  /** Keys this stage may write. */
  readonly outputs?: readonly string[]
  /** Output keys of earlier stages this stage reads. */
  readonly reads?: readonly string[]
  /** Stages sharing a group id run concurrently. Members must be adjacent. */
  readonly parallelGroup?: string
  /** Runs even after the pipeline started aborting. */
  readonly alwaysRun?: boolean
}

/**
 * Serializable error details recorded on a stage result.
 */
export interface StageErrorDetails {
  readonly name: string
  readonly kind: PipelineErrorKind
  /** Message from the deepest error in the cause chain. */
  readonly message: string
}

/**
 * Immutable record of one stage's terminal state.
 */
export interface StageResult {
  readonly id: string
  readonly name: string
  readonly status: StageStatus
  readonly reason?: StageResultReason
  readonly failurePolicy: FailurePolicy
  readonly parallelGroup?: string
  readonly alwaysRun: boolean
  /** Number of body attempts, zero when the body never ran. */
  readonly attempts: number
  readonly retried: boolean
  readonly exitCode?: number | null
  readonly startedAt: number
  readonly finishedAt: number
  readonly durationMs: number
  /** Outputs applied to pipeline state. */
  readonly outputs: StageOutputs
  /** Artifacts published by the stage. */
  readonly artifacts: readonly ArtifactLink[]
  /** Note from the body for unstable or self-skipped outcomes. */
  readonly message?: string
  readonly error?: StageErrorDetails
}
