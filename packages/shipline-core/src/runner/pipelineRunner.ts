import { resolve } from 'node:path'

import type { ArtifactLink } from '../contracts/artifacts.js'
import type { HttpAdapter } from '../contracts/executor.js'
import type { Notifier } from '../contracts/notifier.js'
import type { ParameterValues, StateValue } from '../contracts/parameter.js'
import { err, ok } from '../contracts/result.js'
import type {
  PipelineDefinition,
  PipelineRun,
  PipelineRunOptions,
  PipelineStatus,
  PipelineSummary,
  Sleep,
} from '../contracts/run.js'
import type {
  FailurePolicy,
  StageContext,
  StageDefinition,
  StageErrorDetails,
  StageOutcome,
  StageOutputs,
  StageResult,
  StageResultReason,
  StageStatus,
} from '../contracts/stage.js'
import { fail } from '../definition/outcomes.js'
import { resolveParameters } from '../definition/parameters.js'
import { toStageUnits, type StageUnit } from '../definition/stageUnits.js'
import { collectOutputOwners, validatePipelineDefinition } from '../definition/validatePipeline.js'
import {
  ConfigurationError,
  LaunchFailure,
  type PipelineError,
  deepestMessage,
  escalateTransient,
  toPipelineError,
} from '../errors/pipelineErrors.js'
import { createFetchHttpAdapter } from '../execution/fetchHttpAdapter.js'
import { createSilentLogger, type PipelineLogger } from '../logging/logger.js'
import { createNoopNotifier } from '../notification/channelNotifier.js'
import { abortableSleep, withRetry } from '../retry/withRetry.js'
import { PipelineState, createStageStateView } from '../state/pipelineState.js'

interface StageExecution {
  readonly result: StageResult
  /** True when the stage failed under the fatal policy. */
  readonly fatal: boolean
}

interface AttemptRecord {
  readonly outcome: StageOutcome
  readonly outputs: StageOutputs
}

type ScheduledMember = StageUnit['members'][number]

/**
 * Pipeline execution engine for staged CI/CD runs.
 *
 * Stages run in declared order; adjacent stages sharing a parallel group run
 * concurrently. A fatal failure stops the main sequence, after which only
 * `alwaysRun` stages execute.
 */
export class PipelineRunner {
  private readonly options: PipelineRunOptions
  private readonly now: () => number
  private readonly sleep: Sleep
  private readonly logger: PipelineLogger
  private readonly http: HttpAdapter
  private readonly notifier: Notifier
  private readonly cwd: string

  /**
   * Creates a pipeline runner.
   *
   * @param options Runtime options.
   */
  public constructor(options: PipelineRunOptions) {
    this.options = options
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? abortableSleep
    this.logger = options.logger ?? createSilentLogger()
    this.http = options.http ?? createFetchHttpAdapter()
    this.notifier = options.notifier ?? createNoopNotifier()
    this.cwd = options.cwd ?? process.cwd()
  }

  /**
   * Executes the pipeline once.
   *
   * @returns Final run data. Configuration errors are reported in the result, not thrown.
   */
  public async run(): Promise<PipelineRun> {
    const runStartedAt = this.now()
    const pipeline = this.options.pipeline

    let parameters: ParameterValues
    let environment: Readonly<Record<string, StateValue>>
    try {
      validatePipelineDefinition(pipeline)
      parameters = resolveParameters(pipeline.parameters, this.options.parameters)
      environment = computeEnvironment(pipeline, parameters)
    } catch (error: unknown) {
      if (!(error instanceof ConfigurationError)) {
        throw error
      }
      return await this.finalizeConfigurationFailure(error, runStartedAt)
    }

    const state = new PipelineState(parameters, environment, collectOutputOwners(pipeline))
    const results = new Map<number, StageResult>()
    let aborted = false

    await this.emitPipelineStart(pipeline.stages)

    for (const unit of toStageUnits(pipeline.stages)) {
      if (this.options.signal?.aborted && !aborted) {
        this.logger.warn('Run cancelled; only alwaysRun stages will execute')
        aborted = true
      }

      const runnable: ScheduledMember[] = []
      for (const member of unit.members) {
        if (aborted && !member.stage.alwaysRun) {
          const skipped = this.buildResult(member.stage, {
            status: 'skipped',
            reason: 'aborted',
            attempts: 0,
            startedAt: this.now(),
          })
          results.set(member.index, skipped)
          await this.emitStageComplete(skipped, member.index)
          continue
        }
        runnable.push(member)
      }

      if (runnable.length === 0) {
        continue
      }

      const runSignal = aborted ? undefined : this.options.signal
      const fatal =
        unit.parallelGroup === undefined
          ? await this.runSequential(runnable, state, results, runSignal)
          : await this.runParallel(runnable, state, results, runSignal)

      if (fatal && !aborted) {
        this.logger.error('Fatal stage failure; aborting remaining stages')
        aborted = true
      }
    }

    const stageResults = pipeline.stages.flatMap((_, index) => {
      const result = results.get(index)
      return result ? [result] : []
    })

    const runFinishedAt = this.now()
    const cancelled = this.options.signal?.aborted ?? false
    const status = cancelled ? 'failure' : deriveStatus(stageResults)
    const run: PipelineRun = {
      pipelineId: pipeline.id,
      status,
      stages: stageResults,
      summary: buildSummary(stageResults, runFinishedAt - runStartedAt),
      exitCode: status === 'failure' || (status === 'unstable' && this.options.failOnUnstable) ? 1 : 0,
      aborted,
      state: state.snapshot(),
      artifacts: stageResults.flatMap((result) => result.artifacts),
      startedAt: runStartedAt,
      finishedAt: runFinishedAt,
    }

    await this.dispatchNotification(run)
    await this.emitPipelineComplete(run)

    return run
  }

  private async runSequential(
    members: readonly ScheduledMember[],
    state: PipelineState,
    results: Map<number, StageResult>,
    runSignal: AbortSignal | undefined
  ): Promise<boolean> {
    let fatal = false

    for (const member of members) {
      const controller = new AbortController()
      const unlink = linkSignal(runSignal, controller)

      await this.emitStageStart(member.stage, member.index)
      const execution = await this.executeStage(member.stage, state, controller.signal)
      unlink()

      this.commit(state, execution.result)
      results.set(member.index, execution.result)
      await this.emitStageComplete(execution.result, member.index)

      fatal = fatal || execution.fatal
    }

    return fatal
  }

  private async runParallel(
    members: readonly ScheduledMember[],
    state: PipelineState,
    results: Map<number, StageResult>,
    runSignal: AbortSignal | undefined
  ): Promise<boolean> {
    const controller = new AbortController()
    const unlink = linkSignal(runSignal, controller)
    const executions = new Map<number, StageExecution>()
    const failFast = this.options.failFast ?? false

    for (const member of members) {
      await this.emitStageStart(member.stage, member.index)
    }

    await new Promise<void>((resolveGroup) => {
      let pending = members.length
      let groupFailed = false

      const settle = (member: ScheduledMember, execution: StageExecution): void => {
        if (groupFailed) {
          this.logger.debug('Discarding result of cancelled parallel stage', {
            stage: member.stage.id,
          })
          return
        }

        executions.set(member.index, execution)
        pending -= 1

        if (execution.fatal && failFast) {
          groupFailed = true
          controller.abort()
          resolveGroup()
          return
        }

        if (pending === 0) {
          resolveGroup()
        }
      }

      for (const member of members) {
        void this.executeStage(member.stage, state, controller.signal)
          .catch((error: unknown) =>
            this.mapFailure(member.stage, toPipelineError(error), {}, 0, this.now(), undefined, this.logger)
          )
          .then((execution) => {
            settle(member, execution)
          })
      }
    })

    unlink()

    let fatal = false
    for (const member of members) {
      const execution = executions.get(member.index) ?? {
        result: this.buildResult(member.stage, {
          status: 'skipped',
          reason: 'cancelled',
          attempts: 0,
          startedAt: this.now(),
        }),
        fatal: false,
      }

      this.commit(state, execution.result)
      results.set(member.index, execution.result)
      fatal = fatal || execution.fatal
    }

    for (const member of members) {
      const result = results.get(member.index)
      if (result) {
        await this.emitStageComplete(result, member.index)
      }
    }

    return fatal
  }

  private commit(state: PipelineState, result: StageResult): void {
    if (Object.keys(result.outputs).length > 0) {
      state.commit(result.id, result.outputs)
    }
  }

  private async executeStage(
    stage: StageDefinition,
    state: PipelineState,
    signal: AbortSignal
  ): Promise<StageExecution> {
    const startedAt = this.now()
    const logger = this.logger.child({ stage: stage.id })
    const readable = new Set([...(stage.reads ?? []), ...(stage.outputs ?? [])])

    try {
      if (stage.when && !stage.when(createStageStateView(state, stage.id, readable))) {
        return {
          result: this.buildResult(stage, {
            status: 'skipped',
            reason: 'condition_not_met',
            attempts: 0,
            startedAt,
          }),
          fatal: false,
        }
      }
    } catch (error: unknown) {
      return this.mapFailure(stage, toPipelineError(error), {}, 0, startedAt, undefined, logger)
    }

    const retried = await withRetry<AttemptRecord, AttemptRecord>(
      async (attempt) => {
        const record = await this.runAttempt(stage, state, readable, attempt, signal, logger)
        return record.outcome.status === 'failure' ? err(record) : ok(record)
      },
      {
        maxAttempts: stage.retry?.maxAttempts ?? 1,
        delayMs: stage.retry?.delayMs,
        signal,
        sleep: this.sleep,
        onRetry: (attempt, record) => {
          logger.warn(`Attempt ${attempt} failed; retrying`, {
            error: record.outcome.status === 'failure' ? deepestMessage(record.outcome.error) : undefined,
          })
        },
      }
    )

    const { outcome, outputs } = retried.result.ok ? retried.result.value : retried.result.error
    const attempts = retried.attempts

    switch (outcome.status) {
      case 'success':
        return {
          result: this.buildResult(stage, {
            status: 'success',
            attempts,
            startedAt,
            exitCode: outcome.exitCode,
            outputs,
            message: outcome.message,
            artifacts: outcome.artifacts,
          }),
          fatal: false,
        }
      case 'unstable':
        logger.warn(`Stage reported unstable: ${outcome.message}`)
        return {
          result: this.buildResult(stage, {
            status: 'unstable',
            reason: 'reported_unstable',
            attempts,
            startedAt,
            exitCode: outcome.exitCode,
            outputs,
            message: outcome.message,
            artifacts: outcome.artifacts,
          }),
          fatal: false,
        }
      case 'skipped':
        return {
          result: this.buildResult(stage, {
            status: 'skipped',
            reason: 'skipped_by_stage',
            attempts,
            startedAt,
            message: outcome.message,
          }),
          fatal: false,
        }
      case 'failure':
        return this.mapFailure(
          stage,
          escalateTransient(outcome.error),
          outputs,
          attempts,
          startedAt,
          outcome.exitCode,
          logger
        )
    }
  }

  private async runAttempt(
    stage: StageDefinition,
    state: PipelineState,
    readable: ReadonlySet<string>,
    attempt: number,
    signal: AbortSignal,
    logger: PipelineLogger
  ): Promise<AttemptRecord> {
    const declaredOutputs = new Set(stage.outputs ?? [])
    const staged = new Map<string, StateValue>()

    const context: StageContext = {
      stageId: stage.id,
      attempt,
      state: createStageStateView(state, stage.id, readable, staged),
      signal,
      logger,
      cwd: this.cwd,
      http: this.http,
      exec: async (command, commandOptions = {}) => {
        if (signal.aborted) {
          return err(new LaunchFailure(`Stage ${stage.id} was cancelled before running: ${command}`))
        }

        return await this.options.adapter({
          command,
          cwd: resolve(this.cwd, commandOptions.cwd ?? '.'),
          env: {
            ...this.options.env,
            ...state.toCommandEnvironment([...readable]),
            ...Object.fromEntries([...staged].map(([key, value]) => [key, String(value)])),
            ...commandOptions.env,
          },
          timeoutMs: commandOptions.timeoutMs,
        })
      },
      setOutput: (key, value) => {
        if (!declaredOutputs.has(key)) {
          throw new ConfigurationError(`Stage ${stage.id} cannot write undeclared output ${key}`)
        }
        staged.set(key, value)
      },
      sleep: async (durationMs) => {
        await this.sleep(durationMs, signal)
      },
    }

    let outcome: StageOutcome
    try {
      outcome = await stage.run(context)
    } catch (error: unknown) {
      outcome = fail(toPipelineError(error))
    }

    if (outcome.status === 'skipped') {
      return { outcome, outputs: {} }
    }

    const outputs: Record<string, StateValue> = { ...Object.fromEntries(staged), ...outcome.outputs }
    const undeclared = Object.keys(outputs).filter((key) => !declaredOutputs.has(key))
    if (undeclared.length > 0) {
      return {
        outcome: fail(
          new ConfigurationError(
            `Stage ${stage.id} cannot write undeclared output ${undeclared.join(', ')}`
          )
        ),
        outputs: {},
      }
    }

    return { outcome, outputs }
  }

  private mapFailure(
    stage: StageDefinition,
    error: PipelineError,
    outputs: StageOutputs,
    attempts: number,
    startedAt: number,
    exitCode: number | null | undefined,
    logger: PipelineLogger
  ): StageExecution {
    const policy = stage.failurePolicy ?? 'fatal'
    const common = { attempts, startedAt, exitCode, outputs, error }

    if (policy === 'ignored') {
      logger.warn(`Ignoring stage failure: ${deepestMessage(error)}`)
      return {
        result: this.buildResult(stage, { ...common, status: 'skipped', reason: 'failure_ignored' }),
        fatal: false,
      }
    }

    if (policy === 'unstable') {
      logger.warn(`Stage failure tolerated as unstable: ${deepestMessage(error)}`)
      return {
        result: this.buildResult(stage, {
          ...common,
          status: 'unstable',
          reason: 'failure_tolerated',
        }),
        fatal: false,
      }
    }

    logger.error(`Stage failed: ${deepestMessage(error)}`)
    return {
      result: this.buildResult(stage, {
        ...common,
        status: 'failure',
        reason: error instanceof LaunchFailure ? 'launch_failure' : 'stage_failed',
      }),
      fatal: true,
    }
  }

  private buildResult(
    stage: StageDefinition,
    input: {
      readonly status: StageStatus
      readonly reason?: StageResultReason
      readonly attempts: number
      readonly startedAt: number
      readonly exitCode?: number | null
      readonly outputs?: StageOutputs
      readonly message?: string
      readonly artifacts?: readonly ArtifactLink[]
      readonly error?: PipelineError
    }
  ): StageResult {
    const finishedAt = this.now()
    const failurePolicy: FailurePolicy = stage.failurePolicy ?? 'fatal'

    return {
      id: stage.id,
      name: stage.name ?? stage.id,
      status: input.status,
      reason: input.reason,
      failurePolicy,
      parallelGroup: stage.parallelGroup,
      alwaysRun: stage.alwaysRun ?? false,
      attempts: input.attempts,
      retried: input.attempts > 1,
      exitCode: input.exitCode,
      startedAt: input.startedAt,
      finishedAt,
      durationMs: finishedAt - input.startedAt,
      outputs: input.outputs ?? {},
      artifacts: input.artifacts ?? [],
      message: input.message,
      error: input.error ? toErrorDetails(input.error) : undefined,
    }
  }

  private async finalizeConfigurationFailure(
    error: ConfigurationError,
    runStartedAt: number
  ): Promise<PipelineRun> {
    this.logger.error(error.message)
    const runFinishedAt = this.now()

    const run: PipelineRun = {
      pipelineId: this.options.pipeline.id,
      status: 'failure',
      stages: [],
      summary: buildSummary([], runFinishedAt - runStartedAt),
      exitCode: 2,
      aborted: false,
      error: { name: error.name, message: error.message, issues: error.issues },
      state: { parameters: {}, environment: {}, outputs: {} },
      artifacts: [],
      startedAt: runStartedAt,
      finishedAt: runFinishedAt,
    }

    await this.emitPipelineComplete(run)

    return run
  }

  private async dispatchNotification(run: PipelineRun): Promise<void> {
    if (run.stages.every((result) => result.status === 'skipped')) {
      return
    }

    try {
      await this.notifier.notify(run)
    } catch (error: unknown) {
      this.logger.error(`Notification failed: ${deepestMessage(error)}`)
    }
  }

  private async emitPipelineStart(stages: readonly StageDefinition[]): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onPipelineStart?.(stages)
    }
  }

  private async emitStageStart(stage: StageDefinition, index: number): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onStageStart?.(stage, index)
    }
  }

  private async emitStageComplete(result: StageResult, index: number): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onStageComplete?.(result, index)
    }
  }

  private async emitPipelineComplete(run: PipelineRun): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onPipelineComplete?.(run)
    }
  }
}

/**
 * Creates a pipeline runner instance.
 *
 * @param options Runtime options.
 * @returns Pipeline runner.
 */
export const createPipelineRunner = (options: PipelineRunOptions): PipelineRunner => {
  return new PipelineRunner(options)
}

/**
 * Derives the overall status. Failure outranks unstable, which outranks success.
 *
 * @param results Stage results.
 */
export const deriveStatus = (results: readonly StageResult[]): PipelineStatus => {
  if (results.some((result) => result.status === 'failure')) {
    return 'failure'
  }

  if (results.some((result) => result.status === 'unstable')) {
    return 'unstable'
  }

  return 'success'
}

const computeEnvironment = (
  pipeline: PipelineDefinition,
  parameters: ParameterValues
): Readonly<Record<string, StateValue>> => {
  const environment: Record<string, StateValue> = {}

  for (const [name, compute] of pipeline.environment) {
    try {
      environment[name] = compute(parameters)
    } catch (error: unknown) {
      throw new ConfigurationError(
        `Environment value ${name} could not be computed: ${deepestMessage(error)}`,
        error instanceof ConfigurationError ? error.issues : [],
        { cause: error }
      )
    }
  }

  return Object.freeze(environment)
}

const linkSignal = (source: AbortSignal | undefined, target: AbortController): (() => void) => {
  if (!source) {
    return (): void => undefined
  }

  if (source.aborted) {
    target.abort()
    return (): void => undefined
  }

  const onAbort = (): void => {
    target.abort()
  }
  source.addEventListener('abort', onAbort, { once: true })

  return (): void => {
    source.removeEventListener('abort', onAbort)
  }
}

const toErrorDetails = (error: PipelineError): StageErrorDetails => {
  return {
    name: error.name,
    kind: error.kind,
    message: deepestMessage(error),
  }
}

const buildSummary = (results: readonly StageResult[], durationMs: number): PipelineSummary => {
  const count = (status: StageStatus): number =>
    results.filter((result) => result.status === status).length

  return {
    total: results.length,
    succeeded: count('success'),
    failed: count('failure'),
    unstable: count('unstable'),
    skipped: count('skipped'),
    durationMs,
  }
}
