import type { PipelineRun } from './run.js'
import type { StageDefinition, StageResult } from './stage.js'

/**
 * Event hooks for pipeline run reporting.
 */
export interface PipelineReporter {
  /**
   * Called once before any stage starts.
   *
   * @param stages Stages in declared order.
   */
  onPipelineStart?(stages: readonly StageDefinition[]): Promise<void> | void

  /**
   * Called before a stage's run condition is evaluated. Not called for stages
   * skipped because the run is aborting.
   *
   * @param stage Stage definition.
   * @param index Zero-based position in the declared order.
   */
  onStageStart?(stage: StageDefinition, index: number): Promise<void> | void

  /**
   * Called once per stage with its terminal result.
   *
   * @param result Stage result.
   * @param index Zero-based position in the declared order.
   */
  onStageComplete?(result: StageResult, index: number): Promise<void> | void

  /**
   * Called once after the run is finalized.
   *
   * @param run Final run data.
   */
  onPipelineComplete?(run: PipelineRun): Promise<void> | void
}
