import type { ArtifactLink } from '../contracts/artifacts.js'
import type { StageOutcome, StageOutputs } from '../contracts/stage.js'
import type { PipelineError } from '../errors/pipelineErrors.js'

export const succeed = (
  outputs?: StageOutputs,
  extras: { readonly exitCode?: number | null; readonly message?: string; readonly artifacts?: readonly ArtifactLink[] } = {}
): StageOutcome => {
  return { status: 'success', outputs, ...extras }
}

export const markUnstable = (
  message: string,
  outputs?: StageOutputs,
  extras: { readonly exitCode?: number | null; readonly artifacts?: readonly ArtifactLink[] } = {}
): StageOutcome => {
  return { status: 'unstable', message, outputs, ...extras }
}

export const fail = (
  error: PipelineError,
  extras: { readonly exitCode?: number | null; readonly outputs?: StageOutputs } = {}
): StageOutcome => {
  return { status: 'failure', error, ...extras }
}

/**
 * Ends the stage without doing its work, e.g. when there is nothing to publish.
 */
export const skip = (message: string): StageOutcome => {
  return { status: 'skipped', message }
}
