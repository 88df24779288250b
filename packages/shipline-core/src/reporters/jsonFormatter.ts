import type { PipelineRun } from '../contracts/run.js'

/**
 * Formats pipeline run data as JSON output.
 *
 * @param run Pipeline run.
 * @param indentation Number of spaces used for indentation.
 * @returns JSON representation.
 */
export const formatPipelineRunAsJson = (run: PipelineRun, indentation = 2): string => {
  return JSON.stringify(run, null, indentation)
}
