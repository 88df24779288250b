import {
  deepestMessage,
  err,
  ok,
  type HttpAdapter,
  type PipelineError,
  type PipelineLogger,
  type PipelineReporter,
  type PipelineRun,
  type Result,
} from '@shipline/core'

export type TriggerVerdict = 'accepted' | 'rejected'

/**
 * Starts a job on the CI server.
 */
export interface DownstreamTrigger {
  triggerJob(
    jobName: string,
    parameters: Readonly<Record<string, string>>
  ): Promise<Result<TriggerVerdict, PipelineError>>
}

/**
 * Trigger using the CI server's `buildWithParameters` endpoint.
 *
 * @param baseUrl CI server base URL.
 * @param http HTTP adapter.
 */
export const createHttpDownstreamTrigger = (baseUrl: string, http: HttpAdapter): DownstreamTrigger => {
  return {
    triggerJob: async (jobName, parameters) => {
      const query = new URLSearchParams(parameters).toString()
      const url = `${baseUrl.replace(/\/+$/u, '')}/job/${encodeURIComponent(jobName)}/buildWithParameters${query.length > 0 ? `?${query}` : ''}`

      const result = await http({ url, method: 'POST' })
      if (!result.ok) {
        return err(result.error)
      }

      return ok(result.value.status >= 200 && result.value.status < 300 ? 'accepted' : 'rejected')
    },
  }
}

/**
 * Options for {@link DownstreamTriggerReporter}.
 */
export interface DownstreamTriggerReporterOptions {
  readonly trigger: DownstreamTrigger
  readonly jobName: string
  readonly logger: PipelineLogger
  /** Parameters passed to the downstream job, taken from the final state by default. */
  readonly parameters?: (run: PipelineRun) => Readonly<Record<string, string>>
}

/**
 * Triggers a downstream job once a run finished with overall success.
 */
export class DownstreamTriggerReporter implements PipelineReporter {
  private readonly options: DownstreamTriggerReporterOptions

  public constructor(options: DownstreamTriggerReporterOptions) {
    this.options = options
  }

  public async onPipelineComplete(run: PipelineRun): Promise<void> {
    if (run.status !== 'success') {
      return
    }

    const { trigger, jobName, logger } = this.options
    const parameters = this.options.parameters?.(run) ?? defaultParameters(run)
    const result = await trigger.triggerJob(jobName, parameters)

    if (!result.ok) {
      logger.error(`Downstream trigger for ${jobName} failed: ${deepestMessage(result.error)}`)
      return
    }

    if (result.value === 'rejected') {
      logger.warn(`Downstream job ${jobName} rejected the trigger`)
      return
    }

    logger.info(`Triggered downstream job ${jobName}`)
  }
}

const defaultParameters = (run: PipelineRun): Record<string, string> => {
  const values = { ...run.state.parameters, ...run.state.environment }
  const parameters: Record<string, string> = {}

  for (const key of ['BRANCH_NAME', 'PROJECT_VERSION', 'IMAGE_NAME']) {
    const value = values[key]
    if (value !== undefined) {
      parameters[key] = String(value)
    }
  }

  return parameters
}
