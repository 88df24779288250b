/**
 * Classification of pipeline errors.
 */
export type PipelineErrorKind = 'configuration' | 'launch' | 'tool' | 'transient_network' | 'cleanup'

/**
 * Base class for every error raised or reported by the pipeline engine.
 */
export class PipelineError extends Error {
  public readonly kind: PipelineErrorKind

  public constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PipelineError'
    this.kind = kind
  }
}

/**
 * Bad or missing parameter, invalid definition, or undeclared state key.
 */
export class ConfigurationError extends PipelineError {
  public readonly issues: readonly string[]

  public constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super('configuration', message, options)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

/**
 * External tool could not be started, or did not finish before its timeout.
 */
export class LaunchFailure extends PipelineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('launch', message, options)
    this.name = 'LaunchFailure'
  }
}

/**
 * External tool ran and reported an error.
 */
export class ToolFailure extends PipelineError {
  public readonly exitCode: number | null

  public constructor(message: string, exitCode: number | null = null, options?: { cause?: unknown }) {
    super('tool', message, options)
    this.name = 'ToolFailure'
    this.exitCode = exitCode
  }
}

/**
 * Network call failed in a way that may succeed when retried.
 */
export class TransientNetworkError extends PipelineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('transient_network', message, options)
    this.name = 'TransientNetworkError'
  }
}

/**
 * Resource release failed. Logged, never escalated.
 */
export class CleanupError extends PipelineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('cleanup', message, options)
    this.name = 'CleanupError'
  }
}

/**
 * Normalizes any thrown value into a pipeline error.
 *
 * @param error Thrown value.
 * @returns The value itself when already a pipeline error, otherwise a tool failure wrapping it.
 */
export const toPipelineError = (error: unknown): PipelineError => {
  if (error instanceof PipelineError) {
    return error
  }

  const message = error instanceof Error ? error.message : String(error)
  return new ToolFailure(message, null, { cause: error })
}

/**
 * Returns the message of the innermost error in a `cause` chain.
 *
 * @param error Outermost error.
 * @returns Message from the deepest collaborator call.
 */
export const deepestMessage = (error: unknown): string => {
  let current: unknown = error
  let message = error instanceof Error ? error.message : String(error)
  const visited = new Set<unknown>()

  while (current instanceof Error && !visited.has(current)) {
    visited.add(current)
    if (current.message.length > 0) {
      message = current.message
    }
    current = current.cause
  }

  return message
}

/**
 * Escalates an exhausted transient error to a tool failure, leaving other errors untouched.
 *
 * @param error Last error after retries.
 * @returns Error to report.
 */
export const escalateTransient = (error: PipelineError): PipelineError => {
  if (error instanceof TransientNetworkError) {
    return new ToolFailure(`Retries exhausted: ${error.message}`, null, { cause: error })
  }

  return error
}
