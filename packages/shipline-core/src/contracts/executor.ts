import type { LaunchFailure, TransientNetworkError } from '../errors/pipelineErrors.js'
import type { Result } from './result.js'

/**
 * Input contract for one external command invocation.
 */
export interface ToolInvocationRequest {
  /** Shell command to execute. */
  readonly command: string
  /** Working directory used for this process. */
  readonly cwd: string
  /** Environment variables merged over the process environment. */
  readonly env: NodeJS.ProcessEnv
  /** Optional process timeout in milliseconds. */
  readonly timeoutMs?: number
}

/**
 * Captured output of a command that ran to completion.
 */
export interface ToolOutput {
  /** Exit code returned by the process, or null when ended by a signal. */
  readonly exitCode: number | null
  /** Termination signal if process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout content. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
  /** Total command duration in milliseconds. */
  readonly durationMs: number
}

/**
 * Runs an external command. A nonzero exit code is a normal result; only
 * start failures and timeouts produce a `LaunchFailure`.
 */
export type ToolAdapter = (request: ToolInvocationRequest) => Promise<Result<ToolOutput, LaunchFailure>>

/**
 * Input contract for one HTTP call.
 */
export interface HttpRequest {
  readonly url: string
  readonly method?: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD'
  readonly headers?: Readonly<Record<string, string>>
  readonly body?: string
  /** Optional request timeout in milliseconds. */
  readonly timeoutMs?: number
}

/**
 * Response of a completed HTTP call, whatever its status code.
 */
export interface HttpResponse {
  readonly status: number
  readonly body: string
  readonly durationMs: number
}

/**
 * Performs an HTTP call. Connection errors are transient; timeouts are launch failures.
 */
export type HttpAdapter = (
  request: HttpRequest
) => Promise<Result<HttpResponse, LaunchFailure | TransientNetworkError>>
