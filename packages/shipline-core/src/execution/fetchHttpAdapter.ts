import type { HttpAdapter, HttpRequest, HttpResponse } from '../contracts/executor.js'
import { err, ok, type Result } from '../contracts/result.js'
import { LaunchFailure, TransientNetworkError } from '../errors/pipelineErrors.js'

/**
 * Creates an HTTP adapter on top of `fetch`.
 *
 * @param fetchImpl Fetch implementation, the global one by default.
 * @returns HTTP adapter implementation.
 */
export const createFetchHttpAdapter = (fetchImpl: typeof fetch = fetch): HttpAdapter => {
  return async (
    request: HttpRequest
  ): Promise<Result<HttpResponse, LaunchFailure | TransientNetworkError>> => {
    const startedAt = Date.now()
    const controller = new AbortController()
    const timeoutHandle =
      typeof request.timeoutMs === 'number' && request.timeoutMs > 0
        ? setTimeout(() => {
            controller.abort()
          }, request.timeoutMs)
        : null

    try {
      const response = await fetchImpl(request.url, {
        method: request.method ?? 'GET',
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      })
      const body = await response.text()

      return ok({
        status: response.status,
        body,
        durationMs: Date.now() - startedAt,
      })
    } catch (error: unknown) {
      if (controller.signal.aborted) {
        return err(
          new LaunchFailure(`Request timed out after ${request.timeoutMs}ms: ${request.url}`, {
            cause: error,
          })
        )
      }

      const message = error instanceof Error ? error.message : String(error)
      return err(
        new TransientNetworkError(`Request to ${request.url} failed: ${message}`, { cause: error })
      )
    } finally {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle)
      }
    }
  }
}
