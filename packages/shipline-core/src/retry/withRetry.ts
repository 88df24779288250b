import type { Result } from '../contracts/result.js'
import type { Sleep } from '../contracts/run.js'

/**
 * Fixed-interval retry settings.
 */
export interface RetryOptions<E> {
  /** Total attempts including the first one. Values below 1 mean one attempt. */
  readonly maxAttempts: number
  /** Constant delay between attempts in milliseconds. */
  readonly delayMs?: number
  /** Stops retrying once aborted; the pending delay ends early. */
  readonly signal?: AbortSignal
  readonly sleep?: Sleep
  /** Called before each delay with the failed attempt number and its error. */
  readonly onRetry?: (attempt: number, error: E) => void
}

/**
 * Final result of a retried operation.
 */
export interface RetryOutcome<T, E> {
  readonly result: Result<T, E>
  /** Number of times the operation was invoked. */
  readonly attempts: number
}

/**
 * Resolves after the given time, or as soon as the signal aborts.
 */
export const abortableSleep: Sleep = (durationMs, signal) => {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }

    const onAbort = (): void => {
      clearTimeout(timeoutHandle)
      resolve()
    }

    const timeoutHandle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, durationMs)

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Invokes an operation until it succeeds or the attempts run out.
 *
 * The first success is returned immediately. When every attempt fails, the
 * last failure is returned.
 *
 * @param operation Operation receiving the one-based attempt number.
 * @param options Retry settings.
 */
export const withRetry = async <T, E>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  options: RetryOptions<E>
): Promise<RetryOutcome<T, E>> => {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts))
  const delayMs = Math.max(0, options.delayMs ?? 0)
  const sleep = options.sleep ?? abortableSleep

  let attempts = 0

  for (;;) {
    attempts += 1
    const result = await operation(attempts)

    if (result.ok || attempts >= maxAttempts || options.signal?.aborted) {
      return { result, attempts }
    }

    options.onRetry?.(attempts, result.error)

    if (delayMs > 0) {
      await sleep(delayMs, options.signal)
    }

    if (options.signal?.aborted) {
      return { result, attempts }
    }
  }
}
