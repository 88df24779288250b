import { describe, expect, it } from 'vitest'

import {
  ConfigurationError,
  deepestMessage,
  escalateTransient,
  LaunchFailure,
  toPipelineError,
  ToolFailure,
  TransientNetworkError,
} from '../src/index.js'

describe('pipeline errors', () => {
  it('keeps pipeline errors and wraps anything else as a tool failure', () => {
    const launch = new LaunchFailure('Command not found: trivy')
    expect(toPipelineError(launch)).toBe(launch)

    const wrapped = toPipelineError(new Error('disk full'))
    expect(wrapped).toBeInstanceOf(ToolFailure)
    expect(wrapped.kind).toBe('tool')
    expect(wrapped.message).toBe('disk full')

    expect(toPipelineError('plain text').message).toBe('plain text')
  })

  it('returns the innermost message of a cause chain', () => {
    const root = new Error('connection refused')
    const middle = new TransientNetworkError('', { cause: root })
    const outer = new ToolFailure('health check failed', 1, { cause: middle })

    expect(deepestMessage(outer)).toBe('connection refused')
    expect(deepestMessage(new ToolFailure('only message'))).toBe('only message')
  })

  it('escalates exhausted transient errors to tool failures', () => {
    const transient = new TransientNetworkError('Request to http://localhost:8080 failed: ECONNREFUSED')
    const escalated = escalateTransient(transient)

    expect(escalated).toBeInstanceOf(ToolFailure)
    expect(escalated.message).toBe(
      'Retries exhausted: Request to http://localhost:8080 failed: ECONNREFUSED'
    )
    expect(escalated.cause).toBe(transient)

    const configuration = new ConfigurationError('bad', ['issue'])
    expect(escalateTransient(configuration)).toBe(configuration)
  })
})
