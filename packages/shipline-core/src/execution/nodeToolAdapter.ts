import { spawn } from 'node:child_process'

import type { ToolAdapter, ToolInvocationRequest, ToolOutput } from '../contracts/executor.js'
import { err, ok, type Result } from '../contracts/result.js'
import { LaunchFailure } from '../errors/pipelineErrors.js'

/** Shell exit status for a command that could not be found. */
const COMMAND_NOT_FOUND_EXIT_CODE = 127

/**
 * Creates a Node.js shell command adapter.
 *
 * @returns Tool adapter implementation.
 */
export const createNodeToolAdapter = (): ToolAdapter => {
  return async (request: ToolInvocationRequest): Promise<Result<ToolOutput, LaunchFailure>> => {
    const startedAt = Date.now()

    return await new Promise<Result<ToolOutput, LaunchFailure>>((resolve) => {
      const env: NodeJS.ProcessEnv = { ...process.env, ...request.env }
      const child = spawn(request.command, {
        cwd: request.cwd,
        env,
        shell: true,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      })

      let stdout = ''
      let stderr = ''
      let spawnError: Error | undefined
      let closed = false

      const timeoutHandle =
        typeof request.timeoutMs === 'number' && request.timeoutMs > 0
          ? setTimeout(() => {
              killProcessGroup(child.pid, () => child.kill('SIGTERM'))
              // Grandchildren that ignore SIGTERM keep the pipes open; settle without waiting for close.
              closed = true
              child.stdout.destroy()
              child.stderr.destroy()
              resolve(
                err(new LaunchFailure(`Command timed out after ${request.timeoutMs}ms: ${request.command}`))
              )
            }, request.timeoutMs)
          : null

      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf8')
      })

      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf8')
      })

      child.on('error', (error: Error) => {
        spawnError = error
      })

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (closed) {
          return
        }

        closed = true
        if (timeoutHandle) {
          clearTimeout(timeoutHandle)
        }

        if (spawnError) {
          resolve(
            err(
              new LaunchFailure(`Command could not be started: ${request.command}`, {
                cause: spawnError,
              })
            )
          )
          return
        }

        if (exitCode === COMMAND_NOT_FOUND_EXIT_CODE) {
          const detail = stderr.trim()
          resolve(
            err(
              new LaunchFailure(`Command not found: ${request.command}`, {
                cause: detail.length > 0 ? new Error(detail) : undefined,
              })
            )
          )
          return
        }

        resolve(
          ok({
            exitCode,
            signal,
            stdout,
            stderr,
            durationMs: Date.now() - startedAt,
          })
        )
      })
    })
  }
}

/**
 * Sends SIGTERM to every process in the command's process group.
 *
 * @param pid Group leader, the spawned shell.
 * @param fallback Used when the group is already gone or the pid is unknown.
 */
const killProcessGroup = (pid: number | undefined, fallback: () => void): void => {
  if (pid === undefined) {
    fallback()
    return
  }

  try {
    process.kill(-pid, 'SIGTERM')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ESRCH') {
      fallback()
      return
    }
    throw error
  }
}
