import {
  err,
  ok,
  ToolFailure,
  type PipelineError,
  type Result,
  type StageCommandOptions,
  type ToolOutput,
} from '@shipline/core'

import type { CollaboratorSession } from './contracts.js'

const SAFE_ARGUMENT_PATTERN = /^[\w@%+=:,./-]+$/u

/**
 * Quotes a value for a POSIX shell command line.
 *
 * @param value Raw argument.
 * @returns The value itself when it needs no quoting, otherwise a single-quoted literal.
 */
export const shellQuote = (value: string): string => {
  if (value.length > 0 && SAFE_ARGUMENT_PATTERN.test(value)) {
    return value
  }

  return `'${value.replaceAll("'", String.raw`'\''`)}'`
}

/**
 * Runs a command and treats any nonzero exit code as a tool failure.
 *
 * @param session Stage session.
 * @param command Shell command.
 * @param options Command options.
 * @returns Output of a command that exited with code 0.
 */
export const runTool = async (
  session: CollaboratorSession,
  command: string,
  options?: StageCommandOptions
): Promise<Result<ToolOutput, PipelineError>> => {
  const result = await session.exec(command, options)
  if (!result.ok) {
    return err(result.error)
  }

  if (result.value.exitCode !== 0) {
    return err(toToolFailure(command, result.value))
  }

  return ok(result.value)
}

/**
 * Wraps a failed command, keeping the tail of its output as the cause.
 */
export const toToolFailure = (command: string, output: ToolOutput): ToolFailure => {
  const detail = tailLines(`${output.stdout}\n${output.stderr}`)
  const message =
    output.exitCode === null
      ? `Command ended by ${output.signal ?? 'signal'}: ${command}`
      : `Command exited with code ${output.exitCode}: ${command}`

  return new ToolFailure(message, output.exitCode, {
    cause: detail.length > 0 ? new Error(detail) : undefined,
  })
}

const tailLines = (text: string, maxLines = 20): string => {
  return text
    .split(/\r?\n/u)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0)
    .slice(-maxLines)
    .join('\n')
}
