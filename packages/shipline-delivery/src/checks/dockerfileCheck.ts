import { readFile } from 'node:fs/promises'

import { err, ok, ToolFailure, type Result } from '@shipline/core'

const FROM_SCRATCH_PATTERN = /^\s*FROM\s+scratch\b/imu
const USER_PATTERN = /^\s*USER\s+(\S+)/gimu
const ROOT_USERS = new Set(['root', '0'])

/**
 * Passing Dockerfile check.
 */
export interface DockerfileCheckResult {
  /** User the container runs as. */
  readonly user: string
}

/**
 * Checks Dockerfile content for a usable base image and a non-root user.
 *
 * @param content Dockerfile text.
 * @returns The effective user, or the first violated rule.
 */
export const checkDockerfileContent = (
  content: string
): Result<DockerfileCheckResult, ToolFailure> => {
  if (FROM_SCRATCH_PATTERN.test(content)) {
    return err(new ToolFailure('Dockerfile uses FROM scratch; use a maintained base image'))
  }

  const users = [...content.matchAll(USER_PATTERN)].flatMap((match) =>
    match[1] === undefined ? [] : [match[1]]
  )
  const user = users.at(-1)
  if (user === undefined) {
    return err(new ToolFailure('Dockerfile does not define a USER; the container would run as root'))
  }

  const [name = ''] = user.split(':')
  if (ROOT_USERS.has(name)) {
    return err(new ToolFailure('Dockerfile sets USER to root; define a non-root user'))
  }

  return ok({ user })
}

/**
 * Reads and checks a Dockerfile.
 *
 * @param path Absolute Dockerfile path.
 */
export const checkDockerfile = async (
  path: string
): Promise<Result<DockerfileCheckResult, ToolFailure>> => {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return err(new ToolFailure(`Dockerfile not found: ${path}`))
    }
    throw error
  }

  return checkDockerfileContent(content)
}

export const isMissingFileError = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
