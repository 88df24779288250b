/**
 * Supported log levels in ascending severity.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Structured fields attached to a log line.
 */
export type LogFields = Readonly<Record<string, unknown>>

/**
 * Leveled diagnostic logger used by the engine and collaborators.
 */
export interface PipelineLogger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
  /** Returns a logger that adds the given fields to every line. */
  child(fields: LogFields): PipelineLogger
}

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Minimum level written. Defaults to `info`. */
  readonly level?: LogLevel
  /** Writes one JSON object per line when true. */
  readonly json?: boolean
  /** Output sink. Defaults to `process.stderr`. */
  readonly write?: (line: string) => void
  /** Time source for JSON timestamps. */
  readonly now?: () => Date
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '',
  warn: '\x1b[33m',
  error: '\x1b[31m',
}

/**
 * Creates a logger writing to stderr as colored text or JSON lines.
 *
 * @param options Logger options.
 * @returns Logger instance.
 */
export const createConsoleLogger = (
  options: ConsoleLoggerOptions = {},
  boundFields: LogFields = {}
): PipelineLogger => {
  const minLevel = LOG_LEVELS[options.level ?? 'info']
  const write =
    options.write ??
    ((line: string): void => {
      process.stderr.write(line)
    })
  const now = options.now ?? ((): Date => new Date())

  const log = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LOG_LEVELS[level] < minLevel) {
      return
    }

    const merged = { ...boundFields, ...fields }

    if (options.json) {
      write(`${JSON.stringify({ level, message, timestamp: now().toISOString(), ...merged })}\n`)
      return
    }

    const color = LEVEL_COLORS[level]
    const reset = color ? '\x1b[0m' : ''
    const fieldText = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : ''
    write(`${color}[${level}]${reset} ${message}${fieldText}\n`)
  }

  return {
    debug: (message, fields): void => log('debug', message, fields),
    info: (message, fields): void => log('info', message, fields),
    warn: (message, fields): void => log('warn', message, fields),
    error: (message, fields): void => log('error', message, fields),
    child: (fields): PipelineLogger => createConsoleLogger(options, { ...boundFields, ...fields }),
  }
}

/**
 * Creates a logger that discards everything.
 */
export const createSilentLogger = (): PipelineLogger => {
  const silent: PipelineLogger = {
    debug: (): void => undefined,
    info: (): void => undefined,
    warn: (): void => undefined,
    error: (): void => undefined,
    child: (): PipelineLogger => silent,
  }

  return silent
}
