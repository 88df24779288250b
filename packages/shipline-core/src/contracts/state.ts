import type { StateValue } from './parameter.js'

/**
 * Read access to pipeline state.
 */
export interface StateReader {
  /**
   * Reads a value.
   *
   * @param key State key.
   * @returns Current value, or undefined when the key holds no value yet.
   */
  get(key: string): StateValue | undefined

  /**
   * Checks whether a key currently holds a value.
   */
  has(key: string): boolean

  /**
   * Reads a value that must be present.
   *
   * @throws ConfigurationError when the key holds no value.
   */
  require(key: string): StateValue
}

/**
 * Immutable copy of pipeline state split by partition.
 */
export interface PipelineStateSnapshot {
  /** Caller-supplied parameters after validation and defaults. */
  readonly parameters: Readonly<Record<string, StateValue>>
  /** Values computed once from parameters at run start. */
  readonly environment: Readonly<Record<string, StateValue>>
  /** Values written by stages. */
  readonly outputs: Readonly<Record<string, StateValue>>
}
