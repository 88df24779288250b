/**
 * Value type stored in pipeline state.
 */
export type StateValue = string | number | boolean

/**
 * Declared type of a pipeline parameter.
 */
export type ParameterType = 'string' | 'choice' | 'boolean'

interface ParameterDefinitionBase {
  /** Unique parameter name, also exposed to commands as an environment variable. */
  readonly name: string
  /** Optional human readable description. */
  readonly description?: string
}

/**
 * Free-form text parameter.
 */
export interface StringParameterDefinition extends ParameterDefinitionBase {
  readonly type: 'string'
  /** Value used when the caller supplies none. Required parameters omit it. */
  readonly defaultValue?: string
}

/**
 * Parameter restricted to a fixed list of values.
 */
export interface ChoiceParameterDefinition extends ParameterDefinitionBase {
  readonly type: 'choice'
  /** Allowed values. The first one is the default unless `defaultValue` is set. */
  readonly choices: readonly string[]
  readonly defaultValue?: string
}

/**
 * True/false parameter. Accepts booleans and the strings `true` and `false`.
 */
export interface BooleanParameterDefinition extends ParameterDefinitionBase {
  readonly type: 'boolean'
  readonly defaultValue?: boolean
}

/**
 * Declared pipeline parameter.
 */
export type ParameterDefinition =
  | StringParameterDefinition
  | ChoiceParameterDefinition
  | BooleanParameterDefinition

/**
 * Validated parameter values, immutable once the run starts.
 */
export type ParameterValues = Readonly<Record<string, StateValue>>
