import type {
  ParameterDefinition,
  ParameterValues,
  StateValue,
} from '../contracts/parameter.js'
import { ConfigurationError } from '../errors/pipelineErrors.js'

/**
 * Checks parameter declarations for internal consistency.
 *
 * @param definitions Declared parameters.
 * @returns Issue messages, empty when valid.
 */
export const collectParameterDefinitionIssues = (
  definitions: readonly ParameterDefinition[]
): string[] => {
  const issues: string[] = []
  const seen = new Set<string>()

  for (const definition of definitions) {
    if (definition.name.length === 0) {
      issues.push('parameter names must be non-empty')
      continue
    }

    if (seen.has(definition.name)) {
      issues.push(`parameter ${definition.name} is declared more than once`)
    }
    seen.add(definition.name)

    if (definition.type === 'choice') {
      if (definition.choices.length === 0) {
        issues.push(`parameter ${definition.name} must declare at least one choice`)
      } else if (
        definition.defaultValue !== undefined &&
        !definition.choices.includes(definition.defaultValue)
      ) {
        issues.push(
          `parameter ${definition.name} default "${definition.defaultValue}" is not one of its choices`
        )
      }
    }
  }

  return issues
}

/**
 * Validates supplied values against declarations and applies defaults.
 *
 * @param definitions Declared parameters.
 * @param supplied Caller-supplied values.
 * @returns Validated values for every declared parameter.
 * @throws ConfigurationError listing every invalid, missing or unknown parameter.
 */
export const resolveParameters = (
  definitions: readonly ParameterDefinition[],
  supplied: Readonly<Record<string, unknown>> = {}
): ParameterValues => {
  const issues: string[] = []
  const values: Record<string, StateValue> = {}
  const declared = new Set(definitions.map((definition) => definition.name))

  for (const name of Object.keys(supplied)) {
    if (!declared.has(name)) {
      issues.push(`unknown parameter ${name}`)
    }
  }

  for (const definition of definitions) {
    const resolved = resolveParameter(definition, supplied[definition.name])
    if (typeof resolved === 'object') {
      issues.push(resolved.issue)
      continue
    }

    values[definition.name] = resolved
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid parameters: ${issues.join('; ')}`, issues)
  }

  return Object.freeze(values)
}

const resolveParameter = (
  definition: ParameterDefinition,
  value: unknown
): StateValue | { readonly issue: string } => {
  switch (definition.type) {
    case 'string': {
      if (value === undefined) {
        return definition.defaultValue ?? { issue: `parameter ${definition.name} is required` }
      }
      if (typeof value !== 'string') {
        return { issue: `parameter ${definition.name} must be a string` }
      }
      return value
    }
    case 'choice': {
      if (value === undefined) {
        return definition.defaultValue ?? definition.choices[0] ?? {
          issue: `parameter ${definition.name} has no choices`,
        }
      }
      if (typeof value !== 'string' || !definition.choices.includes(value)) {
        return {
          issue: `parameter ${definition.name} must be one of ${definition.choices.join(' | ')}`,
        }
      }
      return value
    }
    case 'boolean': {
      if (value === undefined) {
        return definition.defaultValue ?? false
      }
      if (typeof value === 'boolean') {
        return value
      }
      if (value === 'true' || value === 'false') {
        return value === 'true'
      }
      return { issue: `parameter ${definition.name} must be a boolean` }
    }
  }
}
