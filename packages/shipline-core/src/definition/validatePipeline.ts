import type { PipelineDefinition } from '../contracts/run.js'
import { ConfigurationError } from '../errors/pipelineErrors.js'
import { collectParameterDefinitionIssues } from './parameters.js'
import { toStageUnits } from './stageUnits.js'

/**
 * Checks a pipeline graph before any run.
 *
 * Rejects duplicate ids, split parallel groups, output keys shared between
 * stages or colliding with parameters and environment names, invalid retry
 * policies, and reads that are undeclared or not produced by an earlier unit.
 *
 * @param definition Pipeline graph.
 * @returns The same definition.
 * @throws ConfigurationError listing every issue found.
 */
export const validatePipelineDefinition = (definition: PipelineDefinition): PipelineDefinition => {
  const issues = collectParameterDefinitionIssues(definition.parameters)
  const parameterNames = new Set(definition.parameters.map((parameter) => parameter.name))
  const environmentNames = new Set<string>()

  for (const [name] of definition.environment) {
    if (parameterNames.has(name) || environmentNames.has(name)) {
      issues.push(`environment value ${name} is declared more than once`)
    }
    environmentNames.add(name)
  }

  const stageIds = new Set<string>()
  const outputOwners = new Map<string, string>()

  for (const stage of definition.stages) {
    if (stage.id.length === 0) {
      issues.push('stage ids must be non-empty')
    }
    if (stageIds.has(stage.id)) {
      issues.push(`stage id ${stage.id} is declared more than once`)
    }
    stageIds.add(stage.id)

    if (stage.retry && (!Number.isInteger(stage.retry.maxAttempts) || stage.retry.maxAttempts < 1)) {
      issues.push(`stage ${stage.id} retry.maxAttempts must be a positive integer`)
    }
    if (stage.retry?.delayMs !== undefined && stage.retry.delayMs < 0) {
      issues.push(`stage ${stage.id} retry.delayMs must not be negative`)
    }

    for (const key of stage.outputs ?? []) {
      if (parameterNames.has(key) || environmentNames.has(key)) {
        issues.push(`stage ${stage.id} output ${key} collides with a parameter or environment value`)
        continue
      }

      const owner = outputOwners.get(key)
      if (owner !== undefined) {
        issues.push(`output ${key} is declared by both ${owner} and ${stage.id}`)
        continue
      }
      outputOwners.set(key, stage.id)
    }
  }

  const units = toStageUnits(definition.stages)
  const closedGroups = new Set<string>()
  const availableOutputs = new Set<string>()

  for (const unit of units) {
    if (unit.parallelGroup !== undefined) {
      if (closedGroups.has(unit.parallelGroup)) {
        issues.push(`parallel group ${unit.parallelGroup} members must be adjacent`)
      }
      closedGroups.add(unit.parallelGroup)
    }

    for (const { stage } of unit.members) {
      for (const key of stage.reads ?? []) {
        if (parameterNames.has(key) || environmentNames.has(key) || availableOutputs.has(key)) {
          continue
        }

        const owner = outputOwners.get(key)
        issues.push(
          owner === undefined
            ? `stage ${stage.id} reads undeclared key ${key}`
            : `stage ${stage.id} reads ${key} before its producer ${owner} has run`
        )
      }
    }

    for (const { stage } of unit.members) {
      for (const key of stage.outputs ?? []) {
        availableOutputs.add(key)
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(
      `Invalid pipeline ${definition.id}: ${issues.join('; ')}`,
      issues
    )
  }

  return definition
}

/**
 * Maps every declared output key to its producing stage.
 *
 * @param definition Validated pipeline graph.
 */
export const collectOutputOwners = (definition: PipelineDefinition): Map<string, string> => {
  const owners = new Map<string, string>()
  for (const stage of definition.stages) {
    for (const key of stage.outputs ?? []) {
      owners.set(key, stage.id)
    }
  }

  return owners
}
