import type { ParameterDefinition } from '../contracts/parameter.js'
import type { EnvironmentComputer, PipelineDefinition } from '../contracts/run.js'
import type { StageDefinition } from '../contracts/stage.js'
import { validatePipelineDefinition } from './validatePipeline.js'

/**
 * Fluent builder producing a validated pipeline definition.
 *
 * Variants of one pipeline share a builder function and differ only in the
 * configuration record passed to it.
 */
export class PipelineBuilder {
  private readonly id: string
  private readonly parameterDefinitions: ParameterDefinition[] = []
  private readonly environmentEntries: (readonly [string, EnvironmentComputer])[] = []
  private readonly stageDefinitions: StageDefinition[] = []

  public constructor(id: string) {
    this.id = id
  }

  public parameter(definition: ParameterDefinition): this {
    this.parameterDefinitions.push(definition)
    return this
  }

  /**
   * Declares an environment value computed once from the parameters.
   *
   * @param name Environment key.
   * @param compute Function of the validated parameters.
   */
  public environment(name: string, compute: EnvironmentComputer): this {
    this.environmentEntries.push([name, compute])
    return this
  }

  public stage(definition: StageDefinition): this {
    this.stageDefinitions.push(definition)
    return this
  }

  /**
   * Adds stages that run concurrently as one unit.
   *
   * @param groupId Parallel group id assigned to every stage.
   * @param definitions Group members.
   */
  public parallel(groupId: string, definitions: readonly StageDefinition[]): this {
    for (const definition of definitions) {
      this.stageDefinitions.push({ ...definition, parallelGroup: groupId })
    }
    return this
  }

  /**
   * Validates and returns the pipeline definition.
   *
   * @throws ConfigurationError when the graph is invalid.
   */
  public build(): PipelineDefinition {
    return validatePipelineDefinition({
      id: this.id,
      parameters: [...this.parameterDefinitions],
      environment: [...this.environmentEntries],
      stages: [...this.stageDefinitions],
    })
  }
}

export const definePipeline = (id: string): PipelineBuilder => {
  return new PipelineBuilder(id)
}
