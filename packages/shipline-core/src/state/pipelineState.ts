import type { StateValue } from '../contracts/parameter.js'
import type { StageOutputs } from '../contracts/stage.js'
import type { PipelineStateSnapshot, StateReader } from '../contracts/state.js'
import { ConfigurationError } from '../errors/pipelineErrors.js'

/**
 * Key-value store shared by the stages of one run.
 *
 * Parameters and environment are fixed at construction. Each output key
 * belongs to exactly one stage, and only that stage may overwrite it.
 */
export class PipelineState implements StateReader {
  private readonly parameters: Readonly<Record<string, StateValue>>
  private readonly environment: Readonly<Record<string, StateValue>>
  private readonly outputOwners: ReadonlyMap<string, string>
  private readonly outputs = new Map<string, StateValue>()

  /**
   * Creates the state for one run.
   *
   * @param parameters Validated parameter values.
   * @param environment Environment values computed from the parameters.
   * @param outputOwners Output key to producing stage id.
   */
  public constructor(
    parameters: Readonly<Record<string, StateValue>>,
    environment: Readonly<Record<string, StateValue>>,
    outputOwners: ReadonlyMap<string, string>
  ) {
    this.parameters = Object.freeze({ ...parameters })
    this.environment = Object.freeze({ ...environment })
    this.outputOwners = outputOwners
  }

  public get(key: string): StateValue | undefined {
    if (Object.hasOwn(this.parameters, key)) {
      return this.parameters[key]
    }

    if (Object.hasOwn(this.environment, key)) {
      return this.environment[key]
    }

    return this.outputs.get(key)
  }

  public has(key: string): boolean {
    return this.get(key) !== undefined
  }

  public require(key: string): StateValue {
    const value = this.get(key)
    if (value === undefined) {
      throw new ConfigurationError(`State key ${key} has no value`)
    }

    return value
  }

  /**
   * Applies the outputs of one stage execution in a single step.
   *
   * @param stageId Producing stage.
   * @param outputs Values to write.
   * @throws ConfigurationError when a key is not owned by the stage; nothing is written then.
   */
  public commit(stageId: string, outputs: StageOutputs): void {
    for (const key of Object.keys(outputs)) {
      if (this.outputOwners.get(key) !== stageId) {
        throw new ConfigurationError(`Stage ${stageId} cannot write undeclared output ${key}`)
      }
    }

    for (const [key, value] of Object.entries(outputs)) {
      this.outputs.set(key, value)
    }
  }

  /**
   * Lists the environment variables exposed to commands: every parameter and
   * environment value plus the requested outputs that hold a value.
   *
   * @param outputKeys Output keys visible to the caller.
   */
  public toCommandEnvironment(outputKeys: readonly string[]): Record<string, string> {
    const variables: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.parameters)) {
      variables[key] = String(value)
    }
    for (const [key, value] of Object.entries(this.environment)) {
      variables[key] = String(value)
    }
    for (const key of outputKeys) {
      const value = this.outputs.get(key)
      if (value !== undefined) {
        variables[key] = String(value)
      }
    }

    return variables
  }

  public snapshot(): PipelineStateSnapshot {
    return {
      parameters: this.parameters,
      environment: this.environment,
      outputs: Object.fromEntries(this.outputs),
    }
  }
}

/**
 * Creates a read view for one stage.
 *
 * @param state Shared run state.
 * @param stageId Reading stage, used in error messages.
 * @param readableOutputs Output keys the stage declared as reads or outputs.
 * @returns Reader that rejects keys outside the stage's declared scope.
 */
export const createStageStateView = (
  state: PipelineState,
  stageId: string,
  readableOutputs: ReadonlySet<string>,
  stagedOutputs?: ReadonlyMap<string, StateValue>
): StateReader => {
  const snapshot = state.snapshot()

  const assertReadable = (key: string): void => {
    const readable =
      Object.hasOwn(snapshot.parameters, key) ||
      Object.hasOwn(snapshot.environment, key) ||
      readableOutputs.has(key)
    if (!readable) {
      throw new ConfigurationError(`Stage ${stageId} reads undeclared key ${key}`)
    }
  }

  const get = (key: string): StateValue | undefined => {
    assertReadable(key)
    return stagedOutputs?.get(key) ?? state.get(key)
  }

  return {
    get,
    has: (key: string): boolean => get(key) !== undefined,
    require: (key: string): StateValue => {
      const value = get(key)
      if (value === undefined) {
        throw new ConfigurationError(`Stage ${stageId} requires ${key}, which has no value`)
      }
      return value
    },
  }
}
