import type { StageDefinition } from '../contracts/stage.js'

/**
 * Scheduling unit: one sequential stage, or the adjacent members of a parallel group.
 */
export interface StageUnit {
  readonly parallelGroup?: string
  /** Members with their position in the declared order. */
  readonly members: readonly { readonly stage: StageDefinition; readonly index: number }[]
}

/**
 * Splits the declared stage order into scheduling units.
 *
 * @param stages Stages in declared order.
 */
export const toStageUnits = (stages: readonly StageDefinition[]): StageUnit[] => {
  const units: StageUnit[] = []
  let currentGroup: { parallelGroup: string; members: StageUnit['members'][number][] } | null = null

  for (const [index, stage] of stages.entries()) {
    if (stage.parallelGroup === undefined) {
      currentGroup = null
      units.push({ members: [{ stage, index }] })
      continue
    }

    if (currentGroup?.parallelGroup === stage.parallelGroup) {
      currentGroup.members.push({ stage, index })
      continue
    }

    currentGroup = { parallelGroup: stage.parallelGroup, members: [{ stage, index }] }
    units.push(currentGroup)
  }

  return units
}
