import type { StageId } from '@rnaflow/types'
import { backendOfStage, clusteringStage, predictionStage } from '@rnaflow/types'

/** Every stage of a run over the given backends, in execution order. */
export const stageOrder = (backends: readonly string[]): StageId[] => [
  'sequence_analysis',
  'secondary_structure',
  ...[...backends].sort().flatMap((b) => [predictionStage(b), clusteringStage(b)]),
  'consensus',
  'scoring',
  'report'
]

/**
 * Direct upstream stages. Consensus and scoring follow every clustering
 * stage, so re-clustering invalidates both; the orchestrator only requires
 * one prediction to have succeeded before either runs. The report reads
 * consensus groups but is not held back when that stage fails.
 */
export const upstreamOf = (stage: StageId, backends: readonly string[]): StageId[] => {
  if (stage === 'sequence_analysis') return []
  if (stage === 'secondary_structure') return ['sequence_analysis']
  if (stage === 'consensus' || stage === 'scoring') return [...backends].sort().map(clusteringStage)
  if (stage === 'report') return ['consensus', 'scoring']
  const backend = backendOfStage(stage)
  if (backend === undefined) return []
  return stage.startsWith('prediction:')
    ? ['secondary_structure']
    : [predictionStage(backend)]
}

/** The stage itself plus every stage that depends on it, transitively. */
export const downstreamOf = (stage: StageId, backends: readonly string[]): StageId[] => {
  const order = stageOrder(backends)
  const affected = new Set<StageId>([stage])
  for (const candidate of order) {
    if (upstreamOf(candidate, backends).some((u) => affected.has(u))) {
      affected.add(candidate)
    }
  }
  return order.filter((s) => affected.has(s))
}
