import type { ConsensusCluster, ConsensusMember } from '@rnaflow/types'
import type { Logger } from './index.js'
import type { Coordinates } from './structureParser.js'
import { DEFAULT_BACKBONE_ATOMS, readBackboneCoordinates } from './structureParser.js'
import { clusterByRmsd, computeRmsdMatrix } from './cluster.js'
import { ClusteringInputError } from './errors.js'

// needed for a meaningful superposition
const MIN_COMMON_ATOMS = 3

export interface ConsensusOptions {
  atomNames?: readonly string[]
  logger?: Logger
  readCoordinates?: (
    structurePath: string,
    atomNames: readonly string[]
  ) => Promise<Coordinates>
}

/**
 * Clusters structures from several backends together and keeps the groups
 * that span at least two backends. Backends model terminal residues
 * differently, so every coordinate set is cut to the shortest one before
 * comparison.
 */
export async function findConsensus(
  structures: ConsensusMember[],
  threshold: number,
  options: ConsensusOptions = {}
): Promise<ConsensusCluster[]> {
  const { atomNames = DEFAULT_BACKBONE_ATOMS, logger, readCoordinates = readBackboneCoordinates } =
    options

  const inputs = [...structures].sort(
    (a, b) => a.backend.localeCompare(b.backend) || a.seedIndex - b.seedIndex
  )
  if (new Set(inputs.map((s) => s.backend)).size < 2) {
    return []
  }

  const coords = await Promise.all(inputs.map((s) => readCoordinates(s.structure, atomNames)))
  const common = Math.min(...coords.map((c) => c.length))
  if (common < MIN_COMMON_ATOMS) {
    throw new ClusteringInputError(
      `Only ${common} backbone atom(s) in common across backends; need ${MIN_COMMON_ATOMS}`
    )
  }
  if (coords.some((c) => c.length !== common)) {
    logger?.debug?.(`consensus: comparing the first ${common} backbone atoms of each structure`)
  }

  // position doubles as the tie-breaker for medoids and ordering
  const entries = coords.map((c, i) => ({ index: i, seedIndex: i, coords: c.slice(0, common) }))
  const matrix = computeRmsdMatrix(entries)
  const clusters = clusterByRmsd(entries, matrix, threshold)

  const consensus = clusters
    .map((c) => ({ cluster: c, backends: [...new Set(c.members.map((i) => inputs[i].backend))].sort() }))
    .filter(({ backends }) => backends.length >= 2)
    .map(({ cluster, backends }, k) => ({
      id: k + 1,
      backends,
      members: cluster.members.map((i) => ({ ...inputs[i] })),
      representative: { ...inputs[cluster.representative] },
      meanRmsd: cluster.stats.meanRmsd
    }))

  logger?.info(
    `consensus: ${consensus.length} group(s) shared by 2+ backends among ${inputs.length} structure(s)`
  )
  return consensus
}
