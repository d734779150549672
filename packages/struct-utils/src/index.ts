export {
  parsePdbCoordinates,
  parseCifCoordinates,
  readBackboneCoordinates,
  DEFAULT_BACKBONE_ATOMS
} from './structureParser.js'
export type { Vec3, Coordinates } from './structureParser.js'

export { superposedRmsd, symmetricEigenvalues } from './superpose.js'

export {
  computeRmsdMatrix,
  clusterByRmsd,
  clusterStructures,
  clusterEnsemble
} from './cluster.js'
export type {
  ClusterEntry,
  ClusteringOutcome,
  ClusterEnsembleOptions
} from './cluster.js'

export { findConsensus } from './consensus.js'
export type { ConsensusOptions } from './consensus.js'

export { ClusteringInputError } from './errors.js'

export type Logger = {
  info: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
  debug?: (message: string, ...args: unknown[]) => void
  warn?: (message: string, ...args: unknown[]) => void
}
