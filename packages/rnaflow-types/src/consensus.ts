export interface ConsensusMember {
  backend: string
  seedIndex: number
  structure: string
}

/**
 * Structures from different backends that fall within the clustering
 * threshold of one another.
 */
export interface ConsensusCluster {
  id: number
  /** Distinct backends in the group, sorted */
  backends: string[]
  members: ConsensusMember[]
  representative: ConsensusMember
  meanRmsd: number
}
