export const FAILURE_KINDS = [
  'exit',
  'timeout',
  'missing_output',
  'spawn_error',
  'aborted',
  'unavailable'
] as const

export type MemberFailureKind = (typeof FAILURE_KINDS)[number]

export interface MemberFailure {
  kind: MemberFailureKind
  message: string
  exitCode: number | null
  signal: string | null
  /** Tail of the external process stdout/stderr */
  output: string[]
}

/** Per-member execution parameters before a device is assigned */
export interface MemberPlan {
  seedIndex: number
  seed: number
  dropout: boolean
  noiseScale: number
}

/** Model self-assessment reported by the predictor, where it writes one */
export interface ConfidenceMetrics {
  /** Mean pLDDT on a 0-100 scale */
  plddtMean?: number
  ptm?: number
  iptm?: number
  rankingScore?: number
}

export interface EnsembleMember extends MemberPlan {
  backend: string
  device: string
  structure?: string
  confidence?: ConfidenceMetrics
  failure?: MemberFailure
}

export interface EnsembleResult {
  backend: string
  members: EnsembleMember[]
}

export interface ClusterStats {
  size: number
  meanRmsd: number
  maxRmsd: number
  representativeMeanRmsd: number
}

/**
 * Members and representative are indices into the owning
 * EnsembleResult's members array.
 */
export interface StructureCluster {
  id: number
  representative: number
  members: number[]
  stats: ClusterStats
}

export const isSuccessful = (
  member: EnsembleMember
): member is EnsembleMember & { structure: string } =>
  member.failure === undefined && typeof member.structure === 'string'
