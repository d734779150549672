import type { StageRecord } from './stages.js'
import type { EnsembleResult, StructureCluster } from './ensemble.js'
import type { ConsensusCluster } from './consensus.js'
import type { RankedStructure } from './scoring.js'

export const PIPELINE_STATE_VERSION = 1

export interface RunInput {
  fasta: string
  sequenceId: string
  length: number
}

export interface RunFingerprint {
  backends: string[]
  nstruct: number
  mcDropout: boolean
  noiseScale: number
  devices: string[]
  clusterThreshold: number
}

export interface PipelineRun {
  runId: string
  version: number
  createdAt: string
  updatedAt: string
  input: RunInput
  fingerprint: RunFingerprint
  stages: StageRecord[]
  ensembles: Record<string, EnsembleResult>
  clusters: Record<string, StructureCluster[]>
  /** Groups of structures from two or more backends that agree */
  consensus: ConsensusCluster[]
  ranking: RankedStructure[]
}
