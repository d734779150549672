export {
  STAGE_STATUSES,
  predictionStage,
  clusteringStage,
  backendOfStage,
  isStageId,
  isSatisfied
} from './stages.js'
export type {
  StageStatusEnum,
  StageId,
  BackendStageId,
  StageRecord
} from './stages.js'

export { FAILURE_KINDS, isSuccessful } from './ensemble.js'
export type {
  MemberFailureKind,
  MemberFailure,
  MemberPlan,
  EnsembleMember,
  EnsembleResult,
  ClusterStats,
  ConfidenceMetrics,
  StructureCluster
} from './ensemble.js'

export type { ConsensusMember, ConsensusCluster } from './consensus.js'

export type { RankedStructure, ScoringCandidate } from './scoring.js'

export { PIPELINE_STATE_VERSION } from './run.js'
export type { RunInput, RunFingerprint, PipelineRun } from './run.js'
