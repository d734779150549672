export const STAGE_STATUSES = [
  'pending',
  'running',
  'completed',
  'failed',
  'skipped'
] as const

export type StageStatusEnum = (typeof STAGE_STATUSES)[number]

export type BackendStageId = `prediction:${string}` | `clustering:${string}`

export type StageId =
  | 'sequence_analysis'
  | 'secondary_structure'
  | BackendStageId
  | 'consensus'
  | 'scoring'
  | 'report'

export interface StageRecord {
  id: StageId
  status: StageStatusEnum
  /** Output files the stage declared; all must exist and be non-empty once completed */
  artifacts: string[]
  fingerprint: string
  updatedAt: string
  message?: string
}

export const predictionStage = (backend: string): BackendStageId =>
  `prediction:${backend}`

export const clusteringStage = (backend: string): BackendStageId =>
  `clustering:${backend}`

/** Returns the backend name carried by a per-backend stage id */
export const backendOfStage = (id: StageId): string | undefined => {
  const match = /^(?:prediction|clustering):(.+)$/.exec(id)
  return match ? match[1] : undefined
}

export const isStageId = (value: string): value is StageId =>
  value === 'sequence_analysis' ||
  value === 'secondary_structure' ||
  value === 'consensus' ||
  value === 'scoring' ||
  value === 'report' ||
  /^(prediction|clustering):[A-Za-z0-9_-]+$/.test(value)

/** Completed and skipped stages both satisfy their dependents. */
export const isSatisfied = (status: StageStatusEnum): boolean =>
  status === 'completed' || status === 'skipped'
