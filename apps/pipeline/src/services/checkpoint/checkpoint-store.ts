import fs from 'fs-extra'
import path from 'path'
import YAML from 'yaml'
import { v4 as uuid } from 'uuid'
import { array, boolean, number, object, string, ValidationError } from 'yup'
import {
  FAILURE_KINDS,
  PIPELINE_STATE_VERSION,
  STAGE_STATUSES,
  backendOfStage,
  isStageId
} from '@rnaflow/types'
import type {
  ConfidenceMetrics,
  ConsensusCluster,
  ConsensusMember,
  EnsembleMember,
  EnsembleResult,
  MemberFailure,
  PipelineRun,
  RankedStructure,
  RunFingerprint,
  RunInput,
  StageId,
  StageRecord,
  StageStatusEnum,
  StructureCluster
} from '@rnaflow/types'
import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { PersistenceError, getErrorMessage } from '../../helpers/errors.js'
import { isNonEmptyFile } from '../../helpers/files.js'
import { downstreamOf } from '../pipeline/stage-graph.js'

const stageSchema = object({
  id: string()
    .required()
    .test('stage-id', 'unknown stage id ${value}', (v) => typeof v === 'string' && isStageId(v)),
  status: string().oneOf(STAGE_STATUSES).default('pending'),
  artifacts: array(string().required()).default([]),
  fingerprint: string().default(''),
  updatedAt: string().default(''),
  message: string().optional()
})

const failureSchema = object({
  kind: string().oneOf(FAILURE_KINDS).required(),
  message: string().default(''),
  exitCode: number().integer().nullable().default(null),
  signal: string().nullable().default(null),
  output: array(string().defined()).default([])
})

const memberSchema = object({
  backend: string().required(),
  seedIndex: number().integer().min(0).required(),
  seed: number().integer().required(),
  device: string().default('default'),
  dropout: boolean().default(false),
  noiseScale: number().min(0).default(0),
  structure: string().optional(),
  failure: failureSchema.default(undefined).optional()
})

const consensusMemberSchema = object({
  backend: string().required(),
  seedIndex: number().integer().min(0).required(),
  structure: string().required()
})

const consensusSchema = object({
  id: number().integer().required(),
  backends: array(string().required()).default([]),
  members: array(consensusMemberSchema).default([]),
  representative: consensusMemberSchema.required(),
  meanRmsd: number().default(0)
})

const clusterSchema = object({
  id: number().integer().required(),
  representative: number().integer().min(0).required(),
  members: array(number().integer().min(0).required()).default([]),
  stats: object({
    size: number().default(0),
    meanRmsd: number().default(0),
    maxRmsd: number().default(0),
    representativeMeanRmsd: number().default(0)
  })
})

const rankedSchema = object({
  rank: number().integer().min(1).required(),
  backend: string().required(),
  seedIndex: number().integer().min(0).required(),
  structure: string().required(),
  score: number().required()
})

const runSchema = object({
  runId: string().required(),
  version: number().integer().default(PIPELINE_STATE_VERSION),
  createdAt: string().required(),
  updatedAt: string().required(),
  input: object({
    fasta: string().required(),
    sequenceId: string().required(),
    length: number().integer().min(0).required()
  }),
  fingerprint: object({
    backends: array(string().required()).default([]),
    nstruct: number().integer().min(1).default(1),
    mcDropout: boolean().default(false),
    noiseScale: number().min(0).default(0),
    devices: array(string().required()).default([]),
    clusterThreshold: number().positive().default(5)
  }),
  stages: array(stageSchema).default([])
})

type Raw = Record<string, unknown>

const isRaw = (value: unknown): value is Raw =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const rawEntries = (value: unknown): [string, unknown][] =>
  isRaw(value) ? Object.entries(value).sort(([a], [b]) => a.localeCompare(b)) : []

const numberRecord = (value: unknown): Record<string, number> =>
  Object.fromEntries(
    rawEntries(value).filter((entry): entry is [string, number] =>
      typeof entry[1] === 'number' && Number.isFinite(entry[1])
    )
  )

// Canonical shapes: fixed key order, optional keys only when set.

const canonicalStage = (s: StageRecord): StageRecord => ({
  id: s.id,
  status: s.status,
  artifacts: [...s.artifacts],
  fingerprint: s.fingerprint,
  updatedAt: s.updatedAt,
  ...(s.message !== undefined ? { message: s.message } : {})
})

const canonicalFailure = (f: MemberFailure): MemberFailure => ({
  kind: f.kind,
  message: f.message,
  exitCode: f.exitCode,
  signal: f.signal,
  output: [...f.output]
})

const CONFIDENCE_KEYS = ['plddtMean', 'ptm', 'iptm', 'rankingScore'] as const

const pickConfidence = (read: (key: keyof ConfidenceMetrics) => unknown): ConfidenceMetrics => {
  const out: ConfidenceMetrics = {}
  for (const key of CONFIDENCE_KEYS) {
    const value = read(key)
    if (typeof value === 'number' && Number.isFinite(value)) out[key] = value
  }
  return out
}

const canonicalConfidence = (c: ConfidenceMetrics): ConfidenceMetrics => pickConfidence((key) => c[key])

const canonicalMember = (m: EnsembleMember): EnsembleMember => ({
  backend: m.backend,
  seedIndex: m.seedIndex,
  seed: m.seed,
  device: m.device,
  dropout: m.dropout,
  noiseScale: m.noiseScale,
  ...(m.structure !== undefined ? { structure: m.structure } : {}),
  ...(m.confidence !== undefined ? { confidence: canonicalConfidence(m.confidence) } : {}),
  ...(m.failure !== undefined ? { failure: canonicalFailure(m.failure) } : {})
})

const canonicalConsensusMember = (m: ConsensusMember): ConsensusMember => ({
  backend: m.backend,
  seedIndex: m.seedIndex,
  structure: m.structure
})

const canonicalConsensus = (c: ConsensusCluster): ConsensusCluster => ({
  id: c.id,
  backends: [...c.backends],
  members: c.members.map(canonicalConsensusMember),
  representative: canonicalConsensusMember(c.representative),
  meanRmsd: c.meanRmsd
})

const canonicalCluster = (c: StructureCluster): StructureCluster => ({
  id: c.id,
  representative: c.representative,
  members: [...c.members],
  stats: {
    size: c.stats.size,
    meanRmsd: c.stats.meanRmsd,
    maxRmsd: c.stats.maxRmsd,
    representativeMeanRmsd: c.stats.representativeMeanRmsd
  }
})

const canonicalRanked = (r: RankedStructure): RankedStructure => ({
  rank: r.rank,
  backend: r.backend,
  seedIndex: r.seedIndex,
  structure: r.structure,
  score: r.score,
  metrics: Object.fromEntries(
    Object.entries(r.metrics).sort(([a], [b]) => a.localeCompare(b))
  )
})

const sortedRecord = <T, U>(record: Record<string, T>, map: (value: T) => U) =>
  Object.fromEntries(
    Object.keys(record)
      .sort()
      .map((key) => [key, map(record[key])])
  )

/** Deep copy of a run with every object in serialization key order. */
export const canonicalRun = (run: PipelineRun): PipelineRun => ({
  runId: run.runId,
  version: run.version,
  createdAt: run.createdAt,
  updatedAt: run.updatedAt,
  input: {
    fasta: run.input.fasta,
    sequenceId: run.input.sequenceId,
    length: run.input.length
  },
  fingerprint: {
    backends: [...run.fingerprint.backends],
    nstruct: run.fingerprint.nstruct,
    mcDropout: run.fingerprint.mcDropout,
    noiseScale: run.fingerprint.noiseScale,
    devices: [...run.fingerprint.devices],
    clusterThreshold: run.fingerprint.clusterThreshold
  },
  stages: run.stages.map(canonicalStage),
  ensembles: sortedRecord(run.ensembles, (e) => ({
    backend: e.backend,
    members: e.members.map(canonicalMember)
  })),
  clusters: sortedRecord(run.clusters, (cs) => cs.map(canonicalCluster)),
  consensus: run.consensus.map(canonicalConsensus),
  ranking: run.ranking.map(canonicalRanked)
})

export const serializeRun = (run: PipelineRun): string =>
  YAML.stringify(canonicalRun(run))

const parseMembers = (value: unknown): EnsembleMember[] => {
  const items = Array.isArray(value) ? value : []
  return items.map((item) => {
    const m = memberSchema.validateSync(item, { stripUnknown: true })
    const raw = isRaw(item) && isRaw(item.confidence) ? item.confidence : {}
    const confidence = pickConfidence((key) => raw[key])
    return {
      backend: m.backend,
      seedIndex: m.seedIndex,
      seed: m.seed,
      device: m.device,
      dropout: m.dropout,
      noiseScale: m.noiseScale,
      ...(m.structure !== undefined ? { structure: m.structure } : {}),
      ...(Object.keys(confidence).length > 0 ? { confidence } : {}),
      ...(m.failure !== undefined ? { failure: m.failure } : {})
    }
  })
}

/**
 * Validates a parsed state document. Unknown keys are dropped and missing
 * optional keys take their defaults.
 */
export const parseRun = (raw: unknown): PipelineRun => {
  const base = runSchema.validateSync(raw, { stripUnknown: true, abortEarly: false })
  const doc: Raw = isRaw(raw) ? raw : {}

  const stages: StageRecord[] = []
  for (const s of base.stages) {
    if (isStageId(s.id)) {
      stages.push({
        id: s.id,
        status: s.status,
        artifacts: s.artifacts,
        fingerprint: s.fingerprint,
        updatedAt: s.updatedAt,
        ...(s.message !== undefined ? { message: s.message } : {})
      })
    }
  }

  const ensembles: Record<string, EnsembleResult> = {}
  for (const [backend, value] of rawEntries(doc.ensembles)) {
    ensembles[backend] = {
      backend,
      members: parseMembers(isRaw(value) ? value.members : undefined)
    }
  }

  const clusters: Record<string, StructureCluster[]> = {}
  for (const [backend, value] of rawEntries(doc.clusters)) {
    clusters[backend] = (Array.isArray(value) ? value : []).map((c) =>
      clusterSchema.validateSync(c, { stripUnknown: true })
    )
  }

  const consensus: ConsensusCluster[] = (Array.isArray(doc.consensus) ? doc.consensus : []).map(
    (c) => consensusSchema.validateSync(c, { stripUnknown: true })
  )

  const rawRanking = Array.isArray(doc.ranking) ? doc.ranking : []
  const ranking: RankedStructure[] = rawRanking.map((item) => ({
    ...rankedSchema.validateSync(item, { stripUnknown: true }),
    metrics: numberRecord(isRaw(item) ? item.metrics : undefined)
  }))

  return {
    runId: base.runId,
    version: base.version,
    createdAt: base.createdAt,
    updatedAt: base.updatedAt,
    input: base.input,
    fingerprint: base.fingerprint,
    stages,
    ensembles,
    clusters,
    consensus,
    ranking
  }
}

export const newRun = (input: RunInput, fingerprint: RunFingerprint): PipelineRun => {
  const now = new Date().toISOString()
  return {
    runId: uuid(),
    version: PIPELINE_STATE_VERSION,
    createdAt: now,
    updatedAt: now,
    input,
    fingerprint,
    stages: [],
    ensembles: {},
    clusters: {},
    consensus: [],
    ranking: []
  }
}

export const findStage = (run: PipelineRun, id: StageId): StageRecord | undefined =>
  run.stages.find((s) => s.id === id)

/**
 * Durable store for one run directory. Every mark* call persists the run
 * before returning.
 */
export class CheckpointStore {
  readonly statePath: string

  constructor(
    readonly runDir: string,
    stateFile: string = config.stateFile
  ) {
    this.statePath = path.join(runDir, stateFile)
  }

  /** Absolute path of an artifact recorded relative to the run directory. */
  resolve(artifact: string): string {
    return path.resolve(this.runDir, artifact)
  }

  /** Artifact path as stored in the state file. */
  relative(file: string): string {
    const rel = path.relative(this.runDir, file)
    return rel.startsWith('..') || path.isAbsolute(rel) ? file : rel
  }

  /**
   * Reads the state file, or null when the directory has none. Records left
   * `running` by a dead process, and completed records whose artifacts are
   * gone, come back as `pending`.
   */
  async load(): Promise<PipelineRun | null> {
    if (!(await fs.pathExists(this.statePath))) {
      return null
    }
    let run: PipelineRun
    try {
      run = parseRun(YAML.parse(await fs.readFile(this.statePath, 'utf8')))
    } catch (error) {
      const detail =
        error instanceof ValidationError ? error.errors.join('; ') : getErrorMessage(error)
      throw new PersistenceError(this.statePath, `unreadable state: ${detail}`)
    }

    for (const stage of run.stages) {
      if (stage.status === 'running') {
        logger.warn(`${stage.id} was running when the previous process stopped; resetting to pending`)
        stage.status = 'pending'
      } else if (stage.status === 'completed') {
        for (const artifact of stage.artifacts) {
          if (!(await isNonEmptyFile(this.resolve(artifact)))) {
            logger.warn(`${stage.id}: artifact ${artifact} is missing or empty; resetting to pending`)
            stage.status = 'pending'
            break
          }
        }
      }
    }
    return run
  }

  /** Atomic replace: temp file, fsync, rename. */
  async save(run: PipelineRun): Promise<void> {
    const tmp = `${this.statePath}.tmp-${uuid()}`
    try {
      await fs.ensureDir(this.runDir)
      const fd = await fs.open(tmp, 'w')
      try {
        await fs.write(fd, serializeRun(run))
        await fs.fsync(fd)
      } finally {
        await fs.close(fd)
      }
      await fs.rename(tmp, this.statePath)
    } catch (error) {
      if (await fs.pathExists(tmp)) {
        await fs.remove(tmp)
      }
      throw new PersistenceError(this.statePath, error)
    }
  }

  private upsert(
    run: PipelineRun,
    id: StageId,
    status: StageStatusEnum,
    patch: Partial<Pick<StageRecord, 'artifacts' | 'fingerprint' | 'message'>>
  ): StageRecord {
    const now = new Date().toISOString()
    let record = findStage(run, id)
    if (!record) {
      record = { id, status, artifacts: [], fingerprint: '', updatedAt: now }
      run.stages.push(record)
    }
    record.status = status
    record.updatedAt = now
    if (patch.artifacts) record.artifacts = patch.artifacts.map((a) => this.relative(a))
    if (patch.fingerprint !== undefined) record.fingerprint = patch.fingerprint
    if (patch.message !== undefined) {
      record.message = patch.message
    } else if (status === 'running' || status === 'completed') {
      delete record.message
    }
    run.updatedAt = now
    return record
  }

  async markStageStarted(run: PipelineRun, id: StageId, fingerprint: string) {
    this.upsert(run, id, 'running', { fingerprint, artifacts: [] })
    await this.save(run)
  }

  async markStageCompleted(run: PipelineRun, id: StageId, artifacts: string[]) {
    this.upsert(run, id, 'completed', { artifacts })
    await this.save(run)
  }

  async markStageFailed(run: PipelineRun, id: StageId, reason: string) {
    this.upsert(run, id, 'failed', { message: reason })
    await this.save(run)
  }

  async markStageSkipped(run: PipelineRun, id: StageId, reason: string) {
    this.upsert(run, id, 'skipped', { message: reason })
    await this.save(run)
  }

  async markStagePending(run: PipelineRun, id: StageId, reason?: string) {
    this.upsert(run, id, 'pending', { message: reason })
    await this.save(run)
  }

  /**
   * Resets a stage and everything downstream of it to pending and drops the
   * results those stages produced.
   */
  async invalidateFrom(run: PipelineRun, id: StageId, backends: readonly string[]) {
    for (const stage of downstreamOf(id, backends)) {
      const record = findStage(run, stage)
      if (record && record.status !== 'pending') {
        logger.info(`invalidating ${stage}`)
        this.upsert(run, stage, 'pending', {})
        delete record.message
      }
      const backend = backendOfStage(stage)
      if (backend !== undefined && stage.startsWith('prediction:')) {
        delete run.ensembles[backend]
      } else if (backend !== undefined) {
        delete run.clusters[backend]
      } else if (stage === 'consensus') {
        run.consensus = []
      } else if (stage === 'scoring') {
        run.ranking = []
      }
    }
    await this.save(run)
  }
}
