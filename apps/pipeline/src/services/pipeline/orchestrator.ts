import crypto from 'crypto'
import path from 'path'
import fs from 'fs-extra'
import type {
  EnsembleMember,
  EnsembleResult,
  PipelineRun,
  RunFingerprint,
  ScoringCandidate,
  StageId
} from '@rnaflow/types'
import {
  clusteringStage,
  isSatisfied,
  isSuccessful,
  predictionStage
} from '@rnaflow/types'
import { ClusteringInputError } from '@rnaflow/struct-utils'
import type { PipelineConfig } from '../../config/pipeline-config.js'
import { isBackendName } from '../../config/pipeline-config.js'
import { attachRunLog, logger } from '../../helpers/loggers.js'
import {
  ConfigurationError,
  MemberExecutionFailure,
  PersistenceError,
  PipelineInterruptedError,
  UpstreamStageFailure,
  getErrorMessage
} from '../../helpers/errors.js'
import { readFasta, recordId, writeFasta, type FastaRecord } from '../../helpers/fasta.js'
import { runProcess, type ProcessRunner } from '../../helpers/runProcess.js'
import { CheckpointStore, findStage, newRun } from '../checkpoint/checkpoint-store.js'
import { planEnsemble } from '../diversity/diversity-controller.js'
import { DEFAULT_DEVICE } from '../scheduler/device-scheduler.js'
import { dispatchEnsemble } from '../dispatcher/predictor-dispatcher.js'
import { failure, type PredictorBackend } from '../predictors/predictor.js'
import { createBackends } from '../predictors/registry.js'
import { clusterBackend, consensusAcrossBackends } from '../clustering/cluster-service.js'
import { runSequenceAnalysis, type SequenceAnalysisResult } from '../upstream/infernal.js'
import {
  readDotBracket,
  runSecondaryStructure,
  type SecondaryStructure
} from '../upstream/rnafold.js'
import { runPseudoknotPrediction, type PseudoknotStructure } from '../upstream/spotrna.js'
import { RNAdvisorScorer, type Scorer } from '../scoring/rnadvisor.js'
import { writeReport } from '../report/report.js'
import { upstreamOf } from './stage-graph.js'

export const RUN_LAYOUT = {
  input: 'input.fasta',
  sequenceAnalysis: '01_sequence_analysis',
  secondaryStructure: '02_secondary_structure',
  predictions: '03_predictions',
  scoring: '04_scoring',
  logs: 'logs'
} as const

export interface RunOptions {
  fasta: string
  outDir: string
  backends: string[]
  skipSequenceAnalysis?: boolean
  skipScoring?: boolean
  /** Also predict a pseudoknot-aware secondary structure with SPOT-RNA */
  spotrna?: boolean
  /** Per-invocation prediction timeout; defaults to each backend's setting */
  timeoutMs?: number
  signal?: AbortSignal
}

/** Collaborators that tests replace with in-process fakes. */
export interface OrchestratorDeps {
  runner?: ProcessRunner
  createBackends?: (names: string[], config: PipelineConfig) => PredictorBackend[]
  scorer?: Scorer
  sequenceAnalysis?: (
    fasta: string,
    workDir: string,
    signal?: AbortSignal
  ) => Promise<SequenceAnalysisResult>
  secondaryStructure?: (
    fasta: string,
    record: FastaRecord,
    workDir: string,
    signal?: AbortSignal
  ) => Promise<SecondaryStructure>
  pseudoknots?: (
    fasta: string,
    record: FastaRecord,
    workDir: string,
    signal?: AbortSignal
  ) => Promise<PseudoknotStructure>
}

const hash = (value: unknown): string =>
  crypto.createHash('sha256').update(JSON.stringify(value)).digest('hex').slice(0, 16)

type StageOutcome = 'ran' | 'reused' | 'blocked'

/**
 * Drives one run directory through every stage. Backend branches run
 * concurrently; every state change goes through a single commit queue so
 * the store only ever sees one write at a time.
 */
export class PipelineOrchestrator {
  private readonly store: CheckpointStore
  private readonly backends: PredictorBackend[]
  private readonly scorer: Scorer
  private readonly deps: Required<
    Pick<OrchestratorDeps, 'sequenceAnalysis' | 'secondaryStructure' | 'pseudoknots'>
  >
  private readonly signal: AbortSignal | undefined
  private readonly fingerprints = new Map<StageId, string>()
  private commits: Promise<unknown> = Promise.resolve()
  private loadedRun: PipelineRun | undefined
  private inputRecord: FastaRecord | undefined
  private inputFasta = ''
  private msa: string | undefined
  private dotBracket: string | undefined

  constructor(
    private readonly config: PipelineConfig,
    private readonly options: RunOptions,
    deps: OrchestratorDeps = {}
  ) {
    const runner = deps.runner ?? runProcess
    this.store = new CheckpointStore(options.outDir)
    this.backends = deps.createBackends
      ? deps.createBackends(options.backends, config)
      : createBackends(options.backends, config, { runner })
    for (const backend of this.backends) {
      planEnsemble({ ...this.ensembleOptions, seedBase: backend.seedBase })
    }
    this.scorer = deps.scorer ?? new RNAdvisorScorer(config.tools.rnadvisor, runner)
    this.signal = options.signal
    this.deps = {
      sequenceAnalysis:
        deps.sequenceAnalysis ??
        ((fasta, workDir, signal) =>
          runSequenceAnalysis(fasta, workDir, config.tools, { runner, signal })),
      secondaryStructure:
        deps.secondaryStructure ??
        ((fasta, record, workDir, signal) =>
          runSecondaryStructure(fasta, record, workDir, config.tools.rnafold, { runner, signal })),
      pseudoknots:
        deps.pseudoknots ??
        ((fasta, record, workDir, signal) =>
          runPseudoknotPrediction(fasta, record, workDir, config.tools.spotrna, { runner, signal }))
    }
  }

  private get run(): PipelineRun {
    if (!this.loadedRun) {
      throw new Error('pipeline state not loaded')
    }
    return this.loadedRun
  }

  private get record(): FastaRecord {
    if (!this.inputRecord) {
      throw new Error('input sequence not loaded')
    }
    return this.inputRecord
  }

  private get ensembleOptions() {
    const { nstruct, mcDropout, noiseScale } = this.config.ensemble
    return { nstruct, mcDropout, noiseScale }
  }

  private get backendNames(): string[] {
    return this.backends.map((b) => b.name).sort()
  }

  private dir(...parts: string[]): string {
    return path.join(this.options.outDir, ...parts)
  }

  private runFingerprint(): RunFingerprint {
    return {
      backends: this.backendNames,
      ...this.ensembleOptions,
      devices: [...this.config.devices],
      clusterThreshold: this.config.ensemble.clusterThreshold
    }
  }

  /** Serializes a state mutation (and its save) behind every earlier one. */
  private commit<T>(change: () => Promise<T>): Promise<T> {
    const next = this.commits.then(change)
    this.commits = next.catch(() => undefined)
    return next
  }

  private throwIfAborted(stage?: StageId): void {
    if (this.signal?.aborted) {
      throw new PipelineInterruptedError(stage)
    }
  }

  private async prepareInput(): Promise<void> {
    if (!(await fs.pathExists(this.options.fasta))) {
      throw new ConfigurationError(`Input FASTA not found: ${this.options.fasta}`)
    }
    const records = await readFasta(this.options.fasta)
    const first = records[0]
    if (!first || first.sequence.length === 0) {
      throw new ConfigurationError(`No sequence found in ${this.options.fasta}`)
    }
    if (records.length > 1) {
      logger.warn(`${records.length} records in ${this.options.fasta}; using ${recordId(first)}`)
    }
    const sequence = first.sequence.replace(/T/g, 'U')
    if (!/^[ACGUN]+$/.test(sequence)) {
      throw new ConfigurationError(`Sequence ${recordId(first)} contains non-RNA characters`)
    }
    this.inputRecord = { header: first.header, sequence }
    this.inputFasta = this.dir(RUN_LAYOUT.input)
    await writeFasta([this.inputRecord], this.inputFasta)
  }

  private async loadOrCreateRun(): Promise<void> {
    const input = {
      fasta: path.resolve(this.options.fasta),
      sequenceId: recordId(this.record),
      length: this.record.sequence.length
    }
    const existing = await this.store.load()
    if (existing) {
      logger.info(`resuming run ${existing.runId} in ${this.options.outDir}`)
      existing.input = input
      existing.fingerprint = this.runFingerprint()
      this.loadedRun = existing
    } else {
      this.loadedRun = newRun(input, this.runFingerprint())
      logger.info(`starting run ${this.loadedRun.runId} in ${this.options.outDir}`)
    }
    await this.commit(() => this.store.save(this.run))
  }

  private computeFingerprints(): void {
    const { tools, ensemble, devices } = this.config
    const sa = hash({
      sequence: this.record.sequence,
      skip: Boolean(this.options.skipSequenceAnalysis),
      rfamCm: tools.rfamCm,
      rfamClanin: tools.rfamClanin
    })
    const ss = hash({
      sa,
      sequence: this.record.sequence,
      rnafold: tools.rnafold,
      spotrna: this.options.spotrna ? tools.spotrna : null
    })
    this.fingerprints.set('sequence_analysis', sa)
    this.fingerprints.set('secondary_structure', ss)
    for (const backend of this.backends) {
      const settings = isBackendName(backend.name) ? this.config.backends[backend.name] : {}
      const prediction = hash({ ss, ...this.ensembleOptions, devices, settings })
      this.fingerprints.set(predictionStage(backend.name), prediction)
      this.fingerprints.set(
        clusteringStage(backend.name),
        hash({
          prediction,
          threshold: ensemble.clusterThreshold,
          atoms: ensemble.backboneAtoms
        })
      )
    }
    const upstream = this.backendNames.flatMap((b) => [
      this.fingerprint(predictionStage(b)),
      this.fingerprint(clusteringStage(b))
    ])
    const consensus = hash({
      upstream,
      threshold: ensemble.clusterThreshold,
      atoms: ensemble.backboneAtoms
    })
    const scoring = hash({
      upstream,
      skip: Boolean(this.options.skipScoring),
      metrics: tools.rnadvisor.metrics
    })
    this.fingerprints.set('consensus', consensus)
    this.fingerprints.set('scoring', scoring)
    this.fingerprints.set('report', hash({ consensus, scoring }))
  }

  private fingerprint(stage: StageId): string {
    return this.fingerprints.get(stage) ?? ''
  }

  private status(stage: StageId) {
    return findStage(this.run, stage)?.status ?? 'pending'
  }

  /**
   * True when the stage is already satisfied with the current fingerprint.
   * A satisfied stage with a stale fingerprint is invalidated together with
   * everything downstream.
   */
  private reusable(stage: StageId): boolean {
    const record = findStage(this.run, stage)
    if (!record || !isSatisfied(record.status)) {
      return false
    }
    if (record.fingerprint === this.fingerprint(stage)) {
      logger.info(`${stage}: ${record.status} with matching inputs, not re-running`)
      return true
    }
    logger.info(`${stage}: configuration changed, re-running`)
    return false
  }

  private unmetUpstream(stage: StageId): StageId[] {
    if (stage === 'consensus' || stage === 'scoring') {
      return this.predictionsWithoutStructures()
    }
    return upstreamOf(stage, this.backendNames).filter(
      (u) => u !== 'consensus' && !isSatisfied(this.status(u))
    )
  }

  /** Marks the stage failed without running it when an upstream stage is unsatisfied. */
  private async upstreamSatisfied(stage: StageId): Promise<boolean> {
    const unmet = this.unmetUpstream(stage)
    if (unmet.length === 0) {
      return true
    }
    const error = new UpstreamStageFailure(stage, unmet)
    logger.error(error.message)
    await this.commit(() => this.store.markStageFailed(this.run, stage, error.message))
    return false
  }

  private successfulMembers(backend: string): EnsembleMember[] {
    if (this.status(predictionStage(backend)) !== 'completed') return []
    return (this.run.ensembles[backend]?.members ?? []).filter(isSuccessful)
  }

  /** Every prediction stage, or none once any backend produced a structure. */
  private predictionsWithoutStructures(): StageId[] {
    const names = this.backendNames
    return names.some((b) => this.successfulMembers(b).length > 0)
      ? []
      : names.map(predictionStage)
  }

  /**
   * Common stage lifecycle: upstream gate, reuse check, invalidation of
   * stale downstream results, then execution. Ordinary errors fail the stage
   * only; interruption and persistence errors propagate.
   */
  private async stage(id: StageId, execute: () => Promise<void>): Promise<StageOutcome> {
    this.throwIfAborted(id)
    if (!(await this.upstreamSatisfied(id))) {
      return 'blocked'
    }
    if (this.reusable(id)) {
      return 'reused'
    }
    await this.commit(async () => {
      await this.store.invalidateFrom(this.run, id, this.backendNames)
      await this.store.markStageStarted(this.run, id, this.fingerprint(id))
    })
    try {
      await execute()
      this.throwIfAborted(id)
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error
      }
      if (error instanceof PipelineInterruptedError || this.signal?.aborted) {
        await this.commit(() => this.store.markStagePending(this.run, id, 'interrupted'))
        throw error instanceof PipelineInterruptedError ? error : new PipelineInterruptedError(id)
      }
      const message = getErrorMessage(error)
      logger.error(`${id} failed: ${message}`)
      await this.commit(() => this.store.markStageFailed(this.run, id, message))
    }
    return 'ran'
  }

  private async sequenceAnalysis(): Promise<void> {
    const id = 'sequence_analysis'
    const outcome = await this.stage(id, async () => {
      if (this.options.skipSequenceAnalysis) {
        await this.commit(() => this.store.markStageSkipped(this.run, id, 'disabled'))
        return
      }
      const result = await this.deps.sequenceAnalysis(
        this.inputFasta,
        this.dir(RUN_LAYOUT.sequenceAnalysis),
        this.signal
      )
      if (result.status === 'skipped') {
        await this.commit(() => this.store.markStageSkipped(this.run, id, result.reason))
        return
      }
      this.msa = result.msa
      await this.commit(() => this.store.markStageCompleted(this.run, id, result.artifacts))
    })
    if (outcome === 'reused') {
      this.msa = findStage(this.run, id)
        ?.artifacts.filter((a) => a.endsWith('.sto'))
        .map((a) => this.store.resolve(a))[0]
    }
  }

  private async secondaryStructure(): Promise<void> {
    const id = 'secondary_structure'
    const outcome = await this.stage(id, async () => {
      const ss = await this.deps.secondaryStructure(
        this.inputFasta,
        this.record,
        this.dir(RUN_LAYOUT.secondaryStructure),
        this.signal
      )
      this.dotBracket = ss.dotBracket
      const artifacts = [ss.dotFile]
      if (this.options.spotrna) {
        const knots = await this.pseudoknots()
        if (knots) artifacts.push(knots.dotFile)
      }
      await this.commit(() => this.store.markStageCompleted(this.run, id, artifacts))
    })
    if (outcome === 'reused') {
      const dotFile = findStage(this.run, id)?.artifacts.find(
        (a) => path.basename(a) === 'rnafold.dot'
      )
      this.dotBracket = dotFile ? await readDotBracket(this.store.resolve(dotFile)) : undefined
    }
  }

  /** SPOT-RNA is optional; its failure leaves the RNAfold result in place. */
  private async pseudoknots(): Promise<PseudoknotStructure | undefined> {
    try {
      return await this.deps.pseudoknots(
        this.inputFasta,
        this.record,
        this.dir(RUN_LAYOUT.secondaryStructure, 'spotrna'),
        this.signal
      )
    } catch (error) {
      if (error instanceof PipelineInterruptedError) {
        throw error
      }
      logger.warn(`SPOT-RNA: ${getErrorMessage(error)}`)
      return undefined
    }
  }

  private unavailableEnsemble(backend: PredictorBackend): EnsembleResult {
    const plans = planEnsemble({ ...this.ensembleOptions, seedBase: backend.seedBase })
    return {
      backend: backend.name,
      members: plans.map((plan) => ({
        ...plan,
        backend: backend.name,
        device: DEFAULT_DEVICE,
        failure: failure('unavailable', `${backend.name} is not installed or not configured`)
      }))
    }
  }

  private async prediction(backend: PredictorBackend): Promise<void> {
    const id = predictionStage(backend.name)
    await this.stage(id, async () => {
      let ensemble: EnsembleResult
      if (!(await backend.check())) {
        ensemble = this.unavailableEnsemble(backend)
      } else {
        const plans = planEnsemble({ ...this.ensembleOptions, seedBase: backend.seedBase })
        let finished = 0
        ensemble = await dispatchEnsemble(backend, plans, {
          inputs: {
            fasta: this.inputFasta,
            sequence: this.record.sequence,
            sequenceId: recordId(this.record),
            msa: this.msa,
            secondaryStructure: this.dotBracket
          },
          workDir: this.dir(RUN_LAYOUT.predictions, backend.name),
          logDir: this.dir(RUN_LAYOUT.logs, backend.name),
          devices: this.config.devices,
          maxParallelDevices: this.config.maxParallelDevices,
          timeoutMs: this.options.timeoutMs,
          signal: this.signal,
          onMemberDone: () => {
            finished += 1
            logger.info(`${id}: ${finished}/${plans.length} member(s) finished`)
          }
        })
      }
      this.throwIfAborted(id)

      const structures = ensemble.members.filter(isSuccessful).map((m) => m.structure)
      await this.commit(async () => {
        this.run.ensembles[backend.name] = ensemble
        if (structures.length === 0) {
          const kinds = [...new Set(ensemble.members.map((m) => m.failure?.kind ?? 'unknown'))]
          const error = new MemberExecutionFailure(
            backend.name,
            `all ${ensemble.members.length} member(s) failed (${kinds.join(', ')})`
          )
          logger.error(`${backend.name}: ${error.message}`)
          await this.store.markStageFailed(this.run, id, error.message)
        } else {
          await this.store.markStageCompleted(this.run, id, structures)
        }
      })
    })
  }

  private async clustering(backend: PredictorBackend): Promise<void> {
    const id = clusteringStage(backend.name)
    await this.stage(id, async () => {
      const ensemble = this.run.ensembles[backend.name]
      const successes = ensemble ? ensemble.members.filter(isSuccessful).length : 0
      if (!ensemble || successes < 2) {
        await this.commit(() =>
          this.store.markStageSkipped(
            this.run,
            id,
            `${successes} successful member(s), nothing to cluster`
          )
        )
        return
      }
      try {
        const { clusters, file } = await clusterBackend(
          ensemble,
          this.dir(RUN_LAYOUT.predictions, backend.name, 'clustering'),
          {
            threshold: this.config.ensemble.clusterThreshold,
            backboneAtoms: this.config.ensemble.backboneAtoms
          }
        )
        await this.commit(async () => {
          this.run.clusters[backend.name] = clusters
          await this.store.markStageCompleted(this.run, id, [file])
        })
      } catch (error) {
        if (error instanceof ClusteringInputError) {
          logger.warn(`${backend.name}: ${error.message}; raw members will be scored`)
        }
        throw error
      }
    })
  }

  private async backendBranch(backend: PredictorBackend): Promise<void> {
    await this.prediction(backend)
    await this.clustering(backend)
  }

  /**
   * Cluster representatives where clustering completed, otherwise every
   * successful member. Ordered by backend name, then seed index.
   */
  scoringCandidates(): ScoringCandidate[] {
    return this.backendNames.flatMap((name) => {
      const ensemble = this.run.ensembles[name]
      if (!ensemble || this.status(predictionStage(name)) !== 'completed') return []
      const clusters = this.run.clusters[name]
      const members =
        this.status(clusteringStage(name)) === 'completed' && clusters?.length
          ? clusters.flatMap((c) => ensemble.members.slice(c.representative, c.representative + 1))
          : ensemble.members
      return members
        .filter(isSuccessful)
        .sort((a, b) => a.seedIndex - b.seedIndex)
        .map((m) => ({ backend: name, seedIndex: m.seedIndex, structure: m.structure }))
    })
  }

  private async consensus(): Promise<void> {
    const id = 'consensus'
    await this.stage(id, async () => {
      const candidates = this.scoringCandidates()
      const withStructures = new Set(candidates.map((c) => c.backend)).size
      if (withStructures < 2) {
        await this.commit(() =>
          this.store.markStageSkipped(
            this.run,
            id,
            `${withStructures} backend(s) with structures, nothing to compare`
          )
        )
        return
      }
      const { consensus, file } = await consensusAcrossBackends(
        candidates,
        this.dir(RUN_LAYOUT.predictions, 'consensus'),
        {
          threshold: this.config.ensemble.clusterThreshold,
          backboneAtoms: this.config.ensemble.backboneAtoms
        }
      )
      await this.commit(async () => {
        this.run.consensus = consensus
        await this.store.markStageCompleted(this.run, id, [file])
      })
    })
  }

  private async scoring(): Promise<void> {
    const id = 'scoring'
    await this.stage(id, async () => {
      if (this.options.skipScoring) {
        await this.commit(async () => {
          this.run.ranking = []
          await this.store.markStageSkipped(this.run, id, 'disabled')
        })
        return
      }
      if (!(await this.scorer.check())) {
        throw new Error(`${this.scorer.name} not found`)
      }
      const candidates = this.scoringCandidates()
      logger.info(`scoring ${candidates.length} structure(s)`)
      const result = await this.scorer.score(
        candidates,
        this.inputFasta,
        this.dir(RUN_LAYOUT.scoring),
        this.signal
      )
      await this.commit(async () => {
        this.run.ranking = result.ranking
        await this.store.markStageCompleted(this.run, id, [result.scoresFile, result.rankingFile])
      })
    })
  }

  private async report(): Promise<void> {
    const id = 'report'
    await this.stage(id, async () => {
      // the summary lists the report stage as completed; the store only
      // records that once the file exists
      const rendered: PipelineRun = {
        ...this.run,
        stages: this.run.stages.map((s) => (s.id === id ? { ...s, status: 'completed' } : s))
      }
      const file = await writeReport(rendered, this.options.outDir)
      await this.commit(() => this.store.markStageCompleted(this.run, id, [file]))
    })
  }

  async execute(): Promise<PipelineRun> {
    const detach = attachRunLog(this.options.outDir)
    try {
      return await this.executeStages()
    } finally {
      detach()
    }
  }

  private async executeStages(): Promise<PipelineRun> {
    await this.prepareInput()
    await this.loadOrCreateRun()
    this.computeFingerprints()

    await this.sequenceAnalysis()
    await this.secondaryStructure()

    const branches = await Promise.allSettled(this.backends.map((b) => this.backendBranch(b)))
    const rejected = branches.flatMap((b) => (b.status === 'rejected' ? [b.reason] : []))
    await this.commits
    const fatal =
      rejected.find((r) => r instanceof PersistenceError) ??
      rejected.find((r) => r instanceof PipelineInterruptedError) ??
      rejected[0]
    if (fatal !== undefined) {
      throw fatal
    }

    await this.consensus()
    await this.scoring()
    await this.report()
    await this.commits
    return this.run
  }
}

export interface RunAssessment {
  ok: boolean
  failedStage?: StageId
  reason?: string
}

/**
 * Success means a non-empty ranking, or with scoring disabled at least one
 * predicted structure.
 */
export const assessRun = (run: PipelineRun, skipScoring = false): RunAssessment => {
  const structures = Object.values(run.ensembles).flatMap((e) => e.members.filter(isSuccessful))
  if (skipScoring) {
    return structures.length > 0
      ? { ok: true }
      : { ok: false, failedStage: firstFailed(run), reason: 'no structure was predicted' }
  }
  if (run.ranking.length > 0) {
    return { ok: true }
  }
  const failedStage = firstFailed(run) ?? 'scoring'
  return {
    ok: false,
    failedStage,
    reason: findStage(run, failedStage)?.message ?? 'scoring produced no ranking'
  }
}

const firstFailed = (run: PipelineRun): StageId | undefined => {
  const failedScoring = findStage(run, 'scoring')
  if (failedScoring?.status === 'failed') return 'scoring'
  return run.stages.find((s) => s.status === 'failed')?.id
}
