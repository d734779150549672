import type { ConfidenceMetrics, MemberFailure, MemberPlan } from '@rnaflow/types'
import type { ProcessResult, ProcessRunner } from '../../helpers/runProcess.js'
import { isNonEmptyFile } from '../../helpers/files.js'
import type { BatchMode } from '../../config/pipeline-config.js'

export interface PredictionInputs {
  fasta: string
  sequence: string
  sequenceId: string
  msa?: string
  /** Dot-bracket from the secondary structure stage */
  secondaryStructure?: string
}

export interface InvocationContext {
  inputs: PredictionInputs
  device: string
  /** Directory owned by this backend inside the run directory */
  workDir: string
  logFile: string
  timeoutMs: number
  signal?: AbortSignal
}

export interface PredictRequest extends InvocationContext {
  member: MemberPlan
}

export interface BatchRequest extends InvocationContext {
  members: MemberPlan[]
}

export interface PredictionOutcome {
  seedIndex: number
  structure?: string
  confidence?: ConfidenceMetrics
  failure?: MemberFailure
}

export interface BackendCapabilities {
  /** Single-process multi-seed execution */
  batch: boolean
  /** Members sharing a device must not run in parallel */
  exclusiveDevice: boolean
  /** Seed 0 without perturbation reproduces the same structure */
  deterministicBaseline: boolean
  /** Honours dropout / noise flags */
  stochastic: boolean
}

export interface PredictorBackend {
  readonly name: string
  readonly capabilities: BackendCapabilities
  readonly seedBase: number
  readonly batchMode: BatchMode
  readonly timeoutMs: number
  check(): Promise<boolean>
  predict(request: PredictRequest): Promise<PredictionOutcome>
  predictBatch?(request: BatchRequest): Promise<PredictionOutcome[]>
}

export const failure = (
  kind: MemberFailure['kind'],
  message: string,
  result?: Pick<ProcessResult, 'code' | 'signal' | 'output'>
): MemberFailure => ({
  kind,
  message,
  exitCode: result?.code ?? null,
  signal: result?.signal ?? null,
  output: result?.output ?? []
})

/**
 * Turns a finished invocation into a member outcome. Exit status and the
 * presence of a non-empty structure file are both required for success.
 */
export const outcomeFromProcess = async (
  seedIndex: number,
  result: ProcessResult,
  structure: string | undefined
): Promise<PredictionOutcome> => {
  if (result.aborted) {
    return { seedIndex, failure: failure('aborted', 'interrupted', result) }
  }
  if (result.timedOut) {
    return {
      seedIndex,
      failure: failure('timeout', `timed out after ${Math.round(result.durationMs / 1000)}s`, result)
    }
  }
  if (result.code !== 0) {
    const how = result.signal ? `signal ${result.signal}` : `exit code ${result.code}`
    return { seedIndex, failure: failure('exit', `process failed with ${how}`, result) }
  }
  if (!structure || !(await isNonEmptyFile(structure))) {
    return {
      seedIndex,
      failure: failure(
        'missing_output',
        `process exited 0 but no structure was written${structure ? ` at ${structure}` : ''}`,
        result
      )
    }
  }
  return { seedIndex, structure }
}

/** Attaches the metrics a successful member's predictor reported, if any. */
export const withConfidence = async (
  outcome: PredictionOutcome,
  read: () => Promise<ConfidenceMetrics | undefined>
): Promise<PredictionOutcome> => {
  if (!outcome.structure) return outcome
  const confidence = await read()
  return confidence ? { ...outcome, confidence } : outcome
}

/**
 * Shared plumbing for adapters that wrap an external executable.
 */
export abstract class ExternalPredictor implements PredictorBackend {
  abstract readonly name: string
  abstract readonly capabilities: BackendCapabilities

  constructor(
    protected readonly runner: ProcessRunner,
    readonly seedBase: number,
    readonly batchMode: BatchMode,
    readonly timeoutMs: number
  ) {}

  abstract check(): Promise<boolean>
  abstract predict(request: PredictRequest): Promise<PredictionOutcome>

  protected invoke(
    command: string,
    args: string[],
    ctx: InvocationContext,
    extra: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
  ): Promise<ProcessResult> {
    return this.runner(command, args, {
      cwd: extra.cwd ?? ctx.workDir,
      env: extra.env,
      timeoutMs: ctx.timeoutMs,
      signal: ctx.signal,
      logFile: ctx.logFile
    })
  }
}
