import type { StageId } from '@rnaflow/types'

export const getErrorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : typeof e === 'string' ? e : JSON.stringify(e)

/** Invalid flag combination or unknown backend; raised before any stage starts. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** A stage was reached while one of its upstream stages never completed. */
export class UpstreamStageFailure extends Error {
  public readonly stage: StageId
  public readonly upstream: StageId[]

  constructor(stage: StageId, upstream: StageId[]) {
    super(`${stage} cannot run: upstream stage(s) ${upstream.join(', ')} did not complete`)
    this.name = 'UpstreamStageFailure'
    this.stage = stage
    this.upstream = upstream
  }
}

/** Every member of a backend's ensemble failed. */
export class MemberExecutionFailure extends Error {
  public readonly backend: string

  constructor(backend: string, message: string) {
    super(message)
    this.name = 'MemberExecutionFailure'
    this.backend = backend
  }
}

/** The checkpoint could not be durably written; the run must stop. */
export class PersistenceError extends Error {
  public readonly path: string

  constructor(path: string, cause: unknown) {
    super(`Failed to persist pipeline state to ${path}: ${getErrorMessage(cause)}`)
    this.name = 'PersistenceError'
    this.path = path
  }
}

/** The run was interrupted; the last completed stage is on disk. */
export class PipelineInterruptedError extends Error {
  public readonly stage: StageId | undefined

  constructor(stage?: StageId) {
    super(
      stage
        ? `Pipeline interrupted during ${stage}; rerun to resume`
        : 'Pipeline interrupted; rerun to resume'
    )
    this.name = 'PipelineInterruptedError'
    this.stage = stage
  }
}
