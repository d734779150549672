import fs from 'fs-extra'
import path from 'path'
import type { RankedStructure, ScoringCandidate } from '@rnaflow/types'
import type { PipelineConfig } from '../../config/pipeline-config.js'
import { logger } from '../../helpers/loggers.js'
import { PipelineInterruptedError } from '../../helpers/errors.js'
import { makeDir, which } from '../../helpers/files.js'
import { runProcess, type ProcessRunner } from '../../helpers/runProcess.js'

export type MetricScores = Record<string, number>

export interface ScoringResult {
  ranking: RankedStructure[]
  scoresFile: string
  rankingFile: string
}

export interface Scorer {
  readonly name: string
  check(): Promise<boolean>
  score(
    candidates: ScoringCandidate[],
    inputFasta: string,
    workDir: string,
    signal?: AbortSignal
  ): Promise<ScoringResult>
}

// Energy-like metrics; every other metric ranks higher-is-better
const LOWER_IS_BETTER = new Set(['rsRNASP', 'DFIRE', 'RASP', 'DFIRE-RNA'])
const NON_METRIC_COLUMNS = new Set(['', 'name', 'pdb', 'file'])

export const candidateLabel = (c: Pick<ScoringCandidate, 'backend' | 'seedIndex'>) =>
  `${c.backend}_seed${c.seedIndex}`

/** First data row of an RNAdvisor CSV as numeric metrics. */
export const parseScoresCsv = (content: string): MetricScores => {
  const lines = content.split('\n').map((l) => l.trim()).filter(Boolean)
  if (lines.length < 2) {
    return {}
  }
  const header = lines[0].split(',').map((h) => h.trim())
  const row = lines[1].split(',').map((v) => v.trim())
  const scores: MetricScores = {}
  header.forEach((column, i) => {
    const value = row[i]
    if (NON_METRIC_COLUMNS.has(column) || !value) return
    const parsed = Number(value)
    if (Number.isFinite(parsed)) {
      scores[column] = parsed
    }
  })
  return scores
}

/**
 * Consensus ranking: each metric ranks the models (1 = best), and models are
 * ordered by their mean rank across metrics. Ties keep input order.
 */
export const consensusRank = (
  scores: Map<string, MetricScores>
): { label: string; meanRank: number }[] => {
  const labels = [...scores.keys()]
  const metrics = new Set<string>()
  for (const s of scores.values()) {
    Object.keys(s).forEach((m) => metrics.add(m))
  }

  const rankSums = new Map(labels.map((l) => [l, 0]))
  let counted = 0
  for (const metric of metrics) {
    const values = labels
      .map((label) => ({ label, value: scores.get(label)?.[metric] }))
      .filter((v): v is { label: string; value: number } => v.value !== undefined)
    if (values.length === 0) continue

    const ascending = LOWER_IS_BETTER.has(metric)
    values.sort((a, b) => (ascending ? a.value - b.value : b.value - a.value))
    values.forEach(({ label }, i) => {
      rankSums.set(label, (rankSums.get(label) ?? 0) + i + 1)
    })
    counted++
  }

  return labels
    .map((label) => ({
      label,
      meanRank: counted === 0 ? 0 : (rankSums.get(label) ?? 0) / counted
    }))
    .sort((a, b) => a.meanRank - b.meanRank)
}

export class RNAdvisorScorer implements Scorer {
  readonly name = 'rnadvisor'
  private readonly timeoutMs: number

  constructor(
    private readonly settings: PipelineConfig['tools']['rnadvisor'],
    private readonly runner: ProcessRunner = runProcess
  ) {
    this.timeoutMs = settings.timeoutMin * 60 * 1000
  }

  async check(): Promise<boolean> {
    return (await which(this.settings.binary)) !== null
  }

  private async scoreOne(
    candidate: ScoringCandidate,
    workDir: string,
    signal?: AbortSignal
  ): Promise<MetricScores> {
    const label = candidateLabel(candidate)
    const stageDir = path.join(workDir, `_stage_${label}`)
    await fs.emptyDir(stageDir)
    await fs.copy(candidate.structure, path.join(stageDir, path.basename(candidate.structure)))

    const outCsv = path.join(workDir, `scores_${label}.csv`)
    await fs.remove(outCsv)
    const result = await this.runner(
      this.settings.binary,
      ['--pred_dir', stageDir, '--scores', this.settings.metrics.join(','), '--out_path', outCsv],
      {
        cwd: workDir,
        signal,
        timeoutMs: this.timeoutMs,
        logFile: path.join(workDir, 'rnadvisor.log')
      }
    )
    if (result.aborted) {
      throw new PipelineInterruptedError('scoring')
    }
    if (result.code !== 0 || result.timedOut) {
      logger.warn(`RNAdvisor failed for ${label}: ${result.output.slice(-2).join(' ')}`)
      return {}
    }
    if (!(await fs.pathExists(outCsv))) {
      logger.warn(`RNAdvisor wrote no scores for ${label}`)
      return {}
    }
    return parseScoresCsv(await fs.readFile(outCsv, 'utf8'))
  }

  async score(
    candidates: ScoringCandidate[],
    _inputFasta: string,
    workDir: string,
    signal?: AbortSignal
  ): Promise<ScoringResult> {
    if (candidates.length === 0) {
      throw new Error('No structures to score')
    }
    await makeDir(workDir)

    const byLabel = new Map<string, ScoringCandidate>()
    const scores = new Map<string, MetricScores>()
    for (const candidate of candidates) {
      const label = candidateLabel(candidate)
      const metrics = await this.scoreOne(candidate, workDir, signal)
      if (Object.keys(metrics).length > 0) {
        byLabel.set(label, candidate)
        scores.set(label, metrics)
      }
    }
    if (scores.size === 0) {
      throw new Error('No models could be scored')
    }

    const ranked = consensusRank(scores)
    const ranking: RankedStructure[] = []
    ranked.forEach(({ label, meanRank }, i) => {
      const candidate = byLabel.get(label)
      if (!candidate) return
      ranking.push({
        rank: i + 1,
        backend: candidate.backend,
        seedIndex: candidate.seedIndex,
        structure: candidate.structure,
        score: meanRank,
        metrics: scores.get(label) ?? {}
      })
    })

    const scoresFile = path.join(workDir, 'rnadvisor_scores.json')
    await fs.writeJson(scoresFile, Object.fromEntries(scores), { spaces: 2 })
    const rankingFile = path.join(workDir, 'ranking.txt')
    await fs.writeFile(
      rankingFile,
      ranked.map((r, i) => `${i + 1}. ${r.label} (avg_rank: ${r.meanRank.toFixed(2)})`).join('\n') + '\n'
    )
    logger.info(`scored ${scores.size}/${candidates.length} structure(s); best: ${ranked[0].label}`)
    return { ranking, scoresFile, rankingFile }
  }
}
