import fs from 'fs-extra'
import path from 'path'
import type { PipelineConfig } from '../../config/pipeline-config.js'
import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { PipelineInterruptedError } from '../../helpers/errors.js'
import { isNonEmptyFile, makeDir, which } from '../../helpers/files.js'
import { runProcess, type ProcessRunner } from '../../helpers/runProcess.js'

export interface RfamHit {
  family: string
  evalue: number
}

export type SequenceAnalysisResult =
  | { status: 'skipped'; reason: string }
  | {
      status: 'completed'
      hit?: RfamHit
      /** Stockholm alignment of the query against the family model */
      msa?: string
      artifacts: string[]
    }

type ToolSettings = PipelineConfig['tools']

export interface UpstreamOptions {
  runner?: ProcessRunner
  signal?: AbortSignal
  timeoutMs?: number
}

/**
 * Top hit of a `cmscan --fmt 2 --tblout` table. Columns: idx, target name,
 * accession, query, query accession, clan, model, mdl from/to, seq from/to,
 * strand, trunc, pass, gc, bias, score, E-value, ...
 */
export const parseTblout = (content: string): RfamHit | undefined => {
  for (const line of content.split('\n')) {
    if (line.startsWith('#') || !line.trim()) continue
    const fields = line.trim().split(/\s+/)
    if (fields.length < 18) continue
    const evalue = Number(fields[17])
    if (Number.isFinite(evalue)) {
      return { family: fields[2] === '-' ? fields[1] : fields[2], evalue }
    }
  }
  return undefined
}

export const checkInfernal = async (tools: ToolSettings): Promise<string | null> => {
  if (!(await which(tools.cmscan))) {
    return `${tools.cmscan} not found on PATH`
  }
  if (!tools.rfamCm || !(await fs.pathExists(tools.rfamCm))) {
    return `Rfam covariance model not found at "${tools.rfamCm}"`
  }
  return null
}

/**
 * Rfam family search followed by an optional MSA build. An unavailable
 * tool or model skips the stage; a failed cmfetch/cmalign leaves the stage
 * completed without an MSA.
 */
export const runSequenceAnalysis = async (
  fasta: string,
  workDir: string,
  tools: ToolSettings,
  {
    runner = runProcess,
    signal,
    timeoutMs = config.defaultTimeoutMs
  }: UpstreamOptions = {}
): Promise<SequenceAnalysisResult> => {
  const unavailable = await checkInfernal(tools)
  if (unavailable) {
    logger.warn(`sequence analysis skipped: ${unavailable}`)
    return { status: 'skipped', reason: unavailable }
  }

  await makeDir(workDir)
  const logFile = path.join(workDir, 'infernal.log')
  const tblout = path.join(workDir, 'cmscan_tblout.txt')
  const output = path.join(workDir, 'cmscan_output.txt')

  const args = ['--cut_ga', '--rfam', '--nohmmonly', '--fmt', '2', '--tblout', tblout, '-o', output]
  if (tools.rfamClanin && (await fs.pathExists(tools.rfamClanin))) {
    args.push('--clanin', tools.rfamClanin)
  }
  args.push(tools.rfamCm, fasta)

  const scan = await runner(tools.cmscan, args, { cwd: workDir, logFile, signal, timeoutMs })
  if (scan.aborted) {
    throw new PipelineInterruptedError('sequence_analysis')
  }
  if (scan.code !== 0) {
    const reason = `cmscan failed (exit ${scan.code}): ${scan.output.slice(-3).join(' ')}`
    logger.warn(`sequence analysis skipped: ${reason}`)
    return { status: 'skipped', reason }
  }

  const artifacts = [tblout]
  const hit = (await fs.pathExists(tblout))
    ? parseTblout(await fs.readFile(tblout, 'utf8'))
    : undefined
  if (!hit) {
    logger.info('no Rfam family hit')
    return { status: 'completed', artifacts }
  }
  logger.info(`Rfam hit: ${hit.family} (E-value: ${hit.evalue.toExponential(2)})`)

  const cm = path.join(workDir, `${hit.family}.cm`)
  const msa = path.join(workDir, 'alignment.sto')
  const fetch = await runner(tools.cmfetch, ['-o', cm, tools.rfamCm, hit.family], {
    cwd: workDir,
    logFile,
    signal,
    timeoutMs
  })
  if (fetch.code !== 0) {
    logger.warn(`cmfetch failed for ${hit.family}, continuing without MSA`)
    return { status: 'completed', hit, artifacts }
  }
  const align = await runner(
    tools.cmalign,
    ['--outformat', 'Stockholm', '-o', msa, cm, fasta],
    { cwd: workDir, logFile, signal, timeoutMs }
  )
  if (align.code !== 0 || !(await isNonEmptyFile(msa))) {
    logger.warn(`cmalign failed for ${hit.family}, continuing without MSA`)
    return { status: 'completed', hit, artifacts }
  }
  logger.info(`built MSA: ${msa}`)
  return { status: 'completed', hit, msa, artifacts: [...artifacts, msa] }
}
