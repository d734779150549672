import fs from 'fs-extra'
import path from 'path'
import type { PipelineConfig } from '../../config/pipeline-config.js'
import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { PipelineInterruptedError } from '../../helpers/errors.js'
import { findFiles } from '../../helpers/files.js'
import { runProcess } from '../../helpers/runProcess.js'
import type { FastaRecord } from '../../helpers/fasta.js'
import type { UpstreamOptions } from './infernal.js'

export type SpotRnaSettings = PipelineConfig['tools']['spotrna']

export interface PseudoknotStructure {
  dotBracket: string
  /** spotrna.dot in the work directory */
  dotFile: string
}

type Pair = [number, number]

const crosses = ([i, j]: Pair, [k, l]: Pair) => (i < k && k < j && j < l) || (k < i && i < l && l < j)

/**
 * Dot-bracket from a BPSEQ table (`index base partner`, 1-based). Pairs
 * are taken in order of their opening base; a pair crossing one already
 * written as `()` becomes `[]`.
 */
export const bpseqToDotBracket = (bpseq: string): string => {
  let length = 0
  const pairs: Pair[] = []
  for (const line of bpseq.split('\n')) {
    const fields = line.trim().split(/\s+/)
    if (fields.length !== 3) continue
    const index = Number(fields[0])
    const partner = Number(fields[2])
    if (!Number.isInteger(index) || !Number.isInteger(partner)) continue
    length = Math.max(length, index)
    if (partner > index) pairs.push([index, partner])
  }
  pairs.sort((a, b) => a[0] - b[0])

  const nested: Pair[] = []
  const knotted: Pair[] = []
  for (const pair of pairs) {
    if (nested.some((other) => crosses(pair, other))) {
      knotted.push(pair)
    } else {
      nested.push(pair)
    }
  }

  const structure = Array.from({ length }, () => '.')
  for (const [i, j] of nested) {
    structure[i - 1] = '('
    structure[j - 1] = ')'
  }
  for (const [i, j] of knotted) {
    structure[i - 1] = '['
    structure[j - 1] = ']'
  }
  return structure.join('')
}

export const spotrnaAvailable = async (settings: SpotRnaSettings): Promise<boolean> =>
  settings.script !== '' && (await fs.pathExists(settings.script))

/**
 * Runs SPOT-RNA on the input FASTA and writes spotrna.dot from the BPSEQ it
 * produces. Throws when the script is missing, fails, or writes no BPSEQ.
 */
export const runPseudoknotPrediction = async (
  fasta: string,
  record: FastaRecord,
  workDir: string,
  settings: SpotRnaSettings,
  {
    runner = runProcess,
    signal,
    timeoutMs = config.defaultTimeoutMs
  }: UpstreamOptions = {}
): Promise<PseudoknotStructure> => {
  if (!(await spotrnaAvailable(settings))) {
    throw new Error(
      settings.script ? `SPOT-RNA script not found: ${settings.script}` : 'SPOT-RNA is not configured'
    )
  }
  await fs.emptyDir(workDir)

  const result = await runner(
    settings.python,
    [settings.script, '--inputs', fasta, '--outputs', workDir],
    { cwd: workDir, signal, timeoutMs, logFile: path.join(workDir, 'spotrna.log') }
  )
  if (result.aborted) {
    throw new PipelineInterruptedError('secondary_structure')
  }
  if (result.code !== 0) {
    throw new Error(`SPOT-RNA failed (exit ${result.code}): ${result.output.slice(-3).join(' ')}`)
  }

  const [bpseq] = await findFiles(workDir, ['.bpseq'])
  if (!bpseq) {
    throw new Error('SPOT-RNA wrote no .bpseq file')
  }
  const dotBracket = bpseqToDotBracket(await fs.readFile(bpseq, 'utf8'))
  const dotFile = path.join(workDir, 'spotrna.dot')
  await fs.writeFile(dotFile, `>${record.header}\n${record.sequence}\n${dotBracket}\n`)
  logger.info(`SPOT-RNA structure: ${dotBracket}`)
  return { dotBracket, dotFile }
}
