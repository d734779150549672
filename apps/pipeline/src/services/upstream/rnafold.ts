import fs from 'fs-extra'
import path from 'path'
import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { PipelineInterruptedError } from '../../helpers/errors.js'
import { makeDir, which } from '../../helpers/files.js'
import { runProcess, type ProcessRunner } from '../../helpers/runProcess.js'
import type { FastaRecord } from '../../helpers/fasta.js'
import { recordId } from '../../helpers/fasta.js'
import type { UpstreamOptions } from './infernal.js'

export interface SecondaryStructure {
  dotBracket: string
  mfe: number
  /** rnafold.dot in the work directory */
  dotFile: string
  /** Base-pair probability plot written by -p, when found */
  bppPlot?: string
}

/**
 * Dot-bracket and MFE from RNAfold stdout. The MFE line is the first one
 * ending in a parenthesised energy, e.g. `((...)) (-1.20)` or `((...)) ( -1.20)`.
 */
export const parseRnafoldOutput = (
  stdout: string
): { dotBracket: string; mfe: number } | undefined => {
  for (const raw of stdout.split('\n')) {
    const line = raw.trim()
    const match = /^([.()]+)\s+\(\s*(-?\d+(?:\.\d+)?)\)$/.exec(line)
    if (match) {
      return { dotBracket: match[1], mfe: parseFloat(match[2]) }
    }
  }
  return undefined
}

/** Reads the dot-bracket line back from a written rnafold.dot. */
export const readDotBracket = async (dotFile: string): Promise<string | undefined> => {
  const lines = (await fs.readFile(dotFile, 'utf8')).split('\n')
  return lines[2]?.split(/\s+/)[0] || undefined
}

export const rnafoldAvailable = async (binary: string) => (await which(binary)) !== null

/**
 * Runs RNAfold on the first FASTA record and writes rnafold.dot. Throws when
 * the binary is missing or its output cannot be parsed.
 */
export const runSecondaryStructure = async (
  fasta: string,
  record: FastaRecord,
  workDir: string,
  binary: string,
  {
    runner = runProcess,
    signal,
    timeoutMs = config.defaultTimeoutMs
  }: UpstreamOptions = {}
): Promise<SecondaryStructure> => {
  if (!(await rnafoldAvailable(binary))) {
    throw new Error(`${binary} not found on PATH`)
  }
  await makeDir(workDir)

  const stdout: string[] = []
  const result = await runner(binary, ['--noPS', '-p', '-i', fasta], {
    cwd: workDir,
    signal,
    timeoutMs,
    logFile: path.join(workDir, 'rnafold.log'),
    onStdoutLine: (line) => stdout.push(line)
  })
  if (result.aborted) {
    throw new PipelineInterruptedError('secondary_structure')
  }
  if (result.code !== 0) {
    throw new Error(`RNAfold failed (exit ${result.code}): ${result.output.slice(-3).join(' ')}`)
  }

  const parsed = parseRnafoldOutput(stdout.join('\n'))
  if (!parsed) {
    throw new Error('could not parse RNAfold output')
  }

  const dotFile = path.join(workDir, 'rnafold.dot')
  await fs.writeFile(
    dotFile,
    `>${record.header}\n${record.sequence}\n${parsed.dotBracket} (${parsed.mfe.toFixed(2)})\n`
  )

  const named = path.join(workDir, `${recordId(record)}_dp.ps`)
  let bppPlot: string | undefined
  if (await fs.pathExists(named)) {
    bppPlot = named
  } else {
    const plots = (await fs.readdir(workDir)).filter((f) => f.endsWith('_dp.ps'))
    bppPlot = plots.length > 0 ? path.join(workDir, plots.sort()[0]) : undefined
  }

  logger.info(`secondary structure: ${parsed.dotBracket} (${parsed.mfe.toFixed(2)} kcal/mol)`)
  return { ...parsed, dotFile, ...(bppPlot ? { bppPlot } : {}) }
}
