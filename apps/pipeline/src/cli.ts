#!/usr/bin/env node
/**
 * rnaflow command line.
 *
 *   rnaflow run <input.fasta> -o <dir> [--backend a,b | --all] [-n N]
 *               [--mc-dropout] [--noise-scale x] [--device cuda:0,cuda:1]
 *               [--cluster-threshold x] [--timeout-min m]
 *               [--skip-sequence-analysis] [--skip-scoring] [--spotrna]
 *               [-c config.yaml] [-v]
 *   rnaflow report <runDir>
 *   rnaflow check [-c config.yaml]
 *
 * Exit codes: 0 success, 1 pipeline failure, 2 configuration error,
 * 130 interrupted.
 */
import fs from 'fs-extra'
import path from 'path'
import { fileURLToPath } from 'node:url'
import { parseArgs } from 'node:util'
import { BACKEND_NAMES, loadPipelineConfig } from './config/pipeline-config.js'
import type { PipelineConfig } from './config/pipeline-config.js'
import { enableVerboseLogging, logger } from './helpers/loggers.js'
import {
  ConfigurationError,
  PipelineInterruptedError,
  getErrorMessage
} from './helpers/errors.js'
import { CheckpointStore } from './services/checkpoint/checkpoint-store.js'
import { createBackend } from './services/predictors/registry.js'
import { checkInfernal } from './services/upstream/infernal.js'
import { rnafoldAvailable } from './services/upstream/rnafold.js'
import { spotrnaAvailable } from './services/upstream/spotrna.js'
import { RNAdvisorScorer } from './services/scoring/rnadvisor.js'
import { writeReport } from './services/report/report.js'
import { PipelineOrchestrator, assessRun } from './services/pipeline/orchestrator.js'

export const EXIT = {
  ok: 0,
  failed: 1,
  config: 2,
  interrupted: 130
} as const

const USAGE = `Usage:
  rnaflow run <input.fasta> [options]
  rnaflow report <runDir>
  rnaflow check [-c config.yaml]

Run options:
  -o, --output-dir <dir>      Run directory (default: ./rnaflow_output)
  --backend <names>           Comma-separated backends (${BACKEND_NAMES.join(', ')})
  --all                       Run every backend
  -n, --nstruct <n>           Structures per backend
  --mc-dropout                Enable MC dropout for members 1..n-1
  --noise-scale <x>           Input noise for members 1..n-1
  --device <list>             Comma-separated devices, e.g. cuda:0,cuda:1
  --cluster-threshold <A>     RMSD clustering threshold in Angstrom
  --timeout-min <m>           Per-invocation prediction timeout
  --skip-sequence-analysis    Do not run the Rfam search
  --skip-scoring              Do not score structures
  --spotrna                   Also predict pseudoknots with SPOT-RNA
  -c, --config <file>         YAML config merged over the defaults
  -v, --verbose               Debug logging
  -h, --help                  Show this help`

export type CliCommand =
  | { command: 'help' }
  | {
      command: 'run'
      fasta: string
      outDir: string
      backends: string[]
      configFile?: string
      overrides: Record<string, unknown>
      timeoutMs?: number
      skipSequenceAnalysis: boolean
      skipScoring: boolean
      spotrna: boolean
      verbose: boolean
    }
  | { command: 'report'; runDir: string; verbose: boolean }
  | { command: 'check'; configFile?: string; verbose: boolean }

const splitList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean)

const parseNumber = (flag: string, value: string | undefined): number | undefined => {
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`--${flag} expects a number, got "${value}"`)
  }
  return parsed
}

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        'output-dir': { type: 'string', short: 'o' },
        backend: { type: 'string' },
        all: { type: 'boolean' },
        nstruct: { type: 'string', short: 'n' },
        'mc-dropout': { type: 'boolean' },
        'noise-scale': { type: 'string' },
        device: { type: 'string' },
        'cluster-threshold': { type: 'string' },
        'timeout-min': { type: 'string' },
        'skip-sequence-analysis': { type: 'boolean' },
        'skip-scoring': { type: 'boolean' },
        spotrna: { type: 'boolean' },
        config: { type: 'string', short: 'c' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' }
      }
    })
  } catch (error) {
    throw new ConfigurationError(getErrorMessage(error))
  }
}

/** Parses argv (without node and script) into a command. */
export const parseCommand = (argv: string[]): CliCommand => {
  const { values, positionals } = readArgs(argv)
  const [command, target] = positionals

  if (values.help || command === undefined) {
    return { command: 'help' }
  }
  const verbose = values.verbose ?? false

  switch (command) {
    case 'report':
      if (!target) throw new ConfigurationError('report needs a run directory')
      return { command: 'report', runDir: target, verbose }
    case 'check':
      return { command: 'check', configFile: values.config, verbose }
    case 'run':
      break
    default:
      throw new ConfigurationError(`Unknown command "${command}"`)
  }

  if (!target) {
    throw new ConfigurationError('run needs an input FASTA file')
  }
  if (values.all && values.backend) {
    throw new ConfigurationError('--backend and --all are mutually exclusive')
  }
  const backends = values.all ? [...BACKEND_NAMES] : splitList(values.backend)
  if (backends.length === 0) {
    throw new ConfigurationError('Select at least one backend with --backend or --all')
  }

  const ensemble: Record<string, unknown> = {}
  const nstruct = parseNumber('nstruct', values.nstruct)
  if (nstruct !== undefined) ensemble.nstruct = nstruct
  if (values['mc-dropout']) ensemble.mcDropout = true
  const noiseScale = parseNumber('noise-scale', values['noise-scale'])
  if (noiseScale !== undefined) ensemble.noiseScale = noiseScale
  const threshold = parseNumber('cluster-threshold', values['cluster-threshold'])
  if (threshold !== undefined) ensemble.clusterThreshold = threshold

  const overrides: Record<string, unknown> = { ensemble }
  if (values.device !== undefined) overrides.devices = splitList(values.device)

  const timeoutMin = parseNumber('timeout-min', values['timeout-min'])
  if (timeoutMin !== undefined && timeoutMin <= 0) {
    throw new ConfigurationError('--timeout-min must be positive')
  }

  return {
    command: 'run',
    fasta: target,
    outDir: path.resolve(values['output-dir'] ?? './rnaflow_output'),
    backends,
    configFile: values.config,
    overrides,
    ...(timeoutMin !== undefined ? { timeoutMs: timeoutMin * 60 * 1000 } : {}),
    skipSequenceAnalysis: values['skip-sequence-analysis'] ?? false,
    skipScoring: values['skip-scoring'] ?? false,
    spotrna: values.spotrna ?? false,
    verbose
  }
}

const runCommand = async (
  cmd: Extract<CliCommand, { command: 'run' }>,
  signal: AbortSignal
): Promise<number> => {
  const config = await loadPipelineConfig(cmd.configFile, cmd.overrides)
  const orchestrator = new PipelineOrchestrator(config, {
    fasta: cmd.fasta,
    outDir: cmd.outDir,
    backends: cmd.backends,
    skipSequenceAnalysis: cmd.skipSequenceAnalysis,
    skipScoring: cmd.skipScoring,
    spotrna: cmd.spotrna,
    timeoutMs: cmd.timeoutMs,
    signal
  })
  const run = await orchestrator.execute()
  const assessment = assessRun(run, cmd.skipScoring)
  if (assessment.ok) {
    logger.info(`Done. Results in ${cmd.outDir}`)
    return EXIT.ok
  }
  logger.error(`Pipeline failed at ${assessment.failedStage ?? 'unknown stage'}: ${assessment.reason}`)
  return EXIT.failed
}

const reportCommand = async (runDir: string): Promise<number> => {
  const store = new CheckpointStore(runDir)
  const run = await store.load()
  if (!run) {
    logger.error(`No pipeline state found in ${runDir}`)
    return EXIT.failed
  }
  const file = await writeReport(run, runDir)
  console.log(file)
  if (run.ranking.length === 0) {
    logger.error('The stored run has no ranking')
    return EXIT.failed
  }
  return EXIT.ok
}

const availabilityRows = async (config: PipelineConfig) => {
  const rows: { name: string; available: boolean; note: string }[] = []
  for (const name of BACKEND_NAMES) {
    rows.push({
      name,
      available: await createBackend(name, config).check(),
      note: 'prediction backend'
    })
  }
  const infernal = await checkInfernal(config.tools)
  rows.push({ name: 'infernal', available: infernal === null, note: infernal ?? 'Rfam search' })
  rows.push({
    name: 'rnafold',
    available: await rnafoldAvailable(config.tools.rnafold),
    note: 'secondary structure (required)'
  })
  rows.push({
    name: 'spotrna',
    available: await spotrnaAvailable(config.tools.spotrna),
    note: 'pseudoknots (optional)'
  })
  rows.push({
    name: 'rnadvisor',
    available: await new RNAdvisorScorer(config.tools.rnadvisor).check(),
    note: 'scoring'
  })
  return rows
}

const checkCommand = async (configFile?: string): Promise<number> => {
  const config = await loadPipelineConfig(configFile)
  const rows = await availabilityRows(config)
  const width = Math.max(...rows.map((r) => r.name.length))
  for (const row of rows) {
    console.log(`${row.name.padEnd(width)}  ${row.available ? 'OK     ' : 'MISSING'}  ${row.note}`)
  }
  return rows.some((r) => r.name === 'rnafold' && !r.available) ? EXIT.failed : EXIT.ok
}

export const main = async (argv: string[]): Promise<number> => {
  const controller = new AbortController()
  const onSignal = (sig: NodeJS.Signals) => {
    logger.warn(`${sig} received, stopping running tools`)
    controller.abort()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    const cmd = parseCommand(argv)
    if (cmd.command === 'help') {
      console.log(USAGE)
      return EXIT.ok
    }
    if (cmd.verbose) {
      enableVerboseLogging()
    }
    switch (cmd.command) {
      case 'run':
        return await runCommand(cmd, controller.signal)
      case 'report':
        return await reportCommand(cmd.runDir)
      case 'check':
        return await checkCommand(cmd.configFile)
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message)
      return EXIT.config
    }
    if (error instanceof PipelineInterruptedError) {
      logger.warn(error.message)
      return EXIT.interrupted
    }
    logger.error(getErrorMessage(error))
    return EXIT.failed
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
  }
}

// npm links bin entries, so compare real paths
const invokedDirectly =
  process.argv[1] !== undefined &&
  fs.existsSync(process.argv[1]) &&
  fs.realpathSync(process.argv[1]) === fs.realpathSync(fileURLToPath(import.meta.url))

if (invokedDirectly) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (error: unknown) => {
      logger.error(getErrorMessage(error))
      process.exitCode = EXIT.failed
    }
  )
}
