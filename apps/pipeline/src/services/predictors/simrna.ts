import fs from 'fs-extra'
import path from 'path'
import type { PipelineConfig } from '../../config/pipeline-config.js'
import type { ProcessRunner } from '../../helpers/runProcess.js'
import { findFiles, which } from '../../helpers/files.js'
import {
  ExternalPredictor,
  outcomeFromProcess,
  type BackendCapabilities,
  type PredictRequest,
  type PredictionOutcome
} from './predictor.js'

type SimRNASettings = PipelineConfig['backends']['simrna']

/**
 * Distance restraints for every base pair of a dot-bracket string, using
 * N1/N3 atoms.
 */
export const restraintsFromDotBracket = (dotBracket: string): string[] => {
  const lines: string[] = []
  const stack: number[] = []
  for (let i = 0; i < dotBracket.length; i++) {
    const ch = dotBracket[i]
    if (ch === '(') {
      stack.push(i)
    } else if (ch === ')') {
      const j = stack.pop()
      if (j !== undefined) {
        lines.push(`DIST A ${j + 1} N1 A ${i + 1} N3 5.0 10.0 1.0`)
      }
    }
  }
  return lines
}

/**
 * SimRNA adapter: one Monte Carlo replica per member on the CPU, followed by
 * trajectory-to-PDB extraction.
 */
export class SimRNABackend extends ExternalPredictor {
  readonly name = 'simrna'
  readonly capabilities: BackendCapabilities = {
    batch: false,
    exclusiveDevice: false,
    deterministicBaseline: false,
    stochastic: false
  }

  constructor(
    private readonly settings: SimRNASettings,
    runner: ProcessRunner
  ) {
    super(runner, settings.seedBase, settings.batch, settings.timeoutMin * 60 * 1000)
  }

  async check(): Promise<boolean> {
    return (await which(this.settings.binary)) !== null
  }

  async predict(request: PredictRequest): Promise<PredictionOutcome> {
    const { member, inputs } = request
    const memberDir = path.join(request.workDir, `member_${member.seedIndex}`)
    await fs.emptyDir(memberDir)

    const ss = inputs.secondaryStructure || '.'.repeat(inputs.sequence.length)
    const inputFile = path.join(memberDir, 'input.seq')
    await fs.writeFile(inputFile, `${inputs.sequence}\n${ss}\n`)

    const args = [
      '-s',
      inputFile,
      '-o',
      'simrna_run',
      '-n',
      String(this.settings.steps),
      '-R',
      '1',
      '-S',
      String(member.seed)
    ]
    if (this.settings.dataDir) {
      args.push('-E', this.settings.dataDir)
    }
    const restraints = restraintsFromDotBracket(inputs.secondaryStructure ?? '')
    if (restraints.length > 0) {
      const restraintsFile = path.join(memberDir, 'restraints.txt')
      await fs.writeFile(restraintsFile, restraints.join('\n') + '\n')
      args.push('-r', restraintsFile)
    }

    const ctx = { ...request, workDir: memberDir }
    let result = await this.invoke(this.settings.binary, args, ctx)

    const trafl = (await findFiles(memberDir, ['.trafl']))[0]
    if (result.code === 0 && !result.timedOut && !result.aborted && trafl) {
      result = await this.invoke(
        this.settings.trafl2pdbs,
        [trafl, '1'],
        ctx
      )
    }

    const pdbs = await findFiles(memberDir, ['.pdb'])
    return outcomeFromProcess(member.seedIndex, result, pdbs[0])
  }
}
