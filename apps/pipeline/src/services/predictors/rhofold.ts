import fs from 'fs-extra'
import path from 'path'
import type { PipelineConfig } from '../../config/pipeline-config.js'
import type { ProcessRunner } from '../../helpers/runProcess.js'
import { logger } from '../../helpers/loggers.js'
import { findFiles } from '../../helpers/files.js'
import { DEFAULT_DEVICE } from '../scheduler/device-scheduler.js'
import { readNpzPlddt } from './confidence.js'
import {
  ExternalPredictor,
  outcomeFromProcess,
  withConfidence,
  type BackendCapabilities,
  type BatchRequest,
  type InvocationContext,
  type PredictRequest,
  type PredictionOutcome
} from './predictor.js'

type RhoFoldSettings = PipelineConfig['backends']['rhofold']

const deviceLabel = (device: string) => device.replace(/[^A-Za-z0-9_-]/g, '_')

/**
 * RhoFold+ adapter. The batch script loads the model once per device and
 * loops over seeds, writing run_<seed>/unrelaxed_model.pdb; without it each
 * member goes through inference.py on its own. Either way results.npz beside
 * the structure carries the pLDDT.
 */
export class RhoFoldBackend extends ExternalPredictor {
  readonly name = 'rhofold'
  readonly capabilities: BackendCapabilities

  constructor(
    private readonly settings: RhoFoldSettings,
    runner: ProcessRunner
  ) {
    super(runner, settings.seedBase, settings.batch, settings.timeoutMin * 60 * 1000)
    this.capabilities = {
      batch: Boolean(settings.batchScript),
      exclusiveDevice: true,
      deterministicBaseline: true,
      stochastic: Boolean(settings.batchScript)
    }
  }

  async check(): Promise<boolean> {
    const scripts = [this.settings.script, this.settings.batchScript].filter(Boolean)
    if (scripts.length === 0) {
      return false
    }
    for (const script of scripts) {
      if (!(await fs.pathExists(script))) {
        logger.warn(`RhoFold+ script not found: ${script}`)
        return false
      }
    }
    return true
  }

  private commonArgs(ctx: InvocationContext): string[] {
    const args = ['--input_fas', ctx.inputs.fasta, '--single_seq_pred', 'True']
    if (this.settings.modelDir) {
      args.push('--ckpt', this.settings.modelDir)
    }
    if (ctx.device !== DEFAULT_DEVICE) {
      args.push('--device', ctx.device)
    }
    if (ctx.inputs.msa) {
      args.push('--input_a3m', ctx.inputs.msa)
    }
    return args
  }

  private outputFor(baseDir: string, seed: number): string {
    return path.join(baseDir, `run_${seed}`, 'unrelaxed_model.pdb')
  }

  async predict(request: PredictRequest): Promise<PredictionOutcome> {
    if (this.settings.batchScript) {
      const [outcome] = await this.predictBatch({ ...request, members: [request.member] })
      return outcome
    }

    const { member } = request
    if (member.dropout || member.noiseScale > 0) {
      logger.warn(
        `rhofold seed ${member.seed}: stochastic flags need the batch script, running vanilla inference`
      )
    }
    const outDir = path.join(request.workDir, `run_${member.seed}`)
    await fs.emptyDir(outDir)

    const result = await this.invoke(
      this.settings.python,
      [this.settings.script, ...this.commonArgs(request), '--output_dir', outDir],
      request,
      { env: { PYTHONHASHSEED: String(member.seed) } }
    )
    const pdbs = await findFiles(outDir, ['.pdb'])
    return withConfidence(await outcomeFromProcess(member.seedIndex, result, pdbs[0]), () =>
      readNpzPlddt(path.join(outDir, 'results.npz'))
    )
  }

  async predictBatch(request: BatchRequest): Promise<PredictionOutcome[]> {
    const baseDir = path.join(request.workDir, `batch_${deviceLabel(request.device)}`)
    const { members } = request
    await fs.ensureDir(baseDir)
    // other seeds on this device may share baseDir
    await Promise.all(members.map((m) => fs.remove(path.join(baseDir, `run_${m.seed}`))))
    const args = [
      this.settings.batchScript,
      ...this.commonArgs(request),
      '--seeds',
      members.map((m) => m.seed).join(','),
      '--dropout_flags',
      members.map((m) => (m.dropout ? '1' : '0')).join(','),
      '--noise_scales',
      members.map((m) => String(m.noiseScale)).join(','),
      '--output_base_dir',
      baseDir
    ]

    const result = await this.invoke(this.settings.python, args, request)
    return Promise.all(
      members.map(async (m) =>
        withConfidence(
          await outcomeFromProcess(m.seedIndex, result, this.outputFor(baseDir, m.seed)),
          () => readNpzPlddt(path.join(baseDir, `run_${m.seed}`, 'results.npz'))
        )
      )
    )
  }
}
