import fs from 'fs-extra'
import path from 'path'
import type { PipelineConfig } from '../../config/pipeline-config.js'
import type { ProcessRunner } from '../../helpers/runProcess.js'
import { logger } from '../../helpers/loggers.js'
import { findFiles, which } from '../../helpers/files.js'
import { visibleDeviceIndex } from '../scheduler/device-scheduler.js'
import { readProtenixConfidence } from './confidence.js'
import {
  ExternalPredictor,
  outcomeFromProcess,
  withConfidence,
  type BackendCapabilities,
  type BatchRequest,
  type PredictRequest,
  type PredictionOutcome
} from './predictor.js'

type ProtenixSettings = PipelineConfig['backends']['protenix']

/** Protenix inference input for a single RNA chain. */
export const buildProtenixInput = (
  sequence: string,
  name: string,
  seeds: number[]
) => [
  {
    name: `rnaflow_${name}`,
    modelSeeds: seeds,
    sequences: [
      {
        rnaSequence: {
          sequence,
          count: 1
        }
      }
    ]
  }
]

/**
 * Protenix adapter. One invocation accepts any number of model seeds, and a
 * device is pinned with CUDA_VISIBLE_DEVICES.
 */
export class ProtenixBackend extends ExternalPredictor {
  readonly name = 'protenix'
  readonly capabilities: BackendCapabilities = {
    batch: true,
    exclusiveDevice: true,
    deterministicBaseline: false,
    stochastic: false
  }

  constructor(
    private readonly settings: ProtenixSettings,
    runner: ProcessRunner
  ) {
    super(runner, settings.seedBase, settings.batch, settings.timeoutMin * 60 * 1000)
  }

  async check(): Promise<boolean> {
    return (await which(this.settings.binary)) !== null
  }

  async predict(request: PredictRequest): Promise<PredictionOutcome> {
    const [outcome] = await this.predictBatch({ ...request, members: [request.member] })
    return outcome
  }

  async predictBatch(request: BatchRequest): Promise<PredictionOutcome[]> {
    const { members, inputs } = request
    if (members.some((m) => m.dropout || m.noiseScale > 0)) {
      logger.debug('protenix ignores dropout/noise flags; diversity comes from seeds')
    }

    const seeds = members.map((m) => m.seed)
    const outDir = path.join(request.workDir, `seeds_${seeds.join('_')}`)
    await fs.emptyDir(outDir)
    const jsonPath = path.join(outDir, 'input.json')
    await fs.writeJson(
      jsonPath,
      buildProtenixInput(inputs.sequence, inputs.sequenceId, seeds),
      { spaces: 2 }
    )

    const args = ['pred', '-i', jsonPath, '-o', outDir]
    if (this.settings.model) {
      args.push('-n', this.settings.model)
    }
    const gpu = visibleDeviceIndex(request.device)
    const env = gpu === undefined ? undefined : { CUDA_VISIBLE_DEVICES: gpu }

    const result = await this.invoke(this.settings.binary, args, request, { env })
    const structures = await findFiles(outDir, ['.cif', '.pdb'])

    return Promise.all(
      members.map(async (m) => {
        const marker = `${path.sep}seed_${m.seed}${path.sep}`
        const structure = structures.find((file) => file.includes(marker))
        const outcome = await outcomeFromProcess(m.seedIndex, result, structure)
        return withConfidence(outcome, () =>
          structure
            ? readProtenixConfidence(structure.slice(0, structure.indexOf(marker) + marker.length))
            : Promise.resolve(undefined)
        )
      })
    )
  }
}
