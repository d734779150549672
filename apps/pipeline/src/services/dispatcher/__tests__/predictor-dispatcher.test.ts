import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import type { MemberPlan } from '@rnaflow/types'
import { dispatchEnsemble, type DispatchOptions } from '../predictor-dispatcher.js'
import {
  failure,
  type BackendCapabilities,
  type BatchRequest,
  type PredictRequest,
  type PredictionOutcome,
  type PredictorBackend
} from '../../predictors/predictor.js'
import type { BatchMode } from '../../../config/pipeline-config.js'
import { planEnsemble } from '../../diversity/diversity-controller.js'

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))

class FakeBackend implements PredictorBackend {
  readonly name = 'fake'
  readonly seedBase = 0
  readonly timeoutMs = 1000
  readonly calls: { device: string; seeds: number[]; logFile: string }[] = []
  readonly active = new Map<string, number>()
  maxActivePerDevice = 0
  failSeeds = new Set<number>()
  throwOn = new Set<number>()
  delayFor: (seedIndex: number) => number = () => 1

  constructor(
    readonly capabilities: BackendCapabilities,
    readonly batchMode: BatchMode = 'auto'
  ) {}

  async check() {
    return true
  }

  private async produce(request: PredictRequest | BatchRequest, member: MemberPlan) {
    const active = (this.active.get(request.device) ?? 0) + 1
    this.active.set(request.device, active)
    this.maxActivePerDevice = Math.max(this.maxActivePerDevice, active)
    await sleep(this.delayFor(member.seedIndex))
    this.active.set(request.device, (this.active.get(request.device) ?? 1) - 1)

    if (this.throwOn.has(member.seedIndex)) {
      throw new Error(`cannot start seed ${member.seed}`)
    }
    if (this.failSeeds.has(member.seedIndex)) {
      return {
        seedIndex: member.seedIndex,
        failure: failure('exit', 'process failed with exit code 1', {
          code: 1,
          signal: null,
          output: ['CUDA out of memory']
        })
      }
    }
    const structure = path.join(request.workDir, `seed_${member.seed}.pdb`)
    await fs.writeFile(structure, 'ATOM\n')
    return { seedIndex: member.seedIndex, structure, confidence: { plddtMean: 80 + member.seedIndex } }
  }

  async predict(request: PredictRequest): Promise<PredictionOutcome> {
    this.calls.push({ device: request.device, seeds: [request.member.seed], logFile: request.logFile })
    return this.produce(request, request.member)
  }

  async predictBatch(request: BatchRequest): Promise<PredictionOutcome[]> {
    this.calls.push({
      device: request.device,
      seeds: request.members.map((m) => m.seed),
      logFile: request.logFile
    })
    const outcomes: PredictionOutcome[] = []
    for (const m of request.members) {
      outcomes.push(await this.produce(request, m))
    }
    return outcomes
  }
}

const capabilities = (overrides: Partial<BackendCapabilities> = {}): BackendCapabilities => ({
  batch: false,
  exclusiveDevice: false,
  deterministicBaseline: true,
  stochastic: true,
  ...overrides
})

describe('dispatchEnsemble', () => {
  let dir: string
  let options: DispatchOptions

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rnaflow-dispatch-'))
    options = {
      inputs: { fasta: 'input.fasta', sequence: 'ACGU', sequenceId: 'seq' },
      workDir: path.join(dir, 'predictions'),
      logDir: path.join(dir, 'logs'),
      devices: [],
      maxParallelDevices: 4
    }
  })

  afterEach(async () => {
    await fs.remove(dir)
  })

  const plans = (n: number) => planEnsemble({ nstruct: n, mcDropout: true, noiseScale: 0.1 })

  it('runs one invocation per member and returns members in seed order', async () => {
    const backend = new FakeBackend(capabilities())
    backend.delayFor = (i) => 30 - i * 10
    const result = await dispatchEnsemble(backend, plans(3), options)

    expect(result.backend).toBe('fake')
    expect(result.members.map((m) => m.seedIndex)).toEqual([0, 1, 2])
    expect(result.members.every((m) => m.device === 'default')).toBe(true)
    expect(result.members[1]).toMatchObject({ dropout: true, noiseScale: 0.1 })
    expect(backend.calls.map((c) => path.basename(c.logFile)).sort()).toEqual([
      'member_0.log',
      'member_1.log',
      'member_2.log'
    ])
  })

  it('batches all members that share a device', async () => {
    const backend = new FakeBackend(capabilities({ batch: true, exclusiveDevice: true }))
    const result = await dispatchEnsemble(backend, plans(4), {
      ...options,
      devices: ['cuda:0', 'cuda:1']
    })

    const calls = [...backend.calls].sort((a, b) => a.device.localeCompare(b.device))
    expect(calls.map((c) => ({ device: c.device, seeds: c.seeds }))).toEqual([
      { device: 'cuda:0', seeds: [0, 2] },
      { device: 'cuda:1', seeds: [1, 3] }
    ])
    expect(path.basename(calls[0].logFile)).toBe('batch_cuda_0.log')
    expect(result.members.map((m) => m.device)).toEqual(['cuda:0', 'cuda:1', 'cuda:0', 'cuda:1'])
  })

  it('runs per member when batching is disabled in configuration', async () => {
    const backend = new FakeBackend(capabilities({ batch: true, exclusiveDevice: true }), 'never')
    await dispatchEnsemble(backend, plans(3), options)
    expect(backend.calls.map((c) => c.seeds)).toEqual([[0], [1], [2]])
  })

  it('never overlaps members on an exclusive device', async () => {
    const backend = new FakeBackend(capabilities({ exclusiveDevice: true }))
    backend.delayFor = () => 10
    await dispatchEnsemble(backend, plans(4), { ...options, devices: ['cuda:0', 'cuda:1'] })
    expect(backend.maxActivePerDevice).toBe(1)
    expect(backend.calls).toHaveLength(4)
  })

  it('records failed members and keeps going', async () => {
    const backend = new FakeBackend(capabilities())
    backend.failSeeds.add(1)
    backend.throwOn.add(2)
    const result = await dispatchEnsemble(backend, plans(3), options)

    expect(result.members[0].structure).toBe(path.join(options.workDir, 'seed_0.pdb'))
    expect(result.members[1].failure).toMatchObject({
      kind: 'exit',
      exitCode: 1,
      output: ['CUDA out of memory']
    })
    expect(result.members[2].failure).toMatchObject({
      kind: 'spawn_error',
      message: 'cannot start seed 2'
    })
  })

  it('reports each member as it finishes', async () => {
    const backend = new FakeBackend(capabilities())
    backend.failSeeds.add(0)
    backend.delayFor = (i) => 30 - i * 10
    const done: number[] = []
    await dispatchEnsemble(backend, plans(3), {
      ...options,
      onMemberDone: (member) => done.push(member.seedIndex)
    })
    expect(done).toEqual([2, 1, 0])
  })

  it('keeps confidence metrics of successful members only', async () => {
    const backend = new FakeBackend(capabilities())
    backend.failSeeds.add(1)
    const result = await dispatchEnsemble(backend, plans(2), options)
    expect(result.members[0].confidence).toEqual({ plddtMean: 80 })
    expect(result.members[1]).not.toHaveProperty('confidence')
  })

  it('marks members aborted when the run is already interrupted', async () => {
    const backend = new FakeBackend(capabilities())
    const controller = new AbortController()
    controller.abort()
    const result = await dispatchEnsemble(backend, plans(2), { ...options, signal: controller.signal })
    expect(result.members.map((m) => m.failure?.kind)).toEqual(['aborted', 'aborted'])
    expect(backend.calls).toHaveLength(0)
  })
})
