import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import JSZip from 'jszip'
import type { ProcessResult, ProcessRunner, RunProcessOptions } from '../../../helpers/runProcess.js'
import { validatePipelineConfig } from '../../../config/pipeline-config.js'
import { ConfigurationError } from '../../../helpers/errors.js'
import { RhoFoldBackend } from '../rhofold.js'
import { ProtenixBackend, buildProtenixInput } from '../protenix.js'
import { SimRNABackend, restraintsFromDotBracket } from '../simrna.js'
import { createBackend, createBackends } from '../registry.js'
import { outcomeFromProcess, type InvocationContext } from '../predictor.js'
import { planEnsemble } from '../../diversity/diversity-controller.js'

const exited = (code: number | null, extra: Partial<ProcessResult> = {}): ProcessResult => ({
  code,
  signal: null,
  timedOut: false,
  aborted: false,
  durationMs: 5,
  output: [],
  ...extra
})

interface Call {
  command: string
  args: string[]
  opts: RunProcessOptions
}

const recordingRunner = (
  onCall: (call: Call) => Promise<ProcessResult>
): { runner: ProcessRunner; calls: Call[] } => {
  const calls: Call[] = []
  const runner: ProcessRunner = async (command, args, opts = {}) => {
    const call = { command, args, opts }
    calls.push(call)
    return onCall(call)
  }
  return { runner, calls }
}

const argAfter = (args: string[], flag: string) => args[args.indexOf(flag) + 1]

const npz = async (plddt: number[]): Promise<Buffer> => {
  const header = `{'descr': '<f4', 'fortran_order': False, 'shape': (1, ${plddt.length}), }\n`
  const npy = Buffer.alloc(10 + header.length + plddt.length * 4)
  npy.write('\x93NUMPY', 0, 'latin1')
  npy[6] = 1
  npy.writeUInt16LE(header.length, 8)
  npy.write(header, 10, 'latin1')
  plddt.forEach((v, i) => npy.writeFloatLE(v, 10 + header.length + i * 4))
  const zip = new JSZip()
  zip.file('plddt.npy', npy)
  return zip.generateAsync({ type: 'nodebuffer' })
}

describe('backend adapters', () => {
  let dir: string
  let ctx: InvocationContext

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rnaflow-adapters-'))
    ctx = {
      inputs: {
        fasta: path.join(dir, 'input.fasta'),
        sequence: 'GGGAAACCC',
        sequenceId: 'hairpin',
        secondaryStructure: '(((...)))'
      },
      device: 'cuda:1',
      workDir: dir,
      logFile: path.join(dir, 'logs', 'x.log'),
      timeoutMs: 60_000
    }
  })

  afterEach(async () => {
    await fs.remove(dir)
  })

  describe('rhofold', () => {
    const settings = () =>
      validatePipelineConfig({
        backends: {
          rhofold: {
            python: 'python3',
            script: '/opt/rhofold/inference.py',
            batchScript: '/opt/rhofold/batch.py',
            modelDir: '/opt/rhofold/model.pt'
          }
        }
      }).backends.rhofold

    it('passes per-seed flags to the batch script and collects run_<seed> outputs', async () => {
      const { runner, calls } = recordingRunner(async ({ args }) => {
        const base = argAfter(args, '--output_base_dir')
        await fs.outputFile(path.join(base, 'run_0', 'unrelaxed_model.pdb'), 'ATOM\n')
        await fs.outputFile(path.join(base, 'run_2', 'unrelaxed_model.pdb'), 'ATOM\n')
        return exited(0)
      })
      const backend = new RhoFoldBackend(settings(), runner)
      const members = planEnsemble({ nstruct: 3, mcDropout: true, noiseScale: 0.05 })
      const outcomes = await backend.predictBatch({ ...ctx, members })

      const [call] = calls
      expect(call.command).toBe('python3')
      expect(call.args[0]).toBe('/opt/rhofold/batch.py')
      expect(argAfter(call.args, '--seeds')).toBe('0,1,2')
      expect(argAfter(call.args, '--dropout_flags')).toBe('0,1,1')
      expect(argAfter(call.args, '--noise_scales')).toBe('0,0.05,0.05')
      expect(argAfter(call.args, '--device')).toBe('cuda:1')
      expect(argAfter(call.args, '--ckpt')).toBe('/opt/rhofold/model.pt')
      expect(argAfter(call.args, '--output_base_dir')).toBe(path.join(dir, 'batch_cuda_1'))

      expect(outcomes.map((o) => o.seedIndex)).toEqual([0, 1, 2])
      expect(outcomes[0].structure).toBe(path.join(dir, 'batch_cuda_1', 'run_0', 'unrelaxed_model.pdb'))
      expect(outcomes[1].failure?.kind).toBe('missing_output')
      expect(outcomes[2].failure).toBeUndefined()
    })

    it('runs inference.py with PYTHONHASHSEED when no batch script is set', async () => {
      const { runner, calls } = recordingRunner(async ({ args }) => {
        await fs.outputFile(path.join(argAfter(args, '--output_dir'), 'model.pdb'), 'ATOM\n')
        return exited(0)
      })
      const backend = new RhoFoldBackend({ ...settings(), batchScript: '' }, runner)
      expect(backend.capabilities.batch).toBe(false)

      const [member] = planEnsemble({ nstruct: 1, mcDropout: false, noiseScale: 0 })
      const outcome = await backend.predict({ ...ctx, inputs: { ...ctx.inputs, msa: '/tmp/aln.sto' }, member })

      expect(calls[0].args.slice(0, 5)).toEqual([
        '/opt/rhofold/inference.py',
        '--input_fas',
        ctx.inputs.fasta,
        '--single_seq_pred',
        'True'
      ])
      expect(argAfter(calls[0].args, '--input_a3m')).toBe('/tmp/aln.sto')
      expect(calls[0].opts.env).toEqual({ PYTHONHASHSEED: '0' })
      expect(outcome.structure).toBe(path.join(dir, 'run_0', 'model.pdb'))
    })

    it('reads mean pLDDT from results.npz beside each structure', async () => {
      const { runner } = recordingRunner(async ({ args }) => {
        const run0 = path.join(argAfter(args, '--output_base_dir'), 'run_0')
        await fs.outputFile(path.join(run0, 'unrelaxed_model.pdb'), 'ATOM\n')
        await fs.outputFile(path.join(run0, 'results.npz'), await npz([0.5, 0.75]))
        await fs.outputFile(
          path.join(argAfter(args, '--output_base_dir'), 'run_1', 'unrelaxed_model.pdb'),
          'ATOM\n'
        )
        return exited(0)
      })
      const backend = new RhoFoldBackend(settings(), runner)
      const members = planEnsemble({ nstruct: 2, mcDropout: false, noiseScale: 0 })
      const outcomes = await backend.predictBatch({ ...ctx, members })

      expect(outcomes[0].confidence).toEqual({ plddtMean: 62.5 })
      expect(outcomes[1].structure).toBeDefined()
      expect(outcomes[1]).not.toHaveProperty('confidence')
    })

    it('ignores structures left in the batch directory by an earlier run', async () => {
      const stale = path.join(dir, 'batch_cuda_1', 'run_1', 'unrelaxed_model.pdb')
      const otherSeed = path.join(dir, 'batch_cuda_1', 'run_7', 'unrelaxed_model.pdb')
      await fs.outputFile(stale, 'ATOM\n')
      await fs.outputFile(otherSeed, 'ATOM\n')
      const { runner } = recordingRunner(async () => exited(0))
      const backend = new RhoFoldBackend(settings(), runner)
      const members = planEnsemble({ nstruct: 2, mcDropout: false, noiseScale: 0 })
      const outcomes = await backend.predictBatch({ ...ctx, members })

      expect(outcomes.map((o) => o.failure?.kind)).toEqual(['missing_output', 'missing_output'])
      expect(await fs.pathExists(stale)).toBe(false)
      expect(await fs.pathExists(otherSeed)).toBe(true)
    })

    it('reports unavailable scripts', async () => {
      const { runner } = recordingRunner(async () => exited(0))
      expect(await new RhoFoldBackend(settings(), runner).check()).toBe(false)
    })
  })

  describe('protenix', () => {
    it('writes the seed list and pins the GPU', async () => {
      const { runner, calls } = recordingRunner(async ({ args }) => {
        const out = argAfter(args, '-o')
        await fs.outputFile(
          path.join(out, 'rnaflow_hairpin', 'seed_42', 'predictions', 'rnaflow_hairpin_sample_0.cif'),
          'data_\n'
        )
        return exited(0)
      })
      const config = validatePipelineConfig({ backends: { protenix: { model: 'protenix_base' } } })
      const backend = new ProtenixBackend(config.backends.protenix, runner)
      const members = planEnsemble({ nstruct: 2, mcDropout: false, noiseScale: 0, seedBase: 42 })
      const outcomes = await backend.predictBatch({ ...ctx, members })

      const input = await fs.readJson(argAfter(calls[0].args, '-i'))
      expect(input).toEqual(buildProtenixInput('GGGAAACCC', 'hairpin', [42, 43]))
      expect(input[0].modelSeeds).toEqual([42, 43])
      expect(calls[0].args.slice(-2)).toEqual(['-n', 'protenix_base'])
      expect(calls[0].opts.env).toEqual({ CUDA_VISIBLE_DEVICES: '1' })
      expect(outcomes[0].structure).toMatch(/seed_42\/predictions\/rnaflow_hairpin_sample_0\.cif$/)
      expect(outcomes[1].failure?.kind).toBe('missing_output')
    })

    it('prefers the summary confidence file of a seed', async () => {
      const { runner } = recordingRunner(async ({ args }) => {
        const seedDir = path.join(argAfter(args, '-o'), 'rnaflow_hairpin', 'seed_42')
        await fs.outputFile(path.join(seedDir, 'predictions', 'rnaflow_hairpin_sample_0.cif'), 'data_\n')
        await fs.outputJson(
          path.join(seedDir, 'predictions', 'rnaflow_hairpin_summary_confidence_sample_0.json'),
          { plddt: 72.5, ptm: 0.5, ranking_score: 0.25 }
        )
        await fs.outputJson(
          path.join(seedDir, 'predictions', 'rnaflow_hairpin_full_data_confidence_sample_0.json'),
          { plddt: [10, 20] }
        )
        return exited(0)
      })
      const backend = new ProtenixBackend(validatePipelineConfig({}).backends.protenix, runner)
      const members = planEnsemble({ nstruct: 1, mcDropout: false, noiseScale: 0, seedBase: 42 })
      const [outcome] = await backend.predictBatch({ ...ctx, members })
      expect(outcome.confidence).toEqual({ plddtMean: 72.5, ptm: 0.5, rankingScore: 0.25 })
    })

    it('ignores structures left in the seed directory by an earlier run', async () => {
      await fs.outputFile(
        path.join(dir, 'seeds_42', 'rnaflow_hairpin', 'seed_42', 'predictions', 'old.cif'),
        'data_\n'
      )
      const { runner } = recordingRunner(async () => exited(0))
      const backend = new ProtenixBackend(validatePipelineConfig({}).backends.protenix, runner)
      const members = planEnsemble({ nstruct: 1, mcDropout: false, noiseScale: 0, seedBase: 42 })
      const [outcome] = await backend.predictBatch({ ...ctx, members })
      expect(outcome.failure?.kind).toBe('missing_output')
    })

    it('fails every member of a timed-out invocation', async () => {
      const { runner } = recordingRunner(async () =>
        exited(null, { timedOut: true, signal: 'SIGTERM', durationMs: 61_000 })
      )
      const backend = new ProtenixBackend(validatePipelineConfig({}).backends.protenix, runner)
      const members = planEnsemble({ nstruct: 2, mcDropout: false, noiseScale: 0, seedBase: 42 })
      const outcomes = await backend.predictBatch({ ...ctx, members })
      expect(outcomes.map((o) => o.failure?.message)).toEqual([
        'timed out after 61s',
        'timed out after 61s'
      ])
    })
  })

  describe('simrna', () => {
    it('derives distance restraints from base pairs', () => {
      expect(restraintsFromDotBracket('((..))')).toEqual([
        'DIST A 2 N1 A 5 N3 5.0 10.0 1.0',
        'DIST A 1 N1 A 6 N3 5.0 10.0 1.0'
      ])
      expect(restraintsFromDotBracket('....')).toEqual([])
    })

    it('runs a replica then converts its trajectory', async () => {
      const { runner, calls } = recordingRunner(async ({ command, opts }) => {
        const cwd = opts.cwd ?? dir
        if (command === 'SimRNA') {
          await fs.writeFile(path.join(cwd, 'simrna_run.trafl'), 'frames\n')
        } else {
          await fs.writeFile(path.join(cwd, 'simrna_run-000001.pdb'), 'ATOM\n')
        }
        return exited(0)
      })
      const config = validatePipelineConfig({ backends: { simrna: { binary: 'SimRNA', steps: 1000 } } })
      const backend = new SimRNABackend(config.backends.simrna, runner)
      expect(backend.capabilities.exclusiveDevice).toBe(false)

      const [, member] = planEnsemble({ nstruct: 2, mcDropout: false, noiseScale: 0, seedBase: 1 })
      const outcome = await backend.predict({ ...ctx, member })
      const memberDir = path.join(dir, 'member_1')

      expect(calls[0].args).toEqual([
        '-s',
        path.join(memberDir, 'input.seq'),
        '-o',
        'simrna_run',
        '-n',
        '1000',
        '-R',
        '1',
        '-S',
        '2',
        '-r',
        path.join(memberDir, 'restraints.txt')
      ])
      expect(await fs.readFile(path.join(memberDir, 'input.seq'), 'utf8')).toBe('GGGAAACCC\n(((...)))\n')
      expect(calls[1]).toMatchObject({
        command: 'SimRNA_trafl2pdbs',
        args: [path.join(memberDir, 'simrna_run.trafl'), '1']
      })
      expect(outcome.structure).toBe(path.join(memberDir, 'simrna_run-000001.pdb'))
    })
  })

  describe('simrna stale output', () => {
    it('clears the member directory before running', async () => {
      await fs.outputFile(path.join(dir, 'member_0', 'old_run-000001.pdb'), 'ATOM\n')
      const { runner, calls } = recordingRunner(async () => exited(0))
      const backend = new SimRNABackend(validatePipelineConfig({}).backends.simrna, runner)
      const [member] = planEnsemble({ nstruct: 1, mcDropout: false, noiseScale: 0 })
      const outcome = await backend.predict({ ...ctx, member })

      expect(calls).toHaveLength(1)
      expect(outcome.failure?.kind).toBe('missing_output')
    })
  })

  describe('outcomeFromProcess', () => {
    it('requires a zero exit status', async () => {
      const outcome = await outcomeFromProcess(3, exited(2, { output: ['boom'] }), undefined)
      expect(outcome).toEqual({
        seedIndex: 3,
        failure: {
          kind: 'exit',
          message: 'process failed with exit code 2',
          exitCode: 2,
          signal: null,
          output: ['boom']
        }
      })
    })

    it('reports aborted invocations', async () => {
      const outcome = await outcomeFromProcess(0, exited(null, { aborted: true, signal: 'SIGTERM' }), undefined)
      expect(outcome.failure?.kind).toBe('aborted')
    })
  })

  describe('registry', () => {
    const config = validatePipelineConfig({})

    it('creates adapters by name', () => {
      expect(createBackend('protenix', config).name).toBe('protenix')
      expect(createBackends(['simrna', 'rhofold', 'simrna'], config).map((b) => b.name)).toEqual([
        'simrna',
        'rhofold'
      ])
    })

    it('rejects unknown backends', () => {
      expect(() => createBackend('alphafold3', config)).toThrow(ConfigurationError)
      expect(() => createBackends([], config)).toThrow(ConfigurationError)
    })
  })
})
