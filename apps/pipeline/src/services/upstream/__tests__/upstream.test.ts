import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import type { ProcessRunner } from '../../../helpers/runProcess.js'
import { parseTblout, runSequenceAnalysis } from '../infernal.js'
import { parseRnafoldOutput, readDotBracket } from '../rnafold.js'
import { bpseqToDotBracket, runPseudoknotPrediction } from '../spotrna.js'
import { validatePipelineConfig } from '../../../config/pipeline-config.js'

describe('infernal', () => {
  it('takes the first hit of a cmscan table', () => {
    const tbl = [
      '#idx target name  accession query name accession clan name mdl ...',
      '#--- ------------ --------- ---------- --------- --------- ---',
      '1    tRNA         RF00005   seq1       -         CL00001   cm  1 71 1 72 + no 1 0.58 0.0 64.5 1.3e-18 !  *  -  -  -  -  -  -  tRNA',
      '2    tRNA-Sec     RF01852   seq1       -         CL00001   cm  1 71 1 72 + no 1 0.58 0.0 20.1 2.0e-05 =  *  -  -  -  -  -  -  tRNA-Sec'
    ].join('\n')
    expect(parseTblout(tbl)).toEqual({ family: 'RF00005', evalue: 1.3e-18 })
  })

  it('returns undefined when there is no hit', () => {
    expect(parseTblout('# no hits\n\n')).toBeUndefined()
  })

  it('skips the stage when cmscan is unavailable', async () => {
    const tools = validatePipelineConfig({ tools: { cmscan: 'cmscan-not-installed' } }).tools
    const runner: ProcessRunner = vi.fn()
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rnaflow-sa-'))
    const result = await runSequenceAnalysis('in.fasta', dir, tools, { runner })
    expect(result).toEqual({ status: 'skipped', reason: 'cmscan-not-installed not found on PATH' })
    expect(runner).not.toHaveBeenCalled()
    await fs.remove(dir)
  })
})

describe('rnafold', () => {
  it('parses the MFE line of RNAfold -p output', () => {
    const stdout = [
      '>hairpin',
      'GGGAAACCC',
      '(((...))) ( -1.20)',
      '(((...))) [ -1.45]',
      '(((...))) { -1.20 d=0.35}',
      ' frequency of mfe structure in ensemble 0.6; ensemble diversity 0.70'
    ].join('\n')
    expect(parseRnafoldOutput(stdout)).toEqual({ dotBracket: '(((...)))', mfe: -1.2 })
  })

  it('accepts energies without inner spaces', () => {
    expect(parseRnafoldOutput('.((....)). (-3.40)\n')).toEqual({ dotBracket: '.((....)).', mfe: -3.4 })
  })

  it('returns undefined for unparsable output', () => {
    expect(parseRnafoldOutput('error: bad input\n')).toBeUndefined()
  })

  it('reads the dot-bracket back from rnafold.dot', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rnaflow-ss-'))
    const file = path.join(dir, 'rnafold.dot')
    await fs.writeFile(file, '>hairpin\nGGGAAACCC\n(((...))) (-1.20)\n')
    expect(await readDotBracket(file)).toBe('(((...)))')
    await fs.remove(dir)
  })
})

describe('spotrna', () => {
  const bpseq = [
    '# SPOT-RNA',
    '1 G 6',
    '2 G 5',
    '3 A 0',
    '4 C 9',
    '5 C 2',
    '6 C 1',
    '7 G 10',
    '8 A 0',
    '9 G 4',
    '10 C 7'
  ].join('\n')

  it('writes crossing pairs as square brackets', () => {
    expect(bpseqToDotBracket(bpseq)).toBe('((.[))(.])')
  })

  it('returns dots for an unpaired sequence', () => {
    expect(bpseqToDotBracket('1 A 0\n2 C 0\n3 G 0\n')).toBe('...')
  })

  it('runs the script and writes spotrna.dot', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rnaflow-spot-'))
    const script = path.join(dir, 'SPOT-RNA.py')
    await fs.writeFile(script, '')
    const calls: string[][] = []
    const runner: ProcessRunner = async (_command, args) => {
      calls.push(args)
      await fs.writeFile(path.join(args[args.indexOf('--outputs') + 1], 'knot.bpseq'), bpseq)
      return { code: 0, signal: null, timedOut: false, aborted: false, durationMs: 1, output: [] }
    }
    const workDir = path.join(dir, 'spotrna')
    const result = await runPseudoknotPrediction(
      'in.fasta',
      { header: 'knot', sequence: 'GGACCCGAGC' },
      workDir,
      { python: 'python3', script },
      { runner }
    )

    expect(calls[0]).toEqual([script, '--inputs', 'in.fasta', '--outputs', workDir])
    expect(result).toEqual({ dotBracket: '((.[))(.])', dotFile: path.join(workDir, 'spotrna.dot') })
    expect(await fs.readFile(result.dotFile, 'utf8')).toBe('>knot\nGGACCCGAGC\n((.[))(.])\n')
    expect(await readDotBracket(result.dotFile)).toBe('((.[))(.])')
    await fs.remove(dir)
  })

  it('refuses to run without a configured script', async () => {
    const runner: ProcessRunner = vi.fn()
    const workDir = path.join(os.tmpdir(), 'rnaflow-spot-unused')
    await expect(
      runPseudoknotPrediction(
        'in.fasta',
        { header: 'x', sequence: 'ACGU' },
        workDir,
        { python: 'python', script: '' },
        { runner }
      )
    ).rejects.toThrow('SPOT-RNA is not configured')
    expect(runner).not.toHaveBeenCalled()
  })
})
