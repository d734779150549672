import path from 'path'
import { ConfigurationError } from '../helpers/errors.js'
import { EXIT, main, parseCommand } from '../cli.js'

describe('parseCommand', () => {
  it('maps run options onto config overrides', () => {
    const cmd = parseCommand([
      'run',
      'seq.fasta',
      '-o',
      'out',
      '--backend',
      'rhofold, simrna',
      '-n',
      '5',
      '--mc-dropout',
      '--noise-scale',
      '0.1',
      '--device',
      'cuda:0,cuda:1',
      '--cluster-threshold',
      '3.5',
      '--timeout-min',
      '2',
      '--skip-scoring',
      '--spotrna'
    ])
    expect(cmd).toEqual({
      command: 'run',
      fasta: 'seq.fasta',
      outDir: path.resolve('out'),
      backends: ['rhofold', 'simrna'],
      configFile: undefined,
      overrides: {
        ensemble: { nstruct: 5, mcDropout: true, noiseScale: 0.1, clusterThreshold: 3.5 },
        devices: ['cuda:0', 'cuda:1']
      },
      timeoutMs: 120000,
      skipSequenceAnalysis: false,
      skipScoring: true,
      spotrna: true,
      verbose: false
    })
  })

  it('expands --all to every backend', () => {
    const cmd = parseCommand(['run', 'seq.fasta', '--all'])
    expect(cmd).toMatchObject({
      backends: ['rhofold', 'protenix', 'simrna'],
      outDir: path.resolve('./rnaflow_output'),
      overrides: { ensemble: {} }
    })
  })

  it('rejects --backend together with --all', () => {
    expect(() => parseCommand(['run', 'seq.fasta', '--all', '--backend', 'rhofold'])).toThrow(
      '--backend and --all are mutually exclusive'
    )
  })

  it('requires a backend', () => {
    expect(() => parseCommand(['run', 'seq.fasta'])).toThrow(ConfigurationError)
  })

  it('rejects non-numeric counts', () => {
    expect(() => parseCommand(['run', 'seq.fasta', '--all', '-n', 'many'])).toThrow(
      '--nstruct expects a number, got "many"'
    )
  })

  it('turns unknown flags into configuration errors', () => {
    expect(() => parseCommand(['run', 'seq.fasta', '--fast'])).toThrow(ConfigurationError)
  })

  it('parses report and check', () => {
    expect(parseCommand(['report', 'runs/a', '-v'])).toEqual({
      command: 'report',
      runDir: 'runs/a',
      verbose: true
    })
    expect(parseCommand(['check', '-c', 'site.yaml'])).toEqual({
      command: 'check',
      configFile: 'site.yaml',
      verbose: false
    })
  })

  it('falls back to help', () => {
    expect(parseCommand([])).toEqual({ command: 'help' })
    expect(parseCommand(['run', '--help'])).toEqual({ command: 'help' })
  })
})

describe('main', () => {
  it('exits with the configuration code for an unknown command', async () => {
    expect(await main(['fold'])).toBe(EXIT.config)
  })

  it('prints usage for help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)
    expect(await main(['--help'])).toBe(EXIT.ok)
    expect(log.mock.calls[0][0]).toMatch(/^Usage:\n {2}rnaflow run <input.fasta> \[options\]/)
    log.mockRestore()
  })
})
