import { EventEmitter } from 'events'
import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import { spawn } from 'node:child_process'
import type { MockInstance } from 'vitest'
import { runProcess } from '../runProcess.js'

vi.mock('node:child_process', () => ({
  spawn: vi.fn()
}))

interface FakeStream extends EventEmitter {
  resume: () => void
  pause: () => void
}

interface FakeChild extends EventEmitter {
  stdout: FakeStream
  stderr: FakeStream
  kill: ReturnType<typeof vi.fn>
}

const fakeStream = (): FakeStream =>
  Object.assign(new EventEmitter(), { resume: vi.fn(), pause: vi.fn() })

describe('runProcess', () => {
  let child: FakeChild

  beforeEach(() => {
    child = Object.assign(new EventEmitter(), {
      stdout: fakeStream(),
      stderr: fakeStream(),
      kill: vi.fn()
    })
    ;(spawn as unknown as MockInstance).mockReturnValue(child)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('spawns the command with merged env and cwd', async () => {
    setTimeout(() => child.emit('close', 0, null), 10)
    await runProcess('RNAfold', ['--noPS'], { cwd: '/tmp', env: { FOO: 'bar' } })
    expect(spawn).toHaveBeenCalledWith(
      'RNAfold',
      ['--noPS'],
      expect.objectContaining({ cwd: '/tmp', env: expect.objectContaining({ FOO: 'bar' }) })
    )
  })

  it('reports lines to the callbacks and keeps the output tail', async () => {
    const onStdoutLine = vi.fn()
    const onStderrLine = vi.fn()
    setTimeout(() => {
      child.stdout.emit('data', 'line1\nline2\n')
      child.stderr.emit('data', 'err1\n')
      child.stdout.emit('end')
      child.stderr.emit('end')
      setTimeout(() => child.emit('close', 0, null), 5)
    }, 10)
    const result = await runProcess('tool', [], { onStdoutLine, onStderrLine, tailLines: 2 })
    expect(onStdoutLine).toHaveBeenCalledWith('line1')
    expect(onStdoutLine).toHaveBeenCalledWith('line2')
    expect(onStderrLine).toHaveBeenCalledWith('err1')
    expect(result.output).toHaveLength(2)
    expect(result.code).toBe(0)
  })

  it('returns the exit code and signal', async () => {
    setTimeout(() => child.emit('close', 42, 'SIGUSR1'), 10)
    const result = await runProcess('tool', [])
    expect(result).toMatchObject({ code: 42, signal: 'SIGUSR1', timedOut: false, aborted: false })
  })

  it('terminates the process on timeout', async () => {
    setTimeout(() => child.emit('close', null, 'SIGTERM'), 50)
    const result = await runProcess('tool', [], { timeoutMs: 10 })
    expect(child.kill).toHaveBeenCalledWith('SIGTERM')
    expect(result.timedOut).toBe(true)
  })

  it('terminates the process when the signal aborts', async () => {
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 10)
    setTimeout(() => child.emit('close', null, 'SIGTERM'), 30)
    const result = await runProcess('tool', [], { signal: controller.signal })
    expect(child.kill).toHaveBeenCalledWith('SIGTERM')
    expect(result.aborted).toBe(true)
  })

  it('rejects when the command cannot be spawned', async () => {
    setTimeout(() => child.emit('error', new Error('spawn tool ENOENT')), 10)
    await expect(runProcess('tool', [])).rejects.toThrow('ENOENT')
  })

  it('appends the command and its output to the log file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rnaflow-proc-'))
    const logFile = path.join(dir, 'logs', 'tool.log')
    setTimeout(() => {
      child.stdout.emit('data', 'hello\n')
      child.stdout.emit('end')
      setTimeout(() => child.emit('close', 0, null), 5)
    }, 50)
    await runProcess('tool', ['-x'], { logFile })
    expect(await fs.readFile(logFile, 'utf8')).toBe('$ tool -x\nhello\n')
    await fs.remove(dir)
  })
})
