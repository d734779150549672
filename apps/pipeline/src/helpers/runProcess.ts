import { spawn } from 'node:child_process'
import { once } from 'node:events'
import readline from 'node:readline'
import fs from 'fs-extra'
import path from 'path'

export interface RunProcessOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  timeoutMs?: number
  /** Terminates the child when aborted */
  signal?: AbortSignal
  /** stdout and stderr are appended here, one line at a time */
  logFile?: string
  /** Number of trailing output lines kept in the result */
  tailLines?: number
  onStdoutLine?: (line: string) => void
  onStderrLine?: (line: string) => void
  killSignal?: NodeJS.Signals | number
}

export interface ProcessResult {
  code: number | null
  signal: NodeJS.Signals | null
  timedOut: boolean
  aborted: boolean
  durationMs: number
  /** Last lines of combined stdout/stderr */
  output: string[]
}

export type ProcessRunner = (
  command: string,
  args: string[],
  opts?: RunProcessOptions
) => Promise<ProcessResult>

export const runProcess: ProcessRunner = async (command, args, opts = {}) => {
  const {
    cwd,
    env,
    timeoutMs,
    signal,
    logFile,
    tailLines = 40,
    onStdoutLine,
    onStderrLine,
    killSignal = 'SIGTERM'
  } = opts

  const started = Date.now()
  const output: string[] = []
  let logStream: fs.WriteStream | undefined
  if (logFile) {
    await fs.ensureDir(path.dirname(logFile))
    logStream = fs.createWriteStream(logFile, { flags: 'a' })
    logStream.write(`$ ${[command, ...args].join(' ')}\n`)
  }

  const record = (line: string) => {
    output.push(line)
    if (output.length > tailLines) {
      output.shift()
    }
    logStream?.write(`${line}\n`)
  }

  const child = spawn(command, args, {
    cwd,
    env: { ...process.env, ...env },
    stdio: ['ignore', 'pipe', 'pipe']
  })

  // Handle spawn errors (e.g., ENOENT) so we don’t hang forever
  const errorP = once(child, 'error').then(([err]) => {
    throw err
  })

  let rlOut: readline.Interface | undefined
  let rlErr: readline.Interface | undefined
  if (child.stdout) {
    rlOut = readline.createInterface({ input: child.stdout })
    rlOut.on('line', (raw) => {
      const line = raw.replace(/\r$/, '')
      record(line)
      onStdoutLine?.(line)
    })
  }
  if (child.stderr) {
    rlErr = readline.createInterface({ input: child.stderr })
    rlErr.on('line', (raw) => {
      const line = raw.replace(/\r$/, '')
      record(line)
      onStderrLine?.(line)
    })
  }

  let timedOut = false
  let aborted = false
  let killTimer: NodeJS.Timeout | undefined

  const terminate = () => {
    child.kill(killSignal)
    killTimer ??= setTimeout(() => child.kill('SIGKILL'), 5000)
  }

  let termTimer: NodeJS.Timeout | undefined
  if (timeoutMs && timeoutMs > 0) {
    termTimer = setTimeout(() => {
      timedOut = true
      terminate()
    }, timeoutMs)
  }

  const onAbort = () => {
    aborted = true
    terminate()
  }
  if (signal?.aborted) {
    onAbort()
  } else {
    signal?.addEventListener('abort', onAbort, { once: true })
  }

  // Prefer 'close' so all stdio is drained
  const closeP = once(child, 'close').then(([code, exitSignal]) => ({
    code,
    signal: exitSignal
  }))

  let exit: { code: number | null; signal: NodeJS.Signals | null }
  try {
    exit = await Promise.race([closeP, errorP])
  } finally {
    if (termTimer) clearTimeout(termTimer)
    if (killTimer) clearTimeout(killTimer)
    signal?.removeEventListener('abort', onAbort)
    rlOut?.close()
    rlErr?.close()
    if (logStream) {
      const stream = logStream
      await new Promise<void>((resolve) => stream.end(() => resolve()))
    }
  }

  return {
    ...exit,
    timedOut,
    aborted,
    durationMs: Date.now() - started,
    output
  }
}
