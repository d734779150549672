import dotenv from 'dotenv'
import { fileURLToPath } from 'node:url'
dotenv.config()

const parseMinutes = (value: string | undefined, fallback: number): number => {
  const parsed = value ? parseFloat(value) : NaN
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

export const config = {
  logLevel: process.env.LOG_LEVEL ?? 'info',
  logsDir: process.env.RNAFLOW_LOGS ?? './logs',
  timezone: process.env.RNAFLOW_TIMEZONE ?? 'America/Los_Angeles',
  templateDir:
    process.env.RNAFLOW_TEMPLATES ??
    fileURLToPath(new URL('../../templates', import.meta.url)),
  stateFile: process.env.RNAFLOW_STATE_FILE ?? 'pipeline_state.yaml',
  // worst-case model load + inference for a batch of seeds
  defaultTimeoutMs:
    parseMinutes(process.env.RNAFLOW_DEFAULT_TIMEOUT_MIN, 24 * 60) * 60 * 1000
}
