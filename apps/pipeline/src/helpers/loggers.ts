import path from 'path'
import { createLogger, transports, format } from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import moment from 'moment-timezone'
import { config } from '../config/config.js'

const { combine, timestamp, label, printf, colorize } = format

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']

/** Falls back to info for anything winston does not know. */
export const resolveLogLevel = (level: string): string =>
  LOG_LEVELS.includes(level) ? level : 'info'

const stamp = () => moment().tz(config.timezone).format('YYYY-MM-DD HH:mm:ss')

const line = printf(
  ({ level, message, label, timestamp }) => `${timestamp} - ${level}: [${label}] ${message}`
)

const logLevel = resolveLogLevel(config.logLevel)
if (logLevel !== config.logLevel) {
  console.warn(`Invalid LOG_LEVEL "${config.logLevel}", defaulting to "info"`)
}

const rotating = (name: string, level: string, maxFiles: string) =>
  new DailyRotateFile({
    level,
    filename: path.join(config.logsDir, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles
  })

const logger = createLogger({
  level: logLevel,
  format: combine(label({ label: 'rnaflow' }), timestamp({ format: stamp }), line),
  transports: [
    rotating('rnaflow', logLevel, '14d'),
    rotating('rnaflow-error', 'error', '30d'),
    new transports.Console({ level: logLevel, format: combine(colorize(), line) })
  ]
})

/** Raises every transport to debug for --verbose runs. */
const enableVerboseLogging = (): void => {
  logger.level = 'debug'
  for (const transport of logger.transports) {
    transport.level = 'debug'
  }
}

/**
 * Mirrors everything logged during a run into `<runDir>/logs/pipeline.log`.
 * Returns the function that detaches it again.
 */
const attachRunLog = (runDir: string): (() => void) => {
  const transport = new transports.File({
    level: logger.level,
    filename: path.join(runDir, 'logs', 'pipeline.log')
  })
  logger.add(transport)
  return () => {
    logger.remove(transport)
  }
}

logger.debug(`Logger initialized with level: ${logLevel}`)

export { logger, enableVerboseLogging, attachRunLog }
