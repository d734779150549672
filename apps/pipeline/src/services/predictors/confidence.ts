import fs from 'fs-extra'
import path from 'path'
import JSZip from 'jszip'
import type { ConfidenceMetrics } from '@rnaflow/types'
import { logger } from '../../helpers/loggers.js'
import { getErrorMessage } from '../../helpers/errors.js'
import { findFiles } from '../../helpers/files.js'

const toFiniteNumber = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined

/** pLDDT on a 0-100 scale; predictors report either 0-1 or 0-100. */
export const normalizePlddt = (value: number): number =>
  value >= 0 && value <= 1 ? value * 100 : value

const mean = (values: number[]): number | undefined =>
  values.length === 0 ? undefined : values.reduce((sum, v) => sum + v, 0) / values.length

const flatten = (value: unknown): number[] =>
  Array.isArray(value)
    ? value.flatMap(flatten)
    : typeof value === 'number' && Number.isFinite(value)
      ? [value]
      : []

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/** Confidence fields of a Protenix summary_confidence / confidence JSON payload. */
export const confidenceFromJson = (payload: Record<string, unknown>): ConfidenceMetrics => {
  const plddt = toFiniteNumber(payload.plddt) ?? mean(flatten(payload.plddt))
  const metrics: ConfidenceMetrics = {}
  if (plddt !== undefined) metrics.plddtMean = normalizePlddt(plddt)
  const ptm = toFiniteNumber(payload.ptm)
  if (ptm !== undefined) metrics.ptm = ptm
  const iptm = toFiniteNumber(payload.iptm)
  if (iptm !== undefined) metrics.iptm = iptm
  const rankingScore = toFiniteNumber(payload.ranking_score)
  if (rankingScore !== undefined) metrics.rankingScore = rankingScore
  return metrics
}

/**
 * Reads the confidence JSON Protenix writes beside a seed's structure.
 * Summary files win over full confidence dumps; sample 0 wins over the rest.
 */
export const readProtenixConfidence = async (
  seedDir: string
): Promise<ConfidenceMetrics | undefined> => {
  const files = (await findFiles(seedDir, ['.json'])).filter((f) =>
    path.basename(f).toLowerCase().includes('confidence')
  )
  const rank = (file: string) => {
    const base = path.basename(file).toLowerCase()
    return (base.includes('summary') ? 0 : 2) + (/sample_0\.json$/.test(base) ? 0 : 1)
  }
  const [best] = [...files].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b))
  if (!best) return undefined
  try {
    const payload: unknown = await fs.readJson(best)
    if (!isRecord(payload)) return undefined
    const metrics = confidenceFromJson(payload)
    return Object.keys(metrics).length > 0 ? metrics : undefined
  } catch (error) {
    logger.warn(`cannot read ${best}: ${getErrorMessage(error)}`)
    return undefined
  }
}

const NPY_MAGIC = '\x93NUMPY'

/**
 * Values of a little-endian float .npy array, flattened. Anything else
 * (big-endian, integer or object arrays) is rejected.
 */
export const parseNpy = (bytes: Uint8Array): number[] => {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const magic = String.fromCharCode(...bytes.subarray(0, 6))
  if (magic !== NPY_MAGIC) {
    throw new Error('not an npy array')
  }
  const major = bytes[6]
  const headerLength = major === 1 ? view.getUint16(8, true) : view.getUint32(8, true)
  const headerStart = major === 1 ? 10 : 12
  const header = Buffer.from(bytes.subarray(headerStart, headerStart + headerLength)).toString('latin1')

  const descr = /'descr':\s*'([^']+)'/.exec(header)?.[1]
  const shape = /'shape':\s*\(([^)]*)\)/.exec(header)?.[1] ?? ''
  const count = shape
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .reduce((n, s) => n * Number(s), 1)

  const width = descr === '<f4' ? 4 : descr === '<f8' ? 8 : 0
  if (width === 0) {
    throw new Error(`unsupported npy dtype ${descr ?? 'unknown'}`)
  }
  const dataStart = headerStart + headerLength
  if (dataStart + count * width > bytes.byteLength) {
    throw new Error('npy array is truncated')
  }
  const values: number[] = []
  for (let i = 0; i < count; i++) {
    const offset = dataStart + i * width
    values.push(width === 4 ? view.getFloat32(offset, true) : view.getFloat64(offset, true))
  }
  return values
}

/** Mean pLDDT from the plddt array of a RhoFold+ results.npz. */
export const readNpzPlddt = async (npzFile: string): Promise<ConfidenceMetrics | undefined> => {
  if (!(await fs.pathExists(npzFile))) return undefined
  try {
    const zip = await JSZip.loadAsync(await fs.readFile(npzFile))
    const entry = zip.file('plddt.npy')
    if (!entry) return undefined
    const plddt = mean(parseNpy(await entry.async('uint8array')).filter(Number.isFinite))
    return plddt === undefined ? undefined : { plddtMean: normalizePlddt(plddt) }
  } catch (error) {
    logger.warn(`cannot read pLDDT from ${npzFile}: ${getErrorMessage(error)}`)
    return undefined
  }
}
