import fs from 'fs-extra'
import path from 'path'
import Handlebars from 'handlebars'
import type { ConfidenceMetrics, EnsembleMember, PipelineRun } from '@rnaflow/types'
import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { getErrorMessage } from '../../helpers/errors.js'
import { readDotBracket } from '../upstream/rnafold.js'

const TEMPLATE = 'summary.md'

const hbs = Handlebars.create()
hbs.registerHelper('join', (items: unknown, sep: unknown) =>
  Array.isArray(items) ? items.join(typeof sep === 'string' ? sep : ', ') : ''
)
hbs.registerHelper('fixed', (value: unknown, digits: unknown) =>
  typeof value === 'number' ? value.toFixed(typeof digits === 'number' ? digits : 2) : ''
)

const memberResult = (m: EnsembleMember): string => {
  if (m.failure) {
    return `failed: ${m.failure.kind} (${m.failure.message})`
  }
  return m.structure ? `\`${path.basename(m.structure)}\`` : 'no structure'
}

const metric = (value: number | undefined, digits: number) =>
  value === undefined ? '-' : value.toFixed(digits)

const confidenceRow = (m: EnsembleMember & { confidence: ConfidenceMetrics }) => ({
  backend: m.backend,
  seedIndex: m.seedIndex,
  plddt: metric(m.confidence.plddtMean, 1),
  ptm: metric(m.confidence.ptm, 3),
  iptm: metric(m.confidence.iptm, 3),
  rankingScore: metric(m.confidence.rankingScore, 3)
})

const hasConfidence = (m: EnsembleMember): m is EnsembleMember & { confidence: ConfidenceMetrics } =>
  m.confidence !== undefined && Object.keys(m.confidence).length > 0

/** View model for the summary template, derived from the state alone. */
export const buildReportContext = (
  run: PipelineRun,
  secondaryStructure?: string,
  pseudoknotStructure?: string
) => ({
  runId: run.runId,
  generatedAt: run.updatedAt,
  input: run.input,
  fingerprint: run.fingerprint,
  backends: run.fingerprint.backends,
  secondaryStructure,
  pseudoknotStructure,
  stages: run.stages.map((s) => ({
    id: s.id,
    status: s.status,
    message: s.message?.replace(/\s*\n\s*/g, ' ') ?? ''
  })),
  ensembles: Object.keys(run.ensembles)
    .sort()
    .map((backend) => {
      const { members } = run.ensembles[backend]
      return {
        backend,
        total: members.length,
        succeeded: members.filter((m) => !m.failure && m.structure).length,
        members: members.map((m) => ({
          seedIndex: m.seedIndex,
          seed: m.seed,
          device: m.device,
          dropout: m.dropout ? 'yes' : 'no',
          noiseScale: m.noiseScale,
          result: memberResult(m)
        })),
        clusters: (run.clusters[backend] ?? []).map((c) => ({
          id: c.id,
          size: c.stats.size,
          representative: members[c.representative]?.seedIndex ?? c.representative,
          meanRmsd: c.stats.meanRmsd,
          maxRmsd: c.stats.maxRmsd
        }))
      }
    }),
  confidence: Object.keys(run.ensembles)
    .sort()
    .flatMap((backend) => run.ensembles[backend].members.filter(hasConfidence).map(confidenceRow)),
  consensus: run.consensus.map((c) => ({
    id: c.id,
    backends: c.backends,
    size: c.members.length,
    representative: `${c.representative.backend} seed index ${c.representative.seedIndex}`,
    meanRmsd: c.meanRmsd
  })),
  ranking: run.ranking
})

const readTemplate = async (templateName: string): Promise<string> => {
  const templateFile = path.join(config.templateDir, `${templateName}.handlebars`)
  try {
    return await fs.readFile(templateFile, 'utf8')
  } catch (error) {
    logger.error(`Error in readTemplate for ${templateName}: ${getErrorMessage(error)}`)
    throw error
  }
}

export const renderReport = async (
  run: PipelineRun,
  secondaryStructure?: string,
  pseudoknotStructure?: string
): Promise<string> => {
  const template = hbs.compile(await readTemplate(TEMPLATE), { noEscape: true })
  return template(buildReportContext(run, secondaryStructure, pseudoknotStructure))
}

const readStageDotFile = async (
  run: PipelineRun,
  runDir: string,
  name: string
): Promise<string | undefined> => {
  const ssStage = run.stages.find((s) => s.id === 'secondary_structure')
  const dotFile = ssStage?.artifacts.find((a) => path.basename(a) === name)
  if (!dotFile) return undefined
  const resolved = path.resolve(runDir, dotFile)
  return (await fs.pathExists(resolved)) ? readDotBracket(resolved) : undefined
}

/**
 * Writes <runDir>/summary.md. Secondary structures are read back from the
 * secondary_structure stage's .dot files when they are still on disk.
 */
export const writeReport = async (run: PipelineRun, runDir: string): Promise<string> => {
  const secondaryStructure = await readStageDotFile(run, runDir, 'rnafold.dot')
  const pseudoknotStructure = await readStageDotFile(run, runDir, 'spotrna.dot')

  const outFile = path.join(runDir, 'summary.md')
  await fs.writeFile(outFile, await renderReport(run, secondaryStructure, pseudoknotStructure))
  logger.info(`Write report: ${outFile}`)
  return outFile
}
