import fs from 'fs-extra'
import { fileURLToPath } from 'node:url'
import YAML from 'yaml'
import { array, boolean, number, object, string, ValidationError } from 'yup'
import type { InferType } from 'yup'
import { ConfigurationError, getErrorMessage } from '../helpers/errors.js'

const DEFAULT_CONFIG = fileURLToPath(
  new URL('../../configs/default.yaml', import.meta.url)
)

export const BATCH_MODES = ['auto', 'always', 'never'] as const

const backendBase = {
  batch: string().oneOf(BATCH_MODES).default('auto'),
  timeoutMin: number().positive().default(24 * 60),
  seedBase: number().integer().min(0).default(0)
}

export const pipelineConfigSchema = object({
  tools: object({
    cmscan: string().default('cmscan'),
    cmfetch: string().default('cmfetch'),
    cmalign: string().default('cmalign'),
    rfamCm: string().default(''),
    rfamClanin: string().default(''),
    rnafold: string().default('RNAfold'),
    spotrna: object({
      python: string().default('python'),
      script: string().default('')
    }),
    rnadvisor: object({
      binary: string().default('rnadvisor'),
      metrics: array(string().required()).default(['rsRNASP', 'DFIRE', 'RASP', 'MCQ']),
      timeoutMin: number().positive().default(240)
    })
  }),
  backends: object({
    rhofold: object({
      ...backendBase,
      python: string().default('python'),
      script: string().default(''),
      batchScript: string().default(''),
      modelDir: string().default('')
    }),
    protenix: object({
      ...backendBase,
      seedBase: number().integer().min(0).default(42),
      binary: string().default('protenix'),
      model: string().default('')
    }),
    simrna: object({
      ...backendBase,
      seedBase: number().integer().min(0).default(1),
      binary: string().default(''),
      trafl2pdbs: string().default('SimRNA_trafl2pdbs'),
      dataDir: string().default(''),
      steps: number().integer().positive().default(10_000_000)
    })
  }),
  ensemble: object({
    nstruct: number().integer().min(1).default(1),
    mcDropout: boolean().default(false),
    noiseScale: number().min(0).default(0),
    clusterThreshold: number().positive().default(5.0),
    backboneAtoms: array(string().required()).min(1).default(["C3'", 'P'])
  }),
  devices: array(string().required()).default([]),
  maxParallelDevices: number().integer().positive().default(8)
})

export type PipelineConfig = InferType<typeof pipelineConfigSchema>
export type BackendName = keyof PipelineConfig['backends']
export type BatchMode = (typeof BATCH_MODES)[number]

export const BACKEND_NAMES: BackendName[] = ['rhofold', 'protenix', 'simrna']

export const isBackendName = (name: string): name is BackendName =>
  (BACKEND_NAMES as string[]).includes(name)

type PlainObject = Record<string, unknown>

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/** Recursively merges override into base; arrays and scalars are replaced. */
export const deepMerge = (base: PlainObject, override: PlainObject): PlainObject => {
  const merged: PlainObject = { ...base }
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key]
    merged[key] =
      isPlainObject(current) && isPlainObject(value)
        ? deepMerge(current, value)
        : value
  }
  return merged
}

const readYamlObject = async (file: string): Promise<PlainObject> => {
  let parsed: unknown
  try {
    parsed = YAML.parse(await fs.readFile(file, 'utf8'))
  } catch (error) {
    throw new ConfigurationError(
      `Could not read config ${file}: ${getErrorMessage(error)}`
    )
  }
  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config ${file} must be a YAML mapping`)
  }
  return parsed
}

/**
 * Validates raw configuration, filling defaults and dropping unknown keys.
 */
export const validatePipelineConfig = (raw: unknown): PipelineConfig => {
  try {
    return pipelineConfigSchema.validateSync(raw ?? {}, {
      abortEarly: false,
      stripUnknown: true
    })
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigurationError(
        `Invalid pipeline configuration:\n  - ${error.errors.join('\n  - ')}`
      )
    }
    throw error
  }
}

/**
 * Loads the bundled defaults, merges an optional user file and any
 * overrides (e.g. from the command line), then validates the result.
 */
export const loadPipelineConfig = async (
  userConfig?: string,
  overrides: PlainObject = {}
): Promise<PipelineConfig> => {
  let data: PlainObject = {}
  if (await fs.pathExists(DEFAULT_CONFIG)) {
    data = await readYamlObject(DEFAULT_CONFIG)
  }
  if (userConfig) {
    if (!(await fs.pathExists(userConfig))) {
      throw new ConfigurationError(`Config file not found: ${userConfig}`)
    }
    data = deepMerge(data, await readYamlObject(userConfig))
  }
  return validatePipelineConfig(deepMerge(data, overrides))
}
