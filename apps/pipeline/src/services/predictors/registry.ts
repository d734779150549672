import type { PipelineConfig } from '../../config/pipeline-config.js'
import { isBackendName } from '../../config/pipeline-config.js'
import { ConfigurationError } from '../../helpers/errors.js'
import { runProcess, type ProcessRunner } from '../../helpers/runProcess.js'
import type { PredictorBackend } from './predictor.js'
import { ProtenixBackend } from './protenix.js'
import { RhoFoldBackend } from './rhofold.js'
import { SimRNABackend } from './simrna.js'

export interface BackendContext {
  runner?: ProcessRunner
}

/** Builds the adapter for a configured backend name. */
export const createBackend = (
  name: string,
  config: PipelineConfig,
  { runner = runProcess }: BackendContext = {}
): PredictorBackend => {
  if (!isBackendName(name)) {
    throw new ConfigurationError(
      `Unknown backend "${name}" (expected one of rhofold, protenix, simrna)`
    )
  }
  switch (name) {
    case 'rhofold':
      return new RhoFoldBackend(config.backends.rhofold, runner)
    case 'protenix':
      return new ProtenixBackend(config.backends.protenix, runner)
    case 'simrna':
      return new SimRNABackend(config.backends.simrna, runner)
  }
}

/** Resolves every requested backend up front so typos fail before any stage runs. */
export const createBackends = (
  names: readonly string[],
  config: PipelineConfig,
  context: BackendContext = {}
): PredictorBackend[] => {
  const unique = [...new Set(names)]
  if (unique.length === 0) {
    throw new ConfigurationError('At least one backend must be selected')
  }
  return unique.map((name) => createBackend(name, config, context))
}
