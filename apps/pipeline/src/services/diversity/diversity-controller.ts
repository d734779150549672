import type { MemberPlan } from '@rnaflow/types'
import { ConfigurationError } from '../../helpers/errors.js'
import { logger } from '../../helpers/loggers.js'

export interface DiversityOptions {
  nstruct: number
  mcDropout: boolean
  noiseScale: number
  /** Seed value of seed index 0; backends differ in the seeds they expect */
  seedBase?: number
}

/**
 * Plans per-member execution parameters for an ensemble.
 *
 * Seed index 0 is always the vanilla member (no dropout, no noise) so that
 * deterministic backends keep a reproducible baseline; every other member
 * carries the requested stochastic flags verbatim. With nstruct = 1 only the
 * vanilla member is planned and the flags have no effect.
 */
export const planEnsemble = ({
  nstruct,
  mcDropout,
  noiseScale,
  seedBase = 0
}: DiversityOptions): MemberPlan[] => {
  if (!Number.isInteger(nstruct) || nstruct < 1) {
    throw new ConfigurationError(`nstruct must be a positive integer, got ${nstruct}`)
  }
  if (!Number.isFinite(noiseScale) || noiseScale < 0) {
    throw new ConfigurationError(`noise scale must be >= 0, got ${noiseScale}`)
  }

  if (nstruct === 1 && (mcDropout || noiseScale > 0)) {
    logger.debug('nstruct=1: stochastic flags ignored, planning the vanilla member only')
  }

  return Array.from({ length: nstruct }, (_, seedIndex) => ({
    seedIndex,
    seed: seedBase + seedIndex,
    dropout: seedIndex === 0 ? false : mcDropout,
    noiseScale: seedIndex === 0 ? 0 : noiseScale
  }))
}
