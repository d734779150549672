import fs from 'fs-extra'
import path from 'path'
import YAML from 'yaml'
import type {
  ConsensusCluster,
  ConsensusMember,
  EnsembleResult,
  StructureCluster
} from '@rnaflow/types'
import { clusterEnsemble, findConsensus } from '@rnaflow/struct-utils'
import { logger } from '../../helpers/loggers.js'
import { makeDir } from '../../helpers/files.js'

export interface ClusteringSettings {
  threshold: number
  backboneAtoms: readonly string[]
}

export interface ClusteringArtifacts {
  clusters: StructureCluster[]
  /** clusters.yaml, with representative structure paths for readers */
  file: string
}

/**
 * Clusters one backend's ensemble and writes the result next to its
 * predictions. ClusteringInputError propagates to the caller.
 */
export const clusterBackend = async (
  ensemble: EnsembleResult,
  workDir: string,
  { threshold, backboneAtoms }: ClusteringSettings
): Promise<ClusteringArtifacts> => {
  const { clusters } = await clusterEnsemble(ensemble, threshold, {
    atomNames: backboneAtoms,
    logger
  })

  await makeDir(workDir)
  const file = path.join(workDir, 'clusters.yaml')
  const summary = {
    backend: ensemble.backend,
    threshold,
    clusters: clusters.map((c) => ({
      id: c.id,
      size: c.stats.size,
      representative: ensemble.members[c.representative]?.structure ?? null,
      representativeSeedIndex: ensemble.members[c.representative]?.seedIndex ?? null,
      memberSeedIndices: c.members.map((m) => ensemble.members[m]?.seedIndex ?? m),
      meanRmsd: Number(c.stats.meanRmsd.toFixed(3)),
      maxRmsd: Number(c.stats.maxRmsd.toFixed(3))
    }))
  }
  await fs.writeFile(file, YAML.stringify(summary))
  return { clusters, file }
}

export interface ConsensusArtifacts {
  consensus: ConsensusCluster[]
  /** consensus.yaml */
  file: string
}

/** Groups structures from different backends that agree within the threshold. */
export const consensusAcrossBackends = async (
  candidates: ConsensusMember[],
  workDir: string,
  { threshold, backboneAtoms }: ClusteringSettings
): Promise<ConsensusArtifacts> => {
  const consensus = await findConsensus(candidates, threshold, {
    atomNames: backboneAtoms,
    logger
  })

  await makeDir(workDir)
  const file = path.join(workDir, 'consensus.yaml')
  const summary = {
    threshold,
    structures: candidates.length,
    groups: consensus.map((c) => ({
      id: c.id,
      backends: c.backends,
      representative: c.representative.structure,
      members: c.members.map((m) => `${m.backend}:${m.seedIndex}`),
      meanRmsd: Number(c.meanRmsd.toFixed(3))
    }))
  }
  await fs.writeFile(file, YAML.stringify(summary))
  return { consensus, file }
}
