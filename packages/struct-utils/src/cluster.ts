import type {
  ClusterStats,
  EnsembleResult,
  StructureCluster
} from '@rnaflow/types'
import { isSuccessful } from '@rnaflow/types'
import type { Coordinates } from './structureParser.js'
import {
  DEFAULT_BACKBONE_ATOMS,
  readBackboneCoordinates
} from './structureParser.js'
import { superposedRmsd } from './superpose.js'
import { ClusteringInputError } from './errors.js'

// Anything with winston-style info/error methods
interface Logger {
  info: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
  debug?: (message: string, ...args: unknown[]) => void
  warn?: (message: string, ...args: unknown[]) => void
}

const defaultLogger: Logger = {
  info: () => {},
  error: () => {},
  debug: () => {},
  warn: () => {}
}

export interface ClusterEntry {
  /** Index of the member inside its EnsembleResult */
  index: number
  seedIndex: number
  coords: Coordinates
}

export interface ClusteringOutcome {
  clusters: StructureCluster[]
  /** Pairwise RMSD between entries, in entry order */
  matrix: number[][]
}

/**
 * Symmetric pairwise RMSD matrix. Every structure must carry the same number
 * of atoms; a mismatch is an error rather than a skipped pair.
 */
export function computeRmsdMatrix(entries: ClusterEntry[]): number[][] {
  const n = entries.length
  const expected = entries[0]?.coords.length ?? 0
  for (const entry of entries) {
    if (entry.coords.length !== expected) {
      throw new ClusteringInputError(
        `Atom count mismatch: member ${entries[0].index} has ${expected} atoms, member ${entry.index} has ${entry.coords.length}`
      )
    }
  }

  const matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0))
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const rmsd = superposedRmsd(entries[i].coords, entries[j].coords)
      matrix[i][j] = rmsd
      matrix[j][i] = rmsd
    }
  }
  return matrix
}

const find = (parent: number[], i: number): number => {
  let root = i
  while (parent[root] !== root) {
    root = parent[root]
  }
  while (parent[i] !== root) {
    const next = parent[i]
    parent[i] = root
    i = next
  }
  return root
}

const mean = (values: number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length

const singletonStats = (): ClusterStats => ({
  size: 1,
  meanRmsd: 0,
  maxRmsd: 0,
  representativeMeanRmsd: 0
})

/**
 * Greedy single-linkage agglomeration over a precomputed RMSD matrix.
 *
 * Pairs are visited in ascending RMSD order (ties by position) and two
 * clusters merge whenever a cross pair lies strictly below the threshold.
 * Each cluster's representative is its medoid, ties going to the lowest
 * seed index. Clusters come out by descending population, then ascending
 * representative seed index.
 */
export function clusterByRmsd(
  entries: Omit<ClusterEntry, 'coords'>[],
  matrix: number[][],
  threshold: number
): StructureCluster[] {
  const n = entries.length
  const parent = entries.map((_, i) => i)

  const pairs: { i: number; j: number; rmsd: number }[] = []
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      pairs.push({ i, j, rmsd: matrix[i][j] })
    }
  }
  pairs.sort((a, b) => a.rmsd - b.rmsd || a.i - b.i || a.j - b.j)

  for (const { i, j, rmsd } of pairs) {
    if (rmsd >= threshold) {
      break
    }
    const ri = find(parent, i)
    const rj = find(parent, j)
    if (ri !== rj) {
      parent[Math.max(ri, rj)] = Math.min(ri, rj)
    }
  }

  const groups = new Map<number, number[]>()
  for (let i = 0; i < n; i++) {
    const root = find(parent, i)
    const group = groups.get(root) ?? []
    group.push(i)
    groups.set(root, group)
  }

  const built = [...groups.values()].map((positions) => {
    positions.sort((a, b) => entries[a].seedIndex - entries[b].seedIndex)

    if (positions.length === 1) {
      return { positions, medoid: positions[0], stats: singletonStats() }
    }

    let medoid = positions[0]
    let best = Infinity
    for (const p of positions) {
      const avg = mean(positions.filter((q) => q !== p).map((q) => matrix[p][q]))
      if (
        avg < best ||
        (avg === best && entries[p].seedIndex < entries[medoid].seedIndex)
      ) {
        best = avg
        medoid = p
      }
    }

    const intra: number[] = []
    for (let a = 0; a < positions.length; a++) {
      for (let b = a + 1; b < positions.length; b++) {
        intra.push(matrix[positions[a]][positions[b]])
      }
    }

    return {
      positions,
      medoid,
      stats: {
        size: positions.length,
        meanRmsd: mean(intra),
        maxRmsd: Math.max(...intra),
        representativeMeanRmsd: best
      }
    }
  })

  built.sort(
    (a, b) =>
      b.positions.length - a.positions.length ||
      entries[a.medoid].seedIndex - entries[b.medoid].seedIndex
  )

  return built.map((group, k) => ({
    id: k + 1,
    representative: entries[group.medoid].index,
    members: group.positions.map((p) => entries[p].index),
    stats: group.stats
  }))
}

/**
 * Clusters a set of structures already reduced to backbone coordinates.
 * A single entry is returned as a trivial cluster without computing RMSD.
 */
export function clusterStructures(
  entries: ClusterEntry[],
  threshold: number
): ClusteringOutcome {
  if (entries.length === 0) {
    return { clusters: [], matrix: [] }
  }
  if (entries.length === 1) {
    return {
      clusters: [
        {
          id: 1,
          representative: entries[0].index,
          members: [entries[0].index],
          stats: singletonStats()
        }
      ],
      matrix: [[0]]
    }
  }

  const matrix = computeRmsdMatrix(entries)
  return { clusters: clusterByRmsd(entries, matrix, threshold), matrix }
}

export interface ClusterEnsembleOptions {
  atomNames?: readonly string[]
  logger?: Logger
  readCoordinates?: (
    structurePath: string,
    atomNames: readonly string[]
  ) => Promise<Coordinates>
}

/**
 * Clusters the successful members of an ensemble. Failed members are
 * excluded and do not appear in any cluster.
 */
export async function clusterEnsemble(
  ensemble: EnsembleResult,
  threshold: number,
  options: ClusterEnsembleOptions = {}
): Promise<ClusteringOutcome> {
  const {
    atomNames = DEFAULT_BACKBONE_ATOMS,
    logger = defaultLogger,
    readCoordinates = readBackboneCoordinates
  } = options

  const successful = ensemble.members
    .map((member, index) => ({ member, index }))
    .filter(({ member }) => isSuccessful(member))
    .sort((a, b) => a.member.seedIndex - b.member.seedIndex)

  if (successful.length <= 1) {
    logger.info(
      `${ensemble.backend}: ${successful.length} successful member(s), no RMSD needed`
    )
    return clusterStructures(
      successful.map(({ member, index }) => ({
        index,
        seedIndex: member.seedIndex,
        coords: []
      })),
      threshold
    )
  }

  const entries: ClusterEntry[] = []
  for (const { member, index } of successful) {
    if (member.structure === undefined) {
      continue
    }
    entries.push({
      index,
      seedIndex: member.seedIndex,
      coords: await readCoordinates(member.structure, atomNames)
    })
  }

  logger.info(
    `${ensemble.backend}: computing pairwise RMSD for ${entries.length} structures (threshold=${threshold.toFixed(1)} A)`
  )
  const outcome = clusterStructures(entries, threshold)
  logger.info(
    `${ensemble.backend}: ${outcome.clusters.length} cluster(s) from ${entries.length} structures`
  )
  return outcome
}
