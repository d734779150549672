export interface RankedStructure {
  rank: number
  backend: string
  seedIndex: number
  structure: string
  /** Mean per-metric rank, lower is better */
  score: number
  metrics: Record<string, number>
}

export interface ScoringCandidate {
  backend: string
  seedIndex: number
  structure: string
}
