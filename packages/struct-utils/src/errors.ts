/**
 * Raised when structures of one ensemble cannot be compared, e.g. when two
 * members carry a different number of backbone atoms.
 */
export class ClusteringInputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ClusteringInputError'
  }
}
