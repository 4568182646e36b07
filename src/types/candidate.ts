import type { FieldMap } from './entity.js'

/**
 * One result returned by a source for one entity
 */
export interface Candidate {
  /** Opaque source-native identifier */
  id: string

  /** Fields this candidate would contribute */
  fields: FieldMap
}

/**
 * A candidate paired with its distance from the entity being matched
 */
export interface ScoredCandidate {
  candidate: Candidate

  /** Dissimilarity in [0, 1], lower is more similar */
  distance: number

  /** Position of the candidate in the list the source returned */
  rank: number
}

/**
 * How a candidate came to be accepted
 *
 * - `id-lookup` - found through a previously stored identifier
 * - `automatic` - best scored candidate within the distance threshold
 * - `manual` - chosen through the candidate selector
 */
export type AcceptanceMethod = 'id-lookup' | 'automatic' | 'manual'

/**
 * The candidate a source settled on for an entity
 */
export interface AcceptedCandidate {
  /** Name of the source the candidate came from */
  source: string

  candidate: Candidate

  distance: number

  method: AcceptanceMethod
}
