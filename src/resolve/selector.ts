/**
 * Interactive candidate selection contract
 * @module resolve/selector
 */

import type { ScoredCandidate } from '../types/candidate.js'
import type { Entity } from '../types/entity.js'

/**
 * What the selector is asked to decide on
 */
export interface SelectionRequest {
  entity: Entity

  /** Name of the source the candidates came from */
  source: string

  /** Candidates ranked by ascending distance */
  candidates: ScoredCandidate[]
}

/**
 * The selector's answer
 *
 * - `choose` - accept the given candidate
 * - `skip` - no match from this source
 * - `abort` - stop the whole run
 */
export type Selection =
  | { action: 'choose'; candidate: ScoredCandidate }
  | { action: 'skip' }
  | { action: 'abort' }

/**
 * Asks a human (or a policy) to pick among ranked candidates. Calls are
 * awaited one at a time.
 */
export interface CandidateSelector {
  select(request: SelectionRequest): Promise<Selection>
}

/**
 * Selector for unattended runs: every ambiguous resolution is skipped
 */
export function createSkippingSelector(): CandidateSelector {
  return {
    select: async () => ({ action: 'skip' }),
  }
}
