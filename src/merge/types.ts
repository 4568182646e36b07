/**
 * Merge-related type definitions
 * @module merge/types
 */

import type { FieldMap, FieldValue } from '../types/entity.js'
import type { MergeConfig, MergeStrategyName } from '../types/config.js'

/**
 * A merged field value. Under the `all` strategy every field is a sequence of
 * the distinct values the sources provided.
 */
export type MergedValue = FieldValue | FieldValue[]

/**
 * Merged field mapping
 */
export type MergedFields = Record<string, MergedValue>

/**
 * Field sets contributed by each source, keyed by source name
 */
export type PerSourceFields = ReadonlyMap<string, Readonly<FieldMap>>

/**
 * Why a field's value was emitted
 *
 * - `priority` - earliest configured source providing the field
 * - `collected` - distinct values gathered from every source
 * - `primary` - common field taken from the primary source
 * - `source-specific` - field owned by a source, applied from whichever source provided it
 */
export type ProvenanceRule = 'priority' | 'collected' | 'primary' | 'source-specific'

/**
 * Attribution for a single merged field
 */
export interface FieldProvenance {
  /** Sources whose values made it into the output */
  sources: string[]

  rule: ProvenanceRule

  /** Sources that provided a different value that was not used */
  discarded: string[]
}

/**
 * Output of the merge engine
 */
export interface MergeResult {
  /** Entity the record was merged for, when the caller named one */
  entityId?: string

  /** Final field mapping */
  fields: MergedFields

  /** Per-field attribution, for reporting */
  provenance: Record<string, FieldProvenance>

  /** Sources that contributed a field set, in configured order */
  sources: string[]

  strategy: MergeStrategyName
}

/**
 * Returns the fields a source owns under the `split` strategy
 */
export type OwnedFieldsLookup = (sourceName: string) => readonly string[]

/**
 * Everything a strategy needs to combine field sets
 */
export interface StrategyContext {
  config: MergeConfig

  /** Contributions in configured source order */
  contributions: Array<[source: string, fields: Readonly<FieldMap>]>

  ownedFields: OwnedFieldsLookup
}

/**
 * Fields and attribution produced by a strategy, before exclusion
 */
export interface StrategyOutput {
  fields: MergedFields
  provenance: Record<string, FieldProvenance>
}

/**
 * Strategy function signature
 */
export type StrategyFunction = (context: StrategyContext) => StrategyOutput
