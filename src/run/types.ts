/**
 * Run-level contracts and summaries
 * @module run/types
 */

import type { Entity, FieldValue } from '../types/entity.js'
import type { MergeResult } from '../merge/types.js'
import type { SourceFailure } from '../resolve/resolution-error.js'

/**
 * Supplies the entities a query selects, in processing order
 */
export interface EntityProvider {
  entities(query: string): Promise<Entity[]>
}

/**
 * Stores a merged record for an entity
 */
export interface PersistenceSink {
  /**
   * @throws If the record could not be stored
   */
  store(entity: Entity, result: MergeResult): Promise<void>
}

/**
 * One field that differs between an entity and its merged record
 */
export interface FieldChange {
  field: string
  kind: 'added' | 'changed'
  before?: FieldValue
  after: FieldValue
}

/**
 * How processing an entity ended
 *
 * - `updated` - merged record differs from the entity (stored unless dry run)
 * - `unchanged` - merged record matches the entity
 * - `skipped` - no source produced metadata
 * - `failed` - sources errored, or the merged record could not be stored
 */
export type EntityOutcome = 'updated' | 'unchanged' | 'skipped' | 'failed'

/**
 * What happened to one entity
 */
export interface EntityReport {
  entity: Entity

  /** 1-based position in the run */
  index: number

  outcome: EntityOutcome

  result?: MergeResult

  /** Changes the merged record makes (or would make, in dry run) */
  changes: FieldChange[]

  /** Per-source failures encountered while gathering */
  failures: SourceFailure[]

  error?: Error
}

export type RunStatus = 'completed' | 'aborted'

/**
 * Summary returned by a run
 */
export interface RunSummary {
  status: RunStatus

  /** Entities the query selected */
  total: number

  /** Entities that reached an outcome */
  processed: number

  updated: number
  unchanged: number
  skipped: number
  failed: number

  dryRun: boolean

  /** Merge results of every entity that produced one, in processing order */
  results: MergeResult[]

  entities: EntityReport[]

  /** Entity being processed when the run was aborted during selection */
  abortedAt?: string
}

/**
 * Observes a run. Failures thrown by a reporter are logged and ignored.
 */
export interface Reporter {
  entityStarted?(entity: Entity, index: number, total: number): void | Promise<void>
  entityCompleted?(report: EntityReport, total: number): void | Promise<void>
  runCompleted?(summary: RunSummary): void | Promise<void>
}
