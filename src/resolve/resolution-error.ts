/**
 * Errors raised while resolving an entity against its sources
 * @module resolve/resolution-error
 */

import { MetamergeError } from '../utils/errors.js'

/**
 * A source produced no acceptable candidate for an entity. Recoverable: the
 * next source is tried.
 */
export class NoMatchError extends MetamergeError {
  public readonly sourceName: string
  public readonly entityId: string

  constructor(sourceName: string, entityId: string, reason: string) {
    super(
      `No match from source '${sourceName}' for entity '${entityId}': ${reason}`,
      'NO_MATCH',
      { sourceName, entityId, reason }
    )
    this.name = 'NoMatchError'
    this.sourceName = sourceName
    this.entityId = entityId
  }
}

/**
 * A source's lookup or search threw. Recoverable: the source is skipped for
 * this entity.
 */
export class SourceUnavailableError extends MetamergeError {
  public readonly sourceName: string
  public readonly entityId: string

  constructor(sourceName: string, entityId: string, cause: Error) {
    super(
      `Source '${sourceName}' unavailable for entity '${entityId}': ${cause.message}`,
      'SOURCE_UNAVAILABLE',
      { sourceName, entityId, originalError: cause.message }
    )
    this.name = 'SourceUnavailableError'
    this.sourceName = sourceName
    this.entityId = entityId
    this.cause = cause
  }
}

/**
 * A per-source failure recorded while gathering
 */
export type SourceFailure = NoMatchError | SourceUnavailableError

/**
 * Every source failed for an entity. Recoverable at run level: the entity is
 * skipped.
 */
export class NoMetadataFoundError extends MetamergeError {
  public readonly entityId: string
  public readonly failures: SourceFailure[]

  constructor(entityId: string, failures: SourceFailure[]) {
    super(
      `No metadata found for entity '${entityId}' (${failures.length} source(s) tried)`,
      'NO_METADATA_FOUND',
      { entityId, sources: failures.map((f) => f.sourceName) }
    )
    this.name = 'NoMetadataFoundError'
    this.entityId = entityId
    this.failures = failures
  }

  /** Whether any source failed with an error rather than finding nothing */
  get hadSourceErrors(): boolean {
    return this.failures.some((failure) => failure instanceof SourceUnavailableError)
  }
}

/**
 * The user aborted during candidate selection. Fatal to the run.
 */
export class SelectionAbortedError extends MetamergeError {
  public readonly entityId: string
  public readonly sourceName: string

  constructor(entityId: string, sourceName: string) {
    super(
      `Selection aborted while resolving entity '${entityId}' against source '${sourceName}'`,
      'SELECTION_ABORTED',
      { entityId, sourceName }
    )
    this.name = 'SelectionAbortedError'
    this.entityId = entityId
    this.sourceName = sourceName
  }
}
