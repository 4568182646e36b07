/**
 * Queries every configured source for one entity
 * @module resolve/source-orchestrator
 */

import type { AcceptedCandidate } from '../types/candidate.js'
import type { Entity } from '../types/entity.js'
import type { MergeConfig } from '../types/config.js'
import type { MetadataSource } from '../sources/types.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import type { CandidateResolver } from './candidate-resolver.js'
import {
  NoMatchError,
  NoMetadataFoundError,
  SourceUnavailableError,
} from './resolution-error.js'
import type { SourceFailure } from './resolution-error.js'
import { ConfigurationError } from '../utils/errors.js'

/**
 * What gathering produced for one entity
 */
export interface GatherResult {
  /** Accepted candidates keyed by source name, in configured order */
  accepted: Map<string, AcceptedCandidate>

  /** Sources that produced nothing, and why */
  failures: SourceFailure[]
}

/**
 * SourceOrchestrator - applies the candidate resolver to each configured
 * source in order, one at a time
 */
export class SourceOrchestrator {
  private readonly logger: Logger

  constructor(
    private readonly resolver: CandidateResolver,
    logger?: Logger
  ) {
    this.logger = logger ?? createSilentLogger()
  }

  /**
   * @param sources - Source instances available for this run, by name
   * @throws {NoMetadataFoundError} If no source produced a candidate
   * @throws {SelectionAbortedError} If the user aborted during selection
   * @throws {ConfigurationError} If a configured source is missing from `sources`
   */
  async gather(
    entity: Entity,
    sources: ReadonlyMap<string, MetadataSource>,
    config: MergeConfig
  ): Promise<GatherResult> {
    const accepted = new Map<string, AcceptedCandidate>()
    const failures: SourceFailure[] = []

    for (const name of config.sources) {
      const source = sources.get(name)
      if (!source) {
        throw new ConfigurationError(`Unknown source '${name}'`, 'sources', { source: name })
      }

      try {
        const candidate = await this.resolver.resolve(entity, source, config)
        accepted.set(name, candidate)
        this.logger.debug('Source contributed a candidate', {
          entityId: entity.id,
          source: name,
          candidateId: candidate.candidate.id,
          method: candidate.method,
        })
      } catch (error) {
        if (error instanceof NoMatchError || error instanceof SourceUnavailableError) {
          failures.push(error)
          this.logger.debug(error.message, { entityId: entity.id, source: name })
          continue
        }
        throw error
      }
    }

    if (accepted.size === 0) {
      throw new NoMetadataFoundError(entity.id, failures)
    }

    return { accepted, failures }
  }
}
