/**
 * Resolves one entity against one source to a single accepted candidate
 * @module resolve/candidate-resolver
 */

import type { AcceptedCandidate, AcceptanceMethod, Candidate, ScoredCandidate } from '../types/candidate.js'
import type { Entity, FieldValue } from '../types/entity.js'
import type { MergeConfig } from '../types/config.js'
import type { MetadataSource, SourceQuery } from '../sources/types.js'
import type { CandidateSelector } from './selector.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import { scoreDistance } from '../core/distance.js'
import { omitFields } from '../utils/fields.js'
import { toError } from '../utils/errors.js'
import { NoMatchError, SelectionAbortedError, SourceUnavailableError } from './resolution-error.js'

/**
 * Options for creating a CandidateResolver
 */
export interface CandidateResolverOptions {
  /** Consulted when no candidate can be accepted automatically */
  selector: CandidateSelector

  logger?: Logger
}

/**
 * Returns the identifier the entity already holds for a source, if any.
 * An explicit `sourceIds` entry wins over the source's id field.
 */
export function storedSourceId(entity: Entity, source: MetadataSource): string | undefined {
  const explicit = entity.sourceIds?.[source.name]
  if (explicit) return explicit

  const { idField } = source.capabilities
  if (!idField) return undefined
  const value = entity.fields[idField]
  if (typeof value === 'string' && value.trim() !== '') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

function firstText(value: FieldValue | undefined): string | undefined {
  const scalar = Array.isArray(value) ? value[0] : value
  if (scalar === undefined) return undefined
  const text = String(scalar).trim()
  return text === '' ? undefined : text
}

/**
 * Builds the search query for an entity: its fields and `<artist> <title>`
 */
export function buildSourceQuery(entity: Entity): SourceQuery {
  const { fields } = entity
  const artist =
    entity.kind === 'album'
      ? firstText(fields.albumartist) ?? firstText(fields.artist)
      : firstText(fields.artist) ?? firstText(fields.albumartist)
  const title =
    entity.kind === 'album'
      ? firstText(fields.album) ?? firstText(fields.title)
      : firstText(fields.title) ?? firstText(fields.name)

  return {
    kind: entity.kind,
    fields,
    text: [artist, title].filter((part) => part !== undefined).join(' '),
  }
}

/**
 * Scores candidates against an entity and sorts them by ascending distance.
 * Equal distances keep the order the source returned them in.
 */
export function rankCandidates(entity: Entity, candidates: Candidate[]): ScoredCandidate[] {
  return candidates
    .map((candidate, rank) => ({
      candidate,
      distance: scoreDistance(entity.fields, candidate.fields, entity.kind),
      rank,
    }))
    .sort((a, b) => a.distance - b.distance || a.rank - b.rank)
}

/**
 * CandidateResolver - finds the one candidate a source contributes for an entity
 *
 * 1. Reuses a stored identifier through id lookup unless `force` is set.
 * 2. Otherwise searches, scores and ranks the candidates.
 * 3. Accepts the best candidate automatically when it is within `maxDistance`.
 * 4. Otherwise asks the selector.
 *
 * @example
 * ```typescript
 * const resolver = new CandidateResolver({ selector: promptSelector, logger })
 * const accepted = await resolver.resolve(album, spotify, config)
 * ```
 */
export class CandidateResolver {
  private readonly selector: CandidateSelector
  private readonly logger: Logger

  constructor(options: CandidateResolverOptions) {
    this.selector = options.selector
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * @throws {NoMatchError} If the source finds nothing or the selector skips
   * @throws {SourceUnavailableError} If the source's lookup or search throws
   * @throws {SelectionAbortedError} If the selector aborts
   */
  async resolve(
    entity: Entity,
    source: MetadataSource,
    config: MergeConfig
  ): Promise<AcceptedCandidate> {
    const storedId = config.force ? undefined : storedSourceId(entity, source)

    const lookup = source.lookupById
    if (storedId !== undefined && source.capabilities.lookupById && lookup) {
      const found = await this.call(entity, source, () => lookup.call(source, storedId, entity))
      if (found) {
        this.logger.debug('Accepted candidate by stored id', {
          entityId: entity.id,
          source: source.name,
          id: storedId,
        })
        return this.accept(source, found, 0, 'id-lookup', config)
      }
      this.logger.debug('Stored id not found, falling back to search', {
        entityId: entity.id,
        source: source.name,
        id: storedId,
      })
    }

    const search = source.search
    if (!source.capabilities.search || !search) {
      throw new NoMatchError(source.name, entity.id, 'source cannot search')
    }

    const query = buildSourceQuery(entity)
    const candidates = await this.call(entity, source, () => search.call(source, query))
    if (candidates.length === 0) {
      throw new NoMatchError(source.name, entity.id, 'no candidates')
    }

    const ranked = rankCandidates(entity, candidates)
    const best = ranked[0]

    if (config.maxDistance !== undefined && best.distance <= config.maxDistance) {
      this.logger.debug('Accepted best candidate automatically', {
        entityId: entity.id,
        source: source.name,
        distance: best.distance,
      })
      return this.accept(source, best.candidate, best.distance, 'automatic', config)
    }

    const selection = await this.selector.select({
      entity,
      source: source.name,
      candidates: ranked,
    })

    switch (selection.action) {
      case 'choose':
        return this.accept(
          source,
          selection.candidate.candidate,
          selection.candidate.distance,
          'manual',
          config
        )
      case 'skip':
        throw new NoMatchError(source.name, entity.id, 'skipped during selection')
      case 'abort':
        throw new SelectionAbortedError(entity.id, source.name)
    }
  }

  /**
   * Runs a source call, converting anything it throws to SourceUnavailableError
   */
  private async call<T>(
    entity: Entity,
    source: MetadataSource,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      const unavailable = new SourceUnavailableError(source.name, entity.id, toError(error))
      this.logger.warn(unavailable.message, { entityId: entity.id, source: source.name })
      throw unavailable
    }
  }

  private accept(
    source: MetadataSource,
    candidate: Candidate,
    distance: number,
    method: AcceptanceMethod,
    config: MergeConfig
  ): AcceptedCandidate {
    const fields = omitFields(candidate.fields, config.excludeFields)
    const { idField } = source.capabilities
    if (idField && fields[idField] === undefined && !config.excludeFields.includes(idField)) {
      fields[idField] = candidate.id
    }

    return {
      source: source.name,
      candidate: { id: candidate.id, fields },
      distance,
      method,
    }
  }
}
