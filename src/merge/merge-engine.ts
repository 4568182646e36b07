/**
 * Combines per-source field sets into one output record
 * @module merge/merge-engine
 */

import type { FieldMap } from '../types/entity.js'
import type { MergeConfig } from '../types/config.js'
import type {
  FieldProvenance,
  MergedFields,
  MergeResult,
  OwnedFieldsLookup,
  PerSourceFields,
} from './types.js'
import { getStrategy } from './strategies/index.js'
import { validateMergeConfig } from './validation.js'

/**
 * MergeEngine - applies the configured strategy to the field sets the
 * sources contributed for one entity
 *
 * Contributions are taken in configured source order; map entries for
 * sources that are not configured are ignored. Excluded fields are removed
 * from the output after the strategy runs, so they never appear whichever
 * source provided them.
 *
 * @example
 * ```typescript
 * const engine = new MergeEngine((name) => registry.ownedFields(name))
 * const result = engine.merge(
 *   new Map([
 *     ['spotify', { artist: 'A', spotify_album_id: 'X' }],
 *     ['musicbrainz', { artist: 'B', mb_albumid: 'Y' }],
 *   ]),
 *   config
 * )
 * ```
 */
export class MergeEngine {
  constructor(private readonly ownedFields: OwnedFieldsLookup) {}

  /**
   * @param entityId - Recorded on the result when given
   * @throws {ConfigurationError} If the configuration is invalid
   */
  merge(perSourceFields: PerSourceFields, config: MergeConfig, entityId?: string): MergeResult {
    validateMergeConfig(config)

    const contributions: Array<[string, Readonly<FieldMap>]> = []
    for (const source of config.sources) {
      const fields = perSourceFields.get(source)
      if (fields) contributions.push([source, fields])
    }

    const output = getStrategy(config.strategy)({
      config,
      contributions,
      ownedFields: this.ownedFields,
    })

    const fields: MergedFields = {}
    const provenance: Record<string, FieldProvenance> = {}
    for (const [field, value] of Object.entries(output.fields)) {
      if (config.excludeFields.includes(field)) continue
      fields[field] = value
      const attribution = output.provenance[field]
      if (attribution) provenance[field] = attribution
    }

    const result: MergeResult = {
      fields,
      provenance,
      sources: contributions.map(([source]) => source),
      strategy: config.strategy,
    }
    if (entityId !== undefined) result.entityId = entityId
    return result
  }
}
