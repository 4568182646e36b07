/**
 * Validation and construction of merge configurations
 * @module merge/validation
 */

import type { MergeConfig, MergeConfigOptions } from '../types/config.js'
import { DEFAULT_MERGE_CONFIG, MERGE_STRATEGIES } from '../types/config.js'
import { ConfigurationError } from '../utils/errors.js'

/**
 * Validates a complete merge configuration
 *
 * @throws {ConfigurationError} If the configuration is invalid
 */
export function validateMergeConfig(config: MergeConfig): void {
  if (!Array.isArray(config.sources) || config.sources.length === 0) {
    throw new ConfigurationError('At least one source must be configured', 'sources')
  }

  for (const source of config.sources) {
    if (typeof source !== 'string' || source.trim() === '') {
      throw new ConfigurationError('Source names must be non-empty strings', 'sources', {
        source,
      })
    }
  }

  const duplicates = config.sources.filter(
    (source, index) => config.sources.indexOf(source) !== index
  )
  if (duplicates.length > 0) {
    throw new ConfigurationError(
      `Duplicate sources: ${[...new Set(duplicates)].join(', ')}`,
      'sources'
    )
  }

  if (!MERGE_STRATEGIES.includes(config.strategy)) {
    throw new ConfigurationError(
      `Invalid strategy '${String(config.strategy)}', must be one of: ${MERGE_STRATEGIES.join(', ')}`,
      'strategy'
    )
  }

  if (config.primarySource !== undefined && !config.sources.includes(config.primarySource)) {
    throw new ConfigurationError(
      `Primary source '${config.primarySource}' is not one of the configured sources`,
      'primarySource'
    )
  }

  if (config.maxDistance !== undefined) {
    if (
      typeof config.maxDistance !== 'number' ||
      Number.isNaN(config.maxDistance) ||
      config.maxDistance < 0 ||
      config.maxDistance > 1
    ) {
      throw new ConfigurationError('maxDistance must be a number between 0 and 1', 'maxDistance', {
        value: config.maxDistance,
      })
    }
  }

  for (const field of config.excludeFields) {
    if (typeof field !== 'string' || field === '') {
      throw new ConfigurationError('Excluded fields must be non-empty strings', 'excludeFields', {
        field,
      })
    }
  }
}

/**
 * Applies defaults, validates and freezes a merge configuration
 *
 * @throws {ConfigurationError} If the configuration is invalid
 *
 * @example
 * ```typescript
 * const config = createMergeConfig({
 *   sources: ['spotify', 'musicbrainz'],
 *   strategy: 'split',
 *   primarySource: 'musicbrainz',
 * })
 * ```
 */
export function createMergeConfig(options: MergeConfigOptions): MergeConfig {
  const config: MergeConfig = {
    sources: Object.freeze([...options.sources]),
    primarySource: options.primarySource,
    strategy: options.strategy ?? DEFAULT_MERGE_CONFIG.strategy,
    excludeFields: Object.freeze([...(options.excludeFields ?? DEFAULT_MERGE_CONFIG.excludeFields)]),
    maxDistance: options.maxDistance,
    force: options.force ?? DEFAULT_MERGE_CONFIG.force,
    dryRun: options.dryRun ?? DEFAULT_MERGE_CONFIG.dryRun,
  }

  validateMergeConfig(config)
  return Object.freeze(config)
}

/**
 * Returns the source whose values win common fields under `split`:
 * the configured primary source, or the last configured source.
 */
export function resolvePrimarySource(config: MergeConfig): string {
  return config.primarySource ?? config.sources[config.sources.length - 1]
}
