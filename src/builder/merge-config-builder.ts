/**
 * Fluent builder for run configurations
 * @module builder/merge-config-builder
 */

import type { MergeConfig, MergeStrategyName } from '../types/config.js'
import { createMergeConfig } from '../merge/validation.js'
import { ConfigurationError } from '../utils/errors.js'

/**
 * Fluent builder for a validated, immutable MergeConfig.
 *
 * @example
 * ```typescript
 * const config = new MergeConfigBuilder()
 *   .sources('spotify', 'musicbrainz')
 *   .strategy('split')
 *   .primary('musicbrainz')
 *   .exclude('comments')
 *   .maxDistance(0.2)
 *   .build()
 * ```
 */
export class MergeConfigBuilder {
  private sourceNames: string[] = []
  private primarySource?: string
  private mergeStrategy?: MergeStrategyName
  private excludedFields: string[] = []
  private distanceThreshold?: number
  private forceSearch = false
  private dryRunMode = false

  /**
   * Append sources in priority order
   */
  sources(...names: string[]): this {
    this.sourceNames.push(...names)
    return this
  }

  /**
   * Set the source whose values win common fields under `split`
   */
  primary(name: string): this {
    this.primarySource = name
    return this
  }

  strategy(strategy: MergeStrategyName): this {
    this.mergeStrategy = strategy
    return this
  }

  /**
   * Exclude fields from every contribution and from the merged record
   */
  exclude(...fields: string[]): this {
    this.excludedFields.push(...fields)
    return this
  }

  /**
   * Accept the best candidate without asking when its distance is at or below `value`
   */
  maxDistance(value: number): this {
    this.distanceThreshold = value
    return this
  }

  /**
   * Ignore stored source identifiers
   */
  force(enabled = true): this {
    this.forceSearch = enabled
    return this
  }

  dryRun(enabled = true): this {
    this.dryRunMode = enabled
    return this
  }

  /**
   * Build the configuration.
   *
   * @throws {ConfigurationError} If no source was added or the result is invalid
   */
  build(): MergeConfig {
    if (this.sourceNames.length === 0) {
      throw new ConfigurationError('MergeConfigBuilder: call sources() before build()', 'sources')
    }

    return createMergeConfig({
      sources: this.sourceNames,
      primarySource: this.primarySource,
      strategy: this.mergeStrategy,
      excludeFields: this.excludedFields,
      maxDistance: this.distanceThreshold,
      force: this.forceSearch,
      dryRun: this.dryRunMode,
    })
  }
}
