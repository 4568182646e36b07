/**
 * Registry of the metadata sources available to a run
 * @module sources/source-registry
 */

import type { MetadataSource } from './types.js'
import { ConfigurationError } from '../utils/errors.js'

/**
 * Source selection from configuration: every registered source, or an explicit list
 */
export type SourceSelection = 'auto' | readonly string[]

/**
 * Holds the sources populated at startup from static configuration.
 *
 * @example
 * ```typescript
 * const registry = new SourceRegistry([spotify, musicbrainz])
 * registry.select('auto')                 // [spotify, musicbrainz]
 * registry.select(['musicbrainz'])        // [musicbrainz]
 * registry.ownedFields('spotify')         // ['spotify_album_id']
 * ```
 */
export class SourceRegistry {
  private readonly sources = new Map<string, MetadataSource>()

  constructor(sources: readonly MetadataSource[] = []) {
    for (const source of sources) {
      this.register(source)
    }
  }

  /**
   * Registers a source
   *
   * @throws {ConfigurationError} If the name is empty or taken, or the
   *   capabilities claim an operation the source does not implement
   */
  register(source: MetadataSource): this {
    const { name, capabilities } = source

    if (!name || name.trim() === '') {
      throw new ConfigurationError('Source name must not be empty', 'name')
    }
    if (this.sources.has(name)) {
      throw new ConfigurationError(`Source '${name}' is already registered`, 'name', { source: name })
    }
    if (capabilities.lookupById && typeof source.lookupById !== 'function') {
      throw new ConfigurationError(
        `Source '${name}' declares id lookup but has no lookupById function`,
        'capabilities.lookupById',
        { source: name }
      )
    }
    if (capabilities.search && typeof source.search !== 'function') {
      throw new ConfigurationError(
        `Source '${name}' declares search but has no search function`,
        'capabilities.search',
        { source: name }
      )
    }

    this.sources.set(name, source)
    return this
  }

  has(name: string): boolean {
    return this.sources.has(name)
  }

  /**
   * @throws {ConfigurationError} If no source is registered under `name`
   */
  get(name: string): MetadataSource {
    const source = this.sources.get(name)
    if (!source) {
      throw new ConfigurationError(
        `Unknown source '${name}'. Available sources: ${this.names().join(', ') || 'none'}`,
        'sources',
        { source: name }
      )
    }
    return source
  }

  /** Registered source names in registration order */
  names(): string[] {
    return Array.from(this.sources.keys())
  }

  /**
   * Resolves a configured selection to source instances, in selection order
   */
  select(selection: SourceSelection): MetadataSource[] {
    if (selection === 'auto') {
      return Array.from(this.sources.values())
    }
    return selection.map((name) => this.get(name))
  }

  /**
   * Fields a source owns under the `split` strategy: its declared owned
   * fields plus its id field
   */
  ownedFields(name: string): string[] {
    const { capabilities } = this.get(name)
    const owned = new Set(capabilities.ownedFields)
    if (capabilities.idField) owned.add(capabilities.idField)
    return Array.from(owned)
  }
}
