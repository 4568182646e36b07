/**
 * Assembles a run from the configuration file and command-line overrides
 * @module cli/setup
 */

import type { MergeConfig } from '../types/config.js'
import type { FileConfig } from './load-config.js'
import type { Logger } from '../utils/logger.js'
import { createPrefixedLogger, createSilentLogger } from '../utils/logger.js'
import { SourceRegistry } from '../sources/source-registry.js'
import { loadCatalogSource } from '../sources/plugins/catalog-source.js'
import { withResilience } from '../sources/resilience/index.js'
import { createMergeConfig } from '../merge/validation.js'
import { JsonLibrary } from '../library/json-library.js'
import { ConfigurationError } from '../utils/errors.js'

/**
 * Settings given on the command line, taking precedence over the file
 */
export interface CliOverrides {
  library?: string
  tracks?: boolean
  force?: boolean
  dryRun?: boolean
  primary?: string
  maxDistance?: number
}

/**
 * Everything a RunController needs apart from the selector and reporter
 */
export interface RunSetup {
  config: MergeConfig
  registry: SourceRegistry
  library: JsonLibrary
}

/**
 * Registers the configured catalogs, builds the merge configuration and
 * opens the library.
 *
 * @throws {ConfigurationError} If anything configured is missing or invalid
 */
export async function setupRun(
  fileConfig: FileConfig,
  overrides: CliOverrides = {},
  logger: Logger = createSilentLogger()
): Promise<RunSetup> {
  const registry = new SourceRegistry()

  for (const [name, catalog] of Object.entries(fileConfig.catalogs)) {
    const loaded = await loadCatalogSource(catalog.path, name)
    const source = loaded.name === name ? loaded : { ...loaded, name }
    registry.register(
      catalog.timeoutMs !== undefined || catalog.retry !== undefined
        ? withResilience(source, {
            timeoutMs: catalog.timeoutMs,
            retry: catalog.retry,
            logger: createPrefixedLogger(name, logger),
          })
        : source
    )
    logger.debug(`Registered catalog source '${name}'`, { path: catalog.path })
  }

  const config = createMergeConfig({
    sources: registry.select(fileConfig.sources).map((source) => source.name),
    primarySource: overrides.primary ?? fileConfig.primarySource,
    strategy: fileConfig.strategy,
    excludeFields: fileConfig.excludeFields,
    maxDistance: overrides.maxDistance ?? fileConfig.maxDistance,
    force: overrides.force ?? false,
    dryRun: overrides.dryRun ?? false,
  })

  const libraryPath = overrides.library ?? fileConfig.library
  if (!libraryPath) {
    throw new ConfigurationError('No library file configured', 'library')
  }

  const trackFields = new Set(config.sources.flatMap((name) => registry.ownedFields(name)))
  const library = await JsonLibrary.load(libraryPath, {
    kind: overrides.tracks ? 'track' : 'album',
    trackFields: [...trackFields],
    logger,
  })

  return { config, registry, library }
}
