/**
 * JSON configuration file for the command-line tool
 * @module cli/load-config
 */

import { readFile } from 'fs/promises'
import { dirname, resolve } from 'path'
import type { MergeStrategyName } from '../types/config.js'
import { MERGE_STRATEGIES } from '../types/config.js'
import type { SourceSelection } from '../sources/source-registry.js'
import type { RetryConfig } from '../sources/resilience/retry.js'
import {
  ConfigurationError,
  isMetamergeError,
  isPlainObject,
  requireInRange,
  requireNonEmptyString,
  requirePlainObject,
  toError,
} from '../utils/errors.js'

/**
 * A catalog file registered as a source
 */
export interface CatalogConfig {
  /** Absolute path of the catalog file */
  path: string

  timeoutMs?: number

  retry?: Partial<RetryConfig>
}

/**
 * Parsed configuration file
 */
export interface FileConfig {
  /** Absolute path of the library file */
  library?: string

  sources: SourceSelection
  primarySource?: string
  strategy: MergeStrategyName
  excludeFields: string[]
  maxDistance?: number

  /** Catalog sources by name, in file order */
  catalogs: Record<string, CatalogConfig>
}

/** Accepted spellings of strategy names */
const STRATEGY_ALIASES: Record<string, MergeStrategyName> = {
  'common/specific-split': 'split',
}

/**
 * Resolves a strategy name or alias
 *
 * @throws {ConfigurationError} If the name is not a known strategy
 */
export function parseStrategy(value: unknown): MergeStrategyName {
  if (typeof value === 'string') {
    const strategy = MERGE_STRATEGIES.find((name) => name === value) ?? STRATEGY_ALIASES[value]
    if (strategy) return strategy
  }
  throw new ConfigurationError(
    `Invalid strategy '${String(value)}', must be one of: ${MERGE_STRATEGIES.join(', ')}`,
    'strategy'
  )
}

function parseStringList(value: unknown, name: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`'${name}' must be a list of strings`, name)
  }
  return value.map((item, i) => requireNonEmptyString(item, `${name}[${i}]`))
}

function parseRetry(value: unknown, name: string): Partial<RetryConfig> | undefined {
  if (value === undefined) return undefined
  const raw = requirePlainObject(value, name)
  const retry: Partial<RetryConfig> = {}
  const numeric = ['maxAttempts', 'initialDelayMs', 'backoffMultiplier', 'maxDelayMs'] as const
  for (const key of numeric) {
    const setting = raw[key]
    if (setting === undefined) continue
    if (typeof setting !== 'number') {
      throw new ConfigurationError(`'${name}.${key}' must be a number`, `${name}.${key}`)
    }
    retry[key] = requireInRange(setting, 0, Number.MAX_SAFE_INTEGER, `${name}.${key}`)
  }
  return retry
}

function parseCatalogs(value: unknown, baseDir: string): Record<string, CatalogConfig> {
  if (value === undefined) return {}
  const raw = requirePlainObject(value, 'catalogs')
  const catalogs: Record<string, CatalogConfig> = {}

  for (const [name, entry] of Object.entries(raw)) {
    const settings: Record<string, unknown> = isPlainObject(entry) ? entry : { path: entry }
    let timeoutMs: number | undefined
    if (settings.timeoutMs !== undefined) {
      if (typeof settings.timeoutMs !== 'number' || settings.timeoutMs <= 0) {
        throw new ConfigurationError(`'catalogs.${name}.timeoutMs' must be a positive number`, 'catalogs')
      }
      timeoutMs = settings.timeoutMs
    }
    catalogs[name] = {
      path: resolve(baseDir, requireNonEmptyString(settings.path, `catalogs.${name}.path`)),
      timeoutMs,
      retry: parseRetry(settings.retry, `catalogs.${name}.retry`),
    }
  }

  return catalogs
}

/**
 * Validates a parsed configuration document. Relative paths are resolved
 * against `baseDir`.
 *
 * @throws {ConfigurationError} If the document is invalid
 *
 * @example
 * ```typescript
 * parseFileConfig({ sources: 'auto', strategy: 'common/specific-split' }, process.cwd())
 * // { sources: 'auto', strategy: 'split', excludeFields: [], catalogs: {} }
 * ```
 */
export function parseFileConfig(document: unknown, baseDir: string): FileConfig {
  try {
    const root = requirePlainObject(document, 'config')

    const sources: SourceSelection =
      root.sources === undefined || root.sources === 'auto'
        ? 'auto'
        : parseStringList(root.sources, 'sources')

    let maxDistance: number | undefined
    if (root.maxDistance !== undefined) {
      if (typeof root.maxDistance !== 'number') {
        throw new ConfigurationError("'maxDistance' must be a number", 'maxDistance')
      }
      maxDistance = requireInRange(root.maxDistance, 0, 1, 'maxDistance')
    }

    return {
      library:
        root.library === undefined
          ? undefined
          : resolve(baseDir, requireNonEmptyString(root.library, 'library')),
      sources,
      primarySource:
        root.primarySource === undefined
          ? undefined
          : requireNonEmptyString(root.primarySource, 'primarySource'),
      strategy: root.strategy === undefined ? 'priority' : parseStrategy(root.strategy),
      excludeFields:
        root.excludeFields === undefined ? [] : parseStringList(root.excludeFields, 'excludeFields'),
      maxDistance,
      catalogs: parseCatalogs(root.catalogs, baseDir),
    }
  } catch (error) {
    if (error instanceof ConfigurationError || !isMetamergeError(error)) throw error
    throw new ConfigurationError(error.message, 'config', error.context)
  }
}

/**
 * Reads and validates a configuration file
 *
 * @throws {ConfigurationError} If the file cannot be read or is invalid
 */
export async function loadFileConfig(path: string): Promise<FileConfig> {
  let document: unknown
  try {
    document = JSON.parse(await readFile(path, 'utf8'))
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config '${path}': ${toError(error).message}`,
      'config',
      { path }
    )
  }
  return parseFileConfig(document, dirname(resolve(path)))
}
