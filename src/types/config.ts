/**
 * How per-source field sets are combined into the output record
 *
 * - `priority` - each field comes from the earliest configured source that provides it
 * - `all` - each field collects the distinct values from every source
 * - `split` - source-specific fields from every source, common fields from the primary source only
 */
export type MergeStrategyName = 'priority' | 'all' | 'split'

/**
 * Array of all merge strategy names
 */
export const MERGE_STRATEGIES: readonly MergeStrategyName[] = ['priority', 'all', 'split']

/**
 * Immutable configuration for one run
 */
export interface MergeConfig {
  /** Source names in configured order */
  readonly sources: readonly string[]

  /** Source whose values win common fields under `split` (defaults to the last source) */
  readonly primarySource?: string

  readonly strategy: MergeStrategyName

  /** Field names removed from every contribution and from the merged record */
  readonly excludeFields: readonly string[]

  /** Best candidates at or below this distance are accepted without asking */
  readonly maxDistance?: number

  /** Ignore stored source identifiers and always search */
  readonly force: boolean

  /** Compute and report the merge without persisting it */
  readonly dryRun: boolean
}

/**
 * Options accepted when creating a MergeConfig
 */
export interface MergeConfigOptions {
  sources: readonly string[]
  primarySource?: string
  strategy?: MergeStrategyName
  excludeFields?: readonly string[]
  maxDistance?: number
  force?: boolean
  dryRun?: boolean
}

/**
 * Defaults applied to omitted MergeConfig options
 */
export const DEFAULT_MERGE_CONFIG: Pick<MergeConfig, 'strategy' | 'excludeFields' | 'force' | 'dryRun'> = {
  strategy: 'priority',
  excludeFields: [],
  force: false,
  dryRun: false,
}
