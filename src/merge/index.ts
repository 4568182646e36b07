/**
 * Field merge module
 * @module merge
 */

export type {
  MergedValue,
  MergedFields,
  PerSourceFields,
  ProvenanceRule,
  FieldProvenance,
  MergeResult,
  OwnedFieldsLookup,
  StrategyContext,
  StrategyOutput,
  StrategyFunction,
} from './types.js'

export { MergeEngine } from './merge-engine.js'
export { createMergeConfig, validateMergeConfig, resolvePrimarySource } from './validation.js'
export { STRATEGY_REGISTRY, getStrategy, priority, collectAll, split } from './strategies/index.js'
export { toFieldMap } from './to-field-map.js'
