/**
 * Merge strategies by name
 * @module merge/strategies
 */

import type { MergeStrategyName } from '../../types/config.js'
import type { StrategyFunction } from '../types.js'
import { priority } from './priority.js'
import { collectAll } from './collect-all.js'
import { split } from './split.js'

export { priority } from './priority.js'
export { collectAll } from './collect-all.js'
export { split } from './split.js'

/**
 * Strategy implementations keyed by configured strategy name
 */
export const STRATEGY_REGISTRY: Readonly<Record<MergeStrategyName, StrategyFunction>> = {
  priority,
  all: collectAll,
  split,
}

/**
 * Retrieve a strategy implementation by name
 */
export function getStrategy(name: MergeStrategyName): StrategyFunction {
  return STRATEGY_REGISTRY[name]
}
