export type {
  FieldScalar,
  FieldValue,
  FieldMap,
  EntityKind,
  Entity,
} from './entity.js'

export type {
  Candidate,
  ScoredCandidate,
  AcceptanceMethod,
  AcceptedCandidate,
} from './candidate.js'

export type {
  MergeStrategyName,
  MergeConfig,
  MergeConfigOptions,
} from './config.js'

export { MERGE_STRATEGIES, DEFAULT_MERGE_CONFIG } from './config.js'
