// Run orchestration
export {
  RunController,
  ConsoleReporter,
  describeEntity,
  describeFields,
  diffFields,
  type RunControllerOptions,
  type EntityProvider,
  type PersistenceSink,
  type Reporter,
  type FieldChange,
  type EntityOutcome,
  type EntityReport,
  type RunStatus,
  type RunSummary,
} from './run/index.js'

// Resolution
export {
  CandidateResolver,
  type CandidateResolverOptions,
  storedSourceId,
  buildSourceQuery,
  rankCandidates,
} from './resolve/candidate-resolver.js'
export { SourceOrchestrator, type GatherResult } from './resolve/source-orchestrator.js'
export {
  createSkippingSelector,
  type CandidateSelector,
  type Selection,
  type SelectionRequest,
} from './resolve/selector.js'

// Merging
export {
  MergeEngine,
  createMergeConfig,
  validateMergeConfig,
  resolvePrimarySource,
  toFieldMap,
  STRATEGY_REGISTRY,
  getStrategy,
  type MergedValue,
  type MergedFields,
  type PerSourceFields,
  type ProvenanceRule,
  type FieldProvenance,
  type MergeResult,
  type OwnedFieldsLookup,
  type StrategyFunction,
} from './merge/index.js'

// Builders
export { MergeConfigBuilder } from './builder/merge-config-builder.js'

// Distance scoring
export {
  scoreDistance,
  computeDistance,
  parseDuration,
  DISTANCE_WEIGHTS,
  MISSING_FIELD_PENALTY,
  type DistanceBreakdown,
} from './core/distance.js'
export { levenshtein, normalizeText, tokenize, type LevenshteinOptions } from './core/comparators.js'

// Sources
export { SourceRegistry, type SourceSelection } from './sources/source-registry.js'
export type { MetadataSource, SourceCapabilities, SourceQuery } from './sources/types.js'
export { withResilience, withRetry, withTimeout, type ResilienceOptions, type RetryConfig } from './sources/resilience/index.js'
export { createMockSource, type MockSource, type MockSourceConfig } from './sources/plugins/mock-source.js'
export {
  createCatalogSource,
  loadCatalogSource,
  parseCatalog,
  type Catalog,
  type CatalogEntry,
} from './sources/plugins/catalog-source.js'

// Library
export {
  JsonLibrary,
  parseLibrary,
  parseQuery,
  matchesQuery,
  type JsonLibraryOptions,
  type LibraryDocument,
  type LibraryItem,
  type QueryTerm,
} from './library/index.js'

// Types
export type {
  FieldScalar,
  FieldValue,
  FieldMap,
  EntityKind,
  Entity,
  Candidate,
  ScoredCandidate,
  AcceptanceMethod,
  AcceptedCandidate,
  MergeStrategyName,
  MergeConfig,
  MergeConfigOptions,
} from './types/index.js'
export { MERGE_STRATEGIES, DEFAULT_MERGE_CONFIG } from './types/index.js'

// Errors
export {
  MetamergeError,
  MissingParameterError,
  InvalidParameterError,
  ConfigurationError,
  isMetamergeError,
} from './utils/errors.js'
export {
  NoMatchError,
  SourceUnavailableError,
  NoMetadataFoundError,
  SelectionAbortedError,
  type SourceFailure,
} from './resolve/resolution-error.js'
export {
  SourceError,
  SourceTimeoutError,
  SourceNetworkError,
  SourceServerError,
  isSourceError,
} from './sources/source-error.js'

// Logging
export {
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  type Logger,
  type LogLevel,
} from './utils/logger.js'
