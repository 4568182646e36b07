/**
 * Run orchestration module
 * @module run
 */

export type {
  EntityProvider,
  PersistenceSink,
  FieldChange,
  EntityOutcome,
  EntityReport,
  RunStatus,
  RunSummary,
  Reporter,
} from './types.js'

export { RunController } from './run-controller.js'
export type { RunControllerOptions } from './run-controller.js'
export { diffFields } from './diff.js'
export { ConsoleReporter, describeEntity, describeFields } from './reporter.js'
