/**
 * Console reporting for runs
 * @module run/reporter
 */

import type { Entity, FieldMap, FieldValue } from '../types/entity.js'
import type { EntityReport, Reporter, RunSummary } from './types.js'
import { formatFieldValue } from '../utils/fields.js'

/**
 * Renders an entity as `artist - title`
 */
export function describeEntity(entity: Entity): string {
  return describeFields(entity.fields, entity.kind === 'album' ? 'album' : 'title')
}

/**
 * Renders a field set as `artist - title`, falling back to placeholders
 */
export function describeFields(fields: Readonly<FieldMap>, titleField: 'album' | 'title' = 'album'): string {
  const text = (value: FieldValue | undefined): string | undefined => {
    const scalar = Array.isArray(value) ? value[0] : value
    return scalar === undefined ? undefined : String(scalar)
  }

  const artist = text(fields.albumartist) ?? text(fields.artist) ?? '(unknown artist)'
  const title = text(fields[titleField]) ?? text(fields.title) ?? text(fields.name) ?? '(untitled)'
  return `${artist} - ${title}`
}

/**
 * Reporter printing progress, outcomes, dry-run diffs and the summary
 *
 * @example
 * ```typescript
 * const reporter = new ConsoleReporter()
 * await new RunController({ ...options, reporter }).run('')
 * // Processing 1/2: The Beatles - Abbey Road
 * //   updated (2 changes)
 * ```
 */
export class ConsoleReporter implements Reporter {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  entityStarted(entity: Entity, index: number, total: number): void {
    this.write(`Processing ${index}/${total}: ${describeEntity(entity)}`)
  }

  entityCompleted(report: EntityReport): void {
    const { outcome, changes } = report

    switch (outcome) {
      case 'updated':
        this.write(`  ${outcome} (${changes.length} change${changes.length === 1 ? '' : 's'})`)
        break
      case 'failed':
        this.write(`  failed: ${report.error?.message ?? 'unknown error'}`)
        break
      default:
        this.write(`  ${outcome}`)
    }

    for (const change of changes) {
      this.write(
        change.kind === 'added'
          ? `    + ${change.field}: ${formatFieldValue(change.after)}`
          : `    ~ ${change.field}: ${formatFieldValue(change.before)} -> ${formatFieldValue(change.after)}`
      )
    }
  }

  runCompleted(summary: RunSummary): void {
    const prefix = summary.dryRun ? 'Dry run ' : 'Run '
    const status = summary.status === 'aborted' ? 'aborted' : 'completed'
    this.write(
      `${prefix}${status}: ${summary.processed}/${summary.total} processed, ` +
        `${summary.updated} updated, ${summary.unchanged} unchanged, ` +
        `${summary.skipped} skipped, ${summary.failed} failed`
    )
  }
}
