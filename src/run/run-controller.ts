/**
 * Drives gathering and merging over every entity a query selects
 * @module run/run-controller
 */

import type { Entity, FieldMap } from '../types/entity.js'
import type { MergeConfig } from '../types/config.js'
import type { MetadataSource } from '../sources/types.js'
import type { SourceRegistry } from '../sources/source-registry.js'
import type { CandidateSelector } from '../resolve/selector.js'
import type { GatherResult } from '../resolve/source-orchestrator.js'
import type { Logger } from '../utils/logger.js'
import type { EntityProvider, EntityReport, PersistenceSink, Reporter, RunSummary } from './types.js'
import { CandidateResolver } from '../resolve/candidate-resolver.js'
import { SourceOrchestrator } from '../resolve/source-orchestrator.js'
import { NoMetadataFoundError, SelectionAbortedError } from '../resolve/resolution-error.js'
import { MergeEngine } from '../merge/merge-engine.js'
import { validateMergeConfig } from '../merge/validation.js'
import { createSilentLogger } from '../utils/logger.js'
import { toError } from '../utils/errors.js'
import { diffFields } from './diff.js'

/**
 * Collaborators and settings for a run
 */
export interface RunControllerOptions {
  config: MergeConfig
  registry: SourceRegistry
  provider: EntityProvider
  selector: CandidateSelector

  /** Receives merged records outside dry run */
  sink: PersistenceSink

  reporter?: Reporter
  logger?: Logger

  /** Checked between entities; an aborted signal ends the run early */
  signal?: AbortSignal
}

/**
 * RunController - processes entities one at a time: gather from every
 * configured source, merge, then store (or only report in dry run)
 *
 * Entity-level failures are recorded in the summary and never end the run.
 * Aborting during candidate selection stops the run immediately; entities
 * already processed keep their outcome.
 *
 * @example
 * ```typescript
 * const controller = new RunController({ config, registry, provider, selector, sink, logger })
 * const summary = await controller.run('artist:beatles')
 * console.log(`${summary.updated} updated, ${summary.skipped} skipped`)
 * ```
 */
export class RunController {
  private readonly config: MergeConfig
  private readonly registry: SourceRegistry
  private readonly provider: EntityProvider
  private readonly sink: PersistenceSink
  private readonly reporter?: Reporter
  private readonly logger: Logger
  private readonly signal?: AbortSignal
  private readonly orchestrator: SourceOrchestrator
  private readonly engine: MergeEngine

  constructor(options: RunControllerOptions) {
    this.config = options.config
    this.registry = options.registry
    this.provider = options.provider
    this.sink = options.sink
    this.reporter = options.reporter
    this.logger = options.logger ?? createSilentLogger()
    this.signal = options.signal

    const resolver = new CandidateResolver({ selector: options.selector, logger: this.logger })
    this.orchestrator = new SourceOrchestrator(resolver, this.logger)
    this.engine = new MergeEngine((name) => this.registry.ownedFields(name))
  }

  /**
   * Processes every entity the provider returns for `query`
   *
   * @throws {ConfigurationError} If the configuration names an unknown source
   */
  async run(query: string): Promise<RunSummary> {
    const sources = this.resolveSources()
    const entities = await this.provider.entities(query)
    this.logger.info(`Query '${query}' selected ${entities.length} entities`)
    return this.process(entities, sources)
  }

  /**
   * Processes the given entities in order
   *
   * @throws {ConfigurationError} If the configuration names an unknown source
   */
  async runEntities(entities: readonly Entity[]): Promise<RunSummary> {
    return this.process(entities, this.resolveSources())
  }

  private resolveSources(): Map<string, MetadataSource> {
    validateMergeConfig(this.config)
    const sources = new Map<string, MetadataSource>()
    for (const source of this.registry.select(this.config.sources)) {
      sources.set(source.name, source)
    }
    return sources
  }

  private async process(
    entities: readonly Entity[],
    sources: ReadonlyMap<string, MetadataSource>
  ): Promise<RunSummary> {
    const summary: RunSummary = {
      status: 'completed',
      total: entities.length,
      processed: 0,
      updated: 0,
      unchanged: 0,
      skipped: 0,
      failed: 0,
      dryRun: this.config.dryRun,
      results: [],
      entities: [],
    }

    for (const [i, entity] of entities.entries()) {
      if (this.signal?.aborted) {
        this.logger.warn('Run cancelled', { remaining: entities.length - i })
        summary.status = 'aborted'
        break
      }

      const index = i + 1
      await this.notify('entityStarted', () => this.reporter?.entityStarted?.(entity, index, entities.length))

      let report: EntityReport
      try {
        report = await this.processEntity(entity, index, sources)
      } catch (error) {
        if (error instanceof SelectionAbortedError) {
          this.logger.warn('Run aborted during candidate selection', {
            entityId: entity.id,
            source: error.sourceName,
          })
          summary.status = 'aborted'
          summary.abortedAt = entity.id
          break
        }
        throw error
      }

      summary.processed++
      summary[report.outcome]++
      if (report.result) summary.results.push(report.result)
      summary.entities.push(report)

      await this.notify('entityCompleted', () => this.reporter?.entityCompleted?.(report, entities.length))
    }

    this.logger.info('Run finished', {
      status: summary.status,
      processed: summary.processed,
      updated: summary.updated,
      unchanged: summary.unchanged,
      skipped: summary.skipped,
      failed: summary.failed,
    })
    await this.notify('runCompleted', () => this.reporter?.runCompleted?.(summary))

    return summary
  }

  private async processEntity(
    entity: Entity,
    index: number,
    sources: ReadonlyMap<string, MetadataSource>
  ): Promise<EntityReport> {
    let gathered: GatherResult
    try {
      gathered = await this.orchestrator.gather(entity, sources, this.config)
    } catch (error) {
      if (error instanceof NoMetadataFoundError) {
        this.logger.info(`No metadata found for '${entity.id}'`, {
          sources: error.failures.map((failure) => failure.sourceName),
        })
        return {
          entity,
          index,
          outcome: error.hadSourceErrors ? 'failed' : 'skipped',
          changes: [],
          failures: error.failures,
          error,
        }
      }
      throw error
    }

    const perSource = new Map<string, FieldMap>()
    for (const [name, accepted] of gathered.accepted) {
      perSource.set(name, accepted.candidate.fields)
    }

    const result = this.engine.merge(perSource, this.config, entity.id)
    const changes = diffFields(entity, result)
    const base = { entity, index, result, changes, failures: gathered.failures }

    if (changes.length === 0) {
      this.logger.debug(`No changes for '${entity.id}'`)
      return { ...base, outcome: 'unchanged' }
    }

    if (this.config.dryRun) {
      return { ...base, outcome: 'updated' }
    }

    try {
      await this.sink.store(entity, result)
    } catch (error) {
      const cause = toError(error)
      this.logger.error(`Failed to store '${entity.id}': ${cause.message}`)
      return { ...base, outcome: 'failed', error: cause }
    }

    this.logger.debug(`Stored '${entity.id}'`, { changes: changes.length })
    return { ...base, outcome: 'updated' }
  }

  private async notify(event: keyof Reporter, call: () => void | Promise<void> | undefined): Promise<void> {
    try {
      await call()
    } catch (error) {
      this.logger.warn(`Reporter ${event} failed: ${toError(error).message}`)
    }
  }
}
