#!/usr/bin/env node
/**
 * metamerge command-line interface
 * @module cli
 *
 * @example
 * ```bash
 * # Merge every album by an artist, asking when a match is ambiguous
 * metamerge artist:beatles
 *
 * # Show what would change without writing, accepting close matches
 * metamerge --dry-run --max-distance 0.2
 * ```
 */

import { Command, InvalidArgumentError } from 'commander'
import { loadFileConfig } from './load-config.js'
import { setupRun } from './setup.js'
import { createPromptSelector, createTerminalAsk } from './prompt-selector.js'
import { RunController } from '../run/run-controller.js'
import { ConsoleReporter } from '../run/reporter.js'
import { createSkippingSelector } from '../resolve/selector.js'
import { createConsoleLogger } from '../utils/logger.js'
import { ConfigurationError, toError } from '../utils/errors.js'

interface CliOptions {
  config: string
  library?: string
  tracks?: boolean
  force?: boolean
  dryRun?: boolean
  primary?: string
  maxDistance?: number
  prompt: boolean
  verbose?: boolean
}

function parseDistance(value: string): number {
  const distance = Number(value)
  if (Number.isNaN(distance) || distance < 0 || distance > 1) {
    throw new InvalidArgumentError('must be a number between 0 and 1')
  }
  return distance
}

const program = new Command()

program
  .name('metamerge')
  .description('Merge metadata from several sources into library albums and tracks')
  .version('0.1.0')
  .argument('[query...]', 'library query: field:value terms and bare words')
  .option('-c, --config <path>', 'configuration file', 'metamerge.config.json')
  .option('-l, --library <path>', 'library file (overrides the configuration)')
  .option('-t, --tracks', 'process tracks instead of albums')
  .option('-f, --force', 'search again even when source ids are stored')
  .option('-n, --dry-run', 'show changes without writing them')
  .option('-p, --primary <source>', 'primary source for common fields')
  .option('-d, --max-distance <n>', 'accept matches at or below this distance', parseDistance)
  .option('--no-prompt', 'skip ambiguous matches instead of asking')
  .option('-v, --verbose', 'show debug output')
  .action(async (query: string[], options: CliOptions) => {
    const logger = createConsoleLogger(options.verbose ? 'debug' : 'warn')
    const terminal = options.prompt ? createTerminalAsk() : undefined

    try {
      const fileConfig = await loadFileConfig(options.config)
      const { config, registry, library } = await setupRun(fileConfig, options, logger)

      const controller = new RunController({
        config,
        registry,
        provider: library,
        sink: library,
        selector: terminal ? createPromptSelector({ ask: terminal.ask }) : createSkippingSelector(),
        reporter: new ConsoleReporter(),
        logger,
      })

      const summary = await controller.run(query.join(' '))
      if (summary.status === 'aborted') process.exitCode = 1
    } catch (error) {
      const cause = toError(error)
      if (!(cause instanceof ConfigurationError)) throw cause
      console.error(`Configuration error: ${cause.message}`)
      process.exitCode = 1
    } finally {
      terminal?.close()
    }
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(toError(error).message)
  process.exit(1)
})
