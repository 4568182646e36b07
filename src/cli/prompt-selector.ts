/**
 * Terminal candidate selection
 * @module cli/prompt-selector
 */

import * as readline from 'readline'
import type { CandidateSelector, Selection, SelectionRequest } from '../resolve/selector.js'
import { describeEntity, describeFields } from '../run/reporter.js'

/**
 * Asks one question and resolves with the typed answer
 */
export type Ask = (question: string) => Promise<string>

/**
 * Options for the prompt selector
 */
export interface PromptSelectorOptions {
  ask: Ask

  /** Receives the candidate listing */
  write?: (line: string) => void
}

/**
 * Interprets an answer to the candidate prompt. Empty input picks the first
 * candidate. Returns undefined for anything unrecognised.
 */
export function parseChoice(answer: string, request: SelectionRequest): Selection | undefined {
  const input = answer.trim().toLowerCase()
  if (input === 's' || input === 'skip') return { action: 'skip' }
  if (input === 'b' || input === 'abort') return { action: 'abort' }

  const choice = input === '' ? 1 : Number(input)
  if (!Number.isInteger(choice) || choice < 1 || choice > request.candidates.length) {
    return undefined
  }
  return { action: 'choose', candidate: request.candidates[choice - 1] }
}

/**
 * Creates a selector listing candidates as `artist - title` and reading the
 * choice, repeating the question until the answer is understood.
 *
 * @example
 * ```
 * Choose candidates for The Beatles - Abbey Road from spotify
 *   1. The Beatles - Abbey Road (distance 0.08)
 *   2. The Beatles - Abbey Road (Remastered) (distance 0.31)
 * # selection (default 1), Skip, aBort?
 * ```
 */
export function createPromptSelector(options: PromptSelectorOptions): CandidateSelector {
  const write = options.write ?? ((line: string) => console.log(line))

  return {
    async select(request: SelectionRequest): Promise<Selection> {
      const titleField = request.entity.kind === 'album' ? 'album' : 'title'
      write(`Choose candidates for ${describeEntity(request.entity)} from ${request.source}`)
      request.candidates.forEach((scored, i) => {
        write(`  ${i + 1}. ${describeFields(scored.candidate.fields, titleField)} (distance ${scored.distance.toFixed(2)})`)
      })

      for (;;) {
        const answer = await options.ask('# selection (default 1), Skip, aBort? ')
        const selection = parseChoice(answer, request)
        if (selection) return selection
        write(`Enter a number from 1 to ${request.candidates.length}, s or b`)
      }
    },
  }
}

/**
 * Creates an Ask reading from a terminal. Call `close` when the run ends.
 * Once input ends every question is answered with abort.
 */
export function createTerminalAsk(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): { ask: Ask; close: () => void } {
  const rl = readline.createInterface({ input, output })
  let closed = false
  rl.once('close', () => {
    closed = true
  })

  return {
    ask: (question) => {
      if (closed) return Promise.resolve('b')
      return new Promise((resolve) => {
        const onClose = () => resolve('b')
        rl.once('close', onClose)
        rl.question(question, (answer) => {
          rl.off('close', onClose)
          resolve(answer)
        })
      })
    },
    close: () => rl.close(),
  }
}
