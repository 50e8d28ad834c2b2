/**
 * Pattern engine - ties tokenizer, parser and matcher together.
 * @packageDocumentation
 */

import type { EngineOptions, MatchStrategy, StrategyName } from '../types'
import { parsePattern } from '../parse'
import { greedyStrategy, backtrackingStrategy } from '../match'

const STRATEGIES: Readonly<Record<StrategyName, MatchStrategy>> = {
  greedy: greedyStrategy,
  backtracking: backtrackingStrategy,
}

/**
 * Resolve a strategy option to a strategy.
 *
 * @public
 */
export function resolveStrategy(strategy: StrategyName | MatchStrategy = 'greedy'): MatchStrategy {
  return typeof strategy === 'string' ? STRATEGIES[strategy] : strategy
}

/**
 * A pattern ready to test strings for a full match.
 *
 * The pattern is tokenized and parsed again on every `match` call, so each
 * call owns its own tokenizer, parser and AST and nothing is shared between
 * calls.
 *
 * @public
 */
export class Engine {
  /** Matching strategy in use */
  readonly strategy: MatchStrategy

  constructor(
    readonly pattern: string,
    options: EngineOptions = {},
  ) {
    this.strategy = resolveStrategy(options.strategy)
  }

  /**
   * Test whether the whole of `text` is matched by the pattern.
   *
   * @param text - Text to test
   * @returns true if the pattern consumes `text` from start to end
   */
  match(text: string): boolean {
    const { root } = parsePattern(this.pattern)
    return this.strategy.fullmatch(root, Array.from(text))
  }
}

/**
 * Compile a pattern into an engine. Never fails: malformed patterns become
 * engines that match whatever their partial AST matches.
 *
 * @param pattern - Pattern source string
 * @param options - Engine options
 * @returns Engine for the pattern
 *
 * @public
 */
export function compile(pattern: string, options?: EngineOptions): Engine {
  return new Engine(pattern, options)
}

/**
 * Test a text against a pattern in one step.
 *
 * @public
 */
export function fullmatch(pattern: string, text: string, options?: EngineOptions): boolean {
  return compile(pattern, options).match(text)
}
