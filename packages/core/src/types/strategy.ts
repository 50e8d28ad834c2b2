import type { SequenceNode } from './ast'

/**
 * A way of deciding whether a parsed pattern matches a whole input.
 *
 * The parser and tokenizer know nothing about strategies, so a matcher can
 * be swapped without touching them.
 *
 * @public
 */
export interface MatchStrategy {
  /** Identifier used in options and CLI flags */
  readonly name: string

  /**
   * Test whether `root` consumes `input` from position 0 to its end.
   *
   * @param input - Text split into code points
   */
  fullmatch(root: SequenceNode, input: readonly string[]): boolean
}

/**
 * Names of the built-in strategies.
 * @public
 */
export type StrategyName = 'greedy' | 'backtracking'

/**
 * Options accepted by `compile`.
 * @public
 */
export interface EngineOptions {
  /** Matching strategy, `'greedy'` by default */
  readonly strategy?: StrategyName | MatchStrategy
}
