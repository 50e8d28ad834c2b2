/**
 * Which nodes a trailing quantifier may apply to.
 * @packageDocumentation
 */

import type { QuantifierNode, RegexNode } from '../types'
import { assertNever } from '../types'

/**
 * Kind of the node the parser has just appended to a sequence.
 * @public
 */
export type PrecedingNodeKind = 'literal' | 'wildcard' | 'start-anchor' | 'end-anchor' | 'group'

/**
 * What happens to a `*`, `+` or `?` that immediately follows a node.
 * @public
 */
export type QuantifierAction = 'wrap' | 'ignore'

/**
 * Quantifier rule table.
 *
 * Only a plain literal takes a quantifier. After anything else the
 * quantifier is consumed and dropped, so `.*` is a single wildcard and
 * `(ab)*` is the group `ab` once.
 *
 * @public
 */
export const QUANTIFIER_RULES: Readonly<Record<PrecedingNodeKind, QuantifierAction>> = {
  literal: 'wrap',
  wildcard: 'ignore',
  'start-anchor': 'ignore',
  'end-anchor': 'ignore',
  group: 'ignore',
}

/**
 * The quantifier characters.
 * @public
 */
export type QuantifierSymbol = '*' | '+' | '?'

/**
 * @public
 */
export function isQuantifierSymbol(char: string): char is QuantifierSymbol {
  return char === '*' || char === '+' || char === '?'
}

/**
 * Wrap a node in the quantifier named by `symbol`.
 *
 * @public
 */
export function quantify(symbol: QuantifierSymbol, child: RegexNode): QuantifierNode {
  switch (symbol) {
    case '*':
      return { type: 'star', child }
    case '+':
      return { type: 'plus', child }
    case '?':
      return { type: 'question', child }
    default:
      return assertNever(symbol, 'quantifier')
  }
}
