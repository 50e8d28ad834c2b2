/**
 * Greedy matching - walks the AST forward once, never giving input back.
 * @packageDocumentation
 */

import type { MatchStrategy, RegexNode, SequenceNode } from '../types'
import { assertNever } from '../types'

/**
 * Match a node against the input starting at `position`.
 *
 * Quantifiers take as many repetitions as they can and keep them: in
 * `a*ab` the star eats every `a`, so nothing is left for the literal `a`
 * and `aab` is rejected.
 *
 * @param node - Node to match
 * @param input - Text split into code points
 * @param position - Index to start matching at
 * @returns The position after the match, or null if the node does not match
 *
 * @public
 */
export function matchNode(node: RegexNode, input: readonly string[], position: number): number | null {
  switch (node.type) {
    case 'literal':
      return position < input.length && input[position] === node.value ? position + 1 : null

    case 'wildcard':
      return position < input.length ? position + 1 : null

    case 'start':
      return position === 0 ? position : null

    case 'end':
      return position === input.length ? position : null

    case 'star':
      return repeat(node.child, input, position)

    case 'plus': {
      const first = matchNode(node.child, input, position)
      return first === null ? null : repeat(node.child, input, first)
    }

    case 'question':
      return matchNode(node.child, input, position) ?? position

    case 'sequence':
      return matchSequence(node, input, position)

    default:
      return assertNever(node, 'node')
  }
}

/**
 * Apply the child as many times as it matches; return the furthest position.
 */
function repeat(child: RegexNode, input: readonly string[], position: number): number {
  let current = position

  for (;;) {
    const next = matchNode(child, input, current)
    // A zero-width child would repeat forever
    if (next === null || next === current) {
      return current
    }
    current = next
  }
}

/**
 * Thread the position through each child in order; fail on the first miss.
 */
function matchSequence(sequence: SequenceNode, input: readonly string[], position: number): number | null {
  let current = position

  for (const child of sequence.children) {
    const next = matchNode(child, input, current)
    if (next === null) {
      return null
    }
    current = next
  }

  return current
}

/**
 * Strategy that matches with {@link matchNode} from position 0 and demands
 * it end exactly at the end of the input.
 *
 * @public
 */
export const greedyStrategy: MatchStrategy = {
  name: 'greedy',
  fullmatch(root: SequenceNode, input: readonly string[]): boolean {
    return matchNode(root, input, 0) === input.length
  },
}
