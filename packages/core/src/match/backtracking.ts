/**
 * Backtracking matching - every node yields all the positions it can end at.
 * @packageDocumentation
 */

import type { MatchStrategy, RegexNode, SequenceNode } from '../types'
import { assertNever } from '../types'

/**
 * Compute every position at which `node` can finish when started at
 * `position`.
 *
 * Sets are bounded by the input length, so the work is polynomial even
 * though every alternative is explored.
 *
 * @param node - Node to match
 * @param input - Text split into code points
 * @param position - Index to start matching at
 * @returns End positions in ascending order (empty if the node cannot match)
 *
 * @public
 */
export function matchEnds(node: RegexNode, input: readonly string[], position: number): number[] {
  return [...endSet(node, input, position)].sort((a, b) => a - b)
}

function endSet(node: RegexNode, input: readonly string[], position: number): Set<number> {
  switch (node.type) {
    case 'literal':
      return position < input.length && input[position] === node.value ? new Set([position + 1]) : new Set<number>()

    case 'wildcard':
      return position < input.length ? new Set([position + 1]) : new Set<number>()

    case 'start':
      return position === 0 ? new Set([position]) : new Set<number>()

    case 'end':
      return position === input.length ? new Set([position]) : new Set<number>()

    case 'star':
      return closure(node.child, input, new Set([position]))

    case 'plus':
      return closure(node.child, input, endSet(node.child, input, position))

    case 'question': {
      const ends = endSet(node.child, input, position)
      ends.add(position)
      return ends
    }

    case 'sequence':
      return sequenceEnds(node, input, position)

    default:
      return assertNever(node, 'node')
  }
}

/**
 * All positions reachable from `starts` by zero or more further matches of
 * `child`.
 */
function closure(child: RegexNode, input: readonly string[], starts: Set<number>): Set<number> {
  const reached = new Set(starts)
  const worklist = [...starts]

  let current = worklist.pop()
  while (current !== undefined) {
    for (const next of endSet(child, input, current)) {
      if (!reached.has(next)) {
        reached.add(next)
        worklist.push(next)
      }
    }
    current = worklist.pop()
  }

  return reached
}

function sequenceEnds(sequence: SequenceNode, input: readonly string[], position: number): Set<number> {
  let positions = new Set([position])

  for (const child of sequence.children) {
    const next = new Set<number>()
    for (const start of positions) {
      for (const end of endSet(child, input, start)) {
        next.add(end)
      }
    }
    if (next.size === 0) {
      return next
    }
    positions = next
  }

  return positions
}

/**
 * Strategy that accepts when any way through the AST ends at the end of the
 * input. Parses the same way as the greedy strategy, so only quantifier
 * give-back differs.
 *
 * @public
 */
export const backtrackingStrategy: MatchStrategy = {
  name: 'backtracking',
  fullmatch(root: SequenceNode, input: readonly string[]): boolean {
    return endSet(root, input, 0).has(input.length)
  },
}
