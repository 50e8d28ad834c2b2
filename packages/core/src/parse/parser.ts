/**
 * Pattern parser - converts pattern strings to AST.
 * @packageDocumentation
 */

import type { RegexPattern, RegexNode, SequenceNode, PatternError, Token } from '../types'
import { assertNever } from '../types'
import { Tokenizer, tokenValue } from '../tokenize'
import {
  QUANTIFIER_RULES,
  isQuantifierSymbol,
  quantify,
  type PrecedingNodeKind,
  type QuantifierSymbol,
} from './quantifier-rules'

/**
 * What a token means to the parser.
 *
 * Anchors and alternation are plain characters to the tokenizer; they are
 * recognized here by value. Terminators end the current sequence without
 * becoming part of the AST.
 *
 * @public
 */
export type TokenRole =
  | { readonly type: 'terminator'; readonly reason: 'close-group' | 'alternation' }
  | { readonly type: 'group-open' }
  | { readonly type: 'wildcard' }
  | { readonly type: 'start-anchor' }
  | { readonly type: 'end-anchor' }
  | { readonly type: 'quantifier'; readonly symbol: QuantifierSymbol }
  | { readonly type: 'literal'; readonly value: string }

/**
 * How a call to parseSequence stopped.
 */
type SequenceEnd =
  | { readonly type: 'exhausted' }
  | { readonly type: 'close-group' | 'alternation'; readonly position: number }

interface ParsedSequence {
  readonly sequence: SequenceNode
  readonly end: SequenceEnd
}

/**
 * Parser state: the tokenizer it owns and the diagnostics collected so far.
 */
interface ParserState {
  readonly tokenizer: Tokenizer
  /** Pattern length in code points */
  readonly length: number
  readonly errors: PatternError[]
}

/**
 * Parse a pattern string into an AST.
 *
 * Never throws. Malformed syntax is recovered by ending the current
 * sequence early; what was skipped is reported in `errors`.
 *
 * @param source - The pattern string to parse
 * @returns Parsed RegexPattern with AST and any diagnostics
 *
 * @public
 */
export function parsePattern(source: string): RegexPattern {
  const tokenizer = new Tokenizer(source)
  const state: ParserState = {
    tokenizer,
    length: Array.from(source).length,
    errors: [],
  }

  const { sequence, end } = parseSequence(state)

  if (end.type === 'close-group') {
    state.errors.push({
      code: 'UNMATCHED_CLOSE',
      message: 'Unmatched ) ends the pattern; the rest is ignored',
      position: end.position,
      length: state.length - end.position,
    })
  }

  return {
    source,
    root: sequence,
    errors: state.errors.length > 0 ? state.errors : undefined,
  }
}

/**
 * Decide what a token means to the parser.
 *
 * @public
 */
export function classifyToken(token: Token): TokenRole {
  const value = tokenValue(token)

  switch (value) {
    case ')':
      return { type: 'terminator', reason: 'close-group' }
    case '|':
      return { type: 'terminator', reason: 'alternation' }
    case '(':
      return { type: 'group-open' }
    case '.':
      return { type: 'wildcard' }
    case '^':
      return { type: 'start-anchor' }
    case '$':
      return { type: 'end-anchor' }
  }

  if (isQuantifierSymbol(value)) {
    return { type: 'quantifier', symbol: value }
  }
  return { type: 'literal', value }
}

/**
 * Parse tokens into a sequence until the pattern runs out or a terminator
 * is reached. Recurses into a fresh sequence for each group.
 */
function parseSequence(state: ParserState): ParsedSequence {
  const children: RegexNode[] = []

  let token = state.tokenizer.next()
  while (token !== undefined) {
    const role = classifyToken(token)

    switch (role.type) {
      case 'terminator':
        if (role.reason === 'alternation') {
          state.errors.push({
            code: 'TRUNCATED_ALTERNATION',
            message: '| ends the current sequence; the branch after it is not matched',
            position: token.position,
            length: 1,
          })
        }
        return {
          sequence: { type: 'sequence', children },
          end: { type: role.reason, position: token.position },
        }

      case 'group-open': {
        const group = parseSequence(state)
        if (group.end.type === 'exhausted') {
          state.errors.push({
            code: 'UNCLOSED_GROUP',
            message: 'Unclosed group; it runs to the end of the pattern',
            position: token.position,
            length: state.length - token.position,
          })
        }
        if (state.tokenizer.peek() === ')') {
          state.tokenizer.next()
        }
        append(state, children, group.sequence, 'group')
        break
      }

      case 'wildcard':
        append(state, children, { type: 'wildcard' }, 'wildcard')
        break

      case 'start-anchor':
        append(state, children, { type: 'start' }, 'start-anchor')
        break

      case 'end-anchor':
        append(state, children, { type: 'end' }, 'end-anchor')
        break

      case 'quantifier':
        state.errors.push({
          code: 'IGNORED_QUANTIFIER',
          message: `Quantifier ${role.symbol} does not follow a literal and is ignored`,
          position: token.position,
          length: 1,
        })
        break

      case 'literal':
        append(state, children, { type: 'literal', value: role.value }, 'literal')
        break

      default:
        assertNever(role, 'token role')
    }

    token = state.tokenizer.next()
  }

  return { sequence: { type: 'sequence', children }, end: { type: 'exhausted' } }
}

/**
 * Append a node, first taking a directly following quantifier if the rule
 * table allows one after this kind of node.
 */
function append(state: ParserState, children: RegexNode[], node: RegexNode, kind: PrecedingNodeKind): void {
  const next = state.tokenizer.peek()

  if (next !== undefined && isQuantifierSymbol(next) && QUANTIFIER_RULES[kind] === 'wrap') {
    state.tokenizer.next()
    children.push(quantify(next, node))
    return
  }

  children.push(node)
}
