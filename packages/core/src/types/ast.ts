import type { PatternError } from './errors'

// =============================================================================
// PATTERN AST
// =============================================================================

/**
 * Root pattern node - the result of parsing a pattern string.
 * @public
 */
export interface RegexPattern {
  /** Original pattern string for error messages and debugging */
  readonly source: string

  /** Parsed structure, always a sequence */
  readonly root: SequenceNode

  /** Non-fatal diagnostics collected while parsing, if any */
  readonly errors?: readonly PatternError[]
}

/**
 * A node in the pattern AST.
 *
 * Nodes are built once by the parser and never mutated; each node owns its
 * children exclusively.
 *
 * @public
 */
export type RegexNode =
  | LiteralNode
  | WildcardNode
  | StartAnchorNode
  | EndAnchorNode
  | StarNode
  | PlusNode
  | QuestionNode
  | SequenceNode

/**
 * Matches exactly one specific character.
 * @public
 */
export interface LiteralNode {
  readonly type: 'literal'
  /** A single code point */
  readonly value: string
}

/**
 * `.` - matches any one character.
 * @public
 */
export interface WildcardNode {
  readonly type: 'wildcard'
}

/**
 * `^` - zero-width, succeeds only at position 0.
 * @public
 */
export interface StartAnchorNode {
  readonly type: 'start'
}

/**
 * `$` - zero-width, succeeds only at the end of the text.
 * @public
 */
export interface EndAnchorNode {
  readonly type: 'end'
}

/**
 * `x*` - zero or more repetitions of the child, greedy.
 * @public
 */
export interface StarNode {
  readonly type: 'star'
  readonly child: RegexNode
}

/**
 * `x+` - one or more repetitions of the child, greedy.
 * @public
 */
export interface PlusNode {
  readonly type: 'plus'
  readonly child: RegexNode
}

/**
 * `x?` - zero or one occurrence of the child.
 * @public
 */
export interface QuestionNode {
  readonly type: 'question'
  readonly child: RegexNode
}

/**
 * An ordered list of nodes matched one after another.
 *
 * Used both as the whole-pattern root and as the body of a parenthesized group.
 *
 * @example
 * "a(bc)d" becomes:
 *   Sequence([Literal("a"), Sequence([Literal("b"), Literal("c")]), Literal("d")])
 *
 * @public
 */
export interface SequenceNode {
  readonly type: 'sequence'
  readonly children: readonly RegexNode[]
}

/**
 * Node types that wrap a single child.
 * @public
 */
export type QuantifierNode = StarNode | PlusNode | QuestionNode
