// =============================================================================
// TOKENS
// =============================================================================

/**
 * Characters the tokenizer treats as structural.
 *
 * `^`, `$` and `|` are deliberately absent: they are scanned as plain
 * characters and only given meaning by the parser.
 *
 * @public
 */
export type StructuralSymbol = '(' | ')' | '*' | '+' | '?' | '.'

/**
 * A single token scanned from a pattern.
 * @public
 */
export type Token = SymbolToken | CharToken

/**
 * A bare structural symbol.
 * @public
 */
export interface SymbolToken {
  readonly type: 'symbol'
  readonly symbol: StructuralSymbol
  /** Code-point index in the pattern */
  readonly position: number
}

/**
 * Any other character, carried as a literal payload.
 * @public
 */
export interface CharToken {
  readonly type: 'char'
  readonly value: string
  /** Code-point index in the pattern */
  readonly position: number
}
