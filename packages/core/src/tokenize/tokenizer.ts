/**
 * Pattern tokenizer - scans a pattern one character at a time.
 * @packageDocumentation
 */

import type { StructuralSymbol, Token } from '../types'

const STRUCTURAL_SYMBOLS: ReadonlySet<string> = new Set(['(', ')', '*', '+', '?', '.'])

/**
 * Check whether a character is one of the structural symbols `( ) * + ? .`.
 *
 * @public
 */
export function isStructuralSymbol(char: string): char is StructuralSymbol {
  return STRUCTURAL_SYMBOLS.has(char)
}

/**
 * The character a token stands for, whichever variant it is.
 *
 * @public
 */
export function tokenValue(token: Token): string {
  return token.type === 'symbol' ? token.symbol : token.value
}

/**
 * Lazy, single-pass token stream over a pattern.
 *
 * The tokenizer owns its cursor. Iterating it advances the same cursor as
 * `next()`, so a tokenizer cannot be restarted; build a new one instead.
 *
 * @example
 * ```ts
 * const tokenizer = new Tokenizer('a*')
 * tokenizer.next() // { type: 'char', value: 'a', position: 0 }
 * tokenizer.peek() // '*'
 * ```
 *
 * @public
 */
export class Tokenizer implements Iterable<Token> {
  /** Pattern split into code points */
  private readonly chars: readonly string[]
  private cursor = 0

  constructor(readonly source: string) {
    this.chars = Array.from(source)
  }

  /** Index of the next character to be scanned */
  get position(): number {
    return this.cursor
  }

  /**
   * Scan the next token, or return undefined at end of pattern.
   */
  next(): Token | undefined {
    if (this.cursor >= this.chars.length) {
      return undefined
    }

    const position = this.cursor
    const char = this.chars[position]
    this.cursor++

    if (isStructuralSymbol(char)) {
      return { type: 'symbol', symbol: char, position }
    }
    return { type: 'char', value: char, position }
  }

  /**
   * The next pattern character, without advancing.
   */
  peek(): string | undefined {
    return this.cursor < this.chars.length ? this.chars[this.cursor] : undefined
  }

  *[Symbol.iterator](): Iterator<Token> {
    let token = this.next()
    while (token !== undefined) {
      yield token
      token = this.next()
    }
  }
}

/**
 * Scan a whole pattern into an array of tokens.
 *
 * @public
 */
export function tokenize(source: string): Token[] {
  return [...new Tokenizer(source)]
}
