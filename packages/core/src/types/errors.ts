/**
 * Diagnostic codes for patterns that parse into something other than what
 * they appear to say. None of these stop a pattern from compiling.
 * @public
 */
export type PatternErrorCode =
  | 'UNCLOSED_GROUP' // ( without )
  | 'UNMATCHED_CLOSE' // ) ended the whole pattern
  | 'TRUNCATED_ALTERNATION' // | ended a sequence, the branch after it is dropped
  | 'IGNORED_QUANTIFIER' // * + ? not after a plain literal
  | 'MISPLACED_ANCHOR' // ^ not first, or $ not last

/**
 * A pattern diagnostic with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Code-point position in source where the problem starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Exhaustiveness guard for switches over tagged unions.
 * @internal
 */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unexpected ${what}: ${JSON.stringify(value)}`)
}
