/**
 * The input shapes the suggester recognizes.
 * @public
 */
export type SuggestionKind = 'url' | 'email' | 'phone' | 'zip' | 'literal'

/**
 * A suggested pattern for a piece of free-form input.
 * @public
 */
export interface PatternSuggestion {
  readonly kind: SuggestionKind
  /** Pattern text in conventional regex syntax */
  readonly pattern: string
}
