/**
 * Greedy Regex Library
 *
 * A small regular-expression engine: tokenizes a restricted pattern syntax,
 * parses it into an AST and tests whole strings against it.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // AST types
  RegexPattern,
  RegexNode,
  LiteralNode,
  WildcardNode,
  StartAnchorNode,
  EndAnchorNode,
  StarNode,
  PlusNode,
  QuestionNode,
  SequenceNode,
  QuantifierNode,
  // Token types
  StructuralSymbol,
  Token,
  SymbolToken,
  CharToken,
  // Strategy types
  MatchStrategy,
  StrategyName,
  EngineOptions,
  // Suggestion types
  SuggestionKind,
  PatternSuggestion,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'

// =============================================================================
// Tokenizing
// =============================================================================

export { Tokenizer, tokenize, tokenValue, isStructuralSymbol } from './tokenize'

// =============================================================================
// Parsing
// =============================================================================

export { parsePattern, classifyToken, type TokenRole } from './parse'
export { validatePattern, isValidPattern } from './parse'
export { QUANTIFIER_RULES, type PrecedingNodeKind, type QuantifierAction } from './parse'

// =============================================================================
// Matching
// =============================================================================

export { matchNode, greedyStrategy } from './match'
export { matchEnds, backtrackingStrategy } from './match'

// =============================================================================
// Compilation
// =============================================================================

export { compile, fullmatch, resolveStrategy, Engine } from './compile'

// =============================================================================
// Suggestion
// =============================================================================

export { suggestPattern, URL_PATTERN, EMAIL_PATTERN, PHONE_PATTERN, ZIP_PATTERN } from './suggest'
