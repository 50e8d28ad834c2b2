/**
 * Type definitions for the pattern language.
 * @packageDocumentation
 */

// AST types
export type {
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
} from './ast'

// Token types
export type { StructuralSymbol, Token, SymbolToken, CharToken } from './token'

// Strategy types
export type { MatchStrategy, StrategyName, EngineOptions } from './strategy'

// Suggestion types
export type { SuggestionKind, PatternSuggestion } from './suggest'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { assertNever } from './errors'
