/**
 * Command implementations shared by the CLI and the interactive session.
 * @packageDocumentation
 */

import { compile, parsePattern, suggestPattern, validatePattern } from '@greedy-regex/core'
import type { EngineOptions, PatternError, PatternSuggestion } from '@greedy-regex/core'

/**
 * Where command output goes.
 */
export interface Output {
  /** Result lines */
  print(line: string): void
  /** Diagnostics */
  warn(line: string): void
}

export interface MatchCommandOptions extends EngineOptions {
  /** Report validator diagnostics for the pattern */
  readonly warnings?: boolean
}

/**
 * Sentence describing a match result.
 */
export function describeMatch(pattern: string, text: string, matched: boolean): string {
  return matched
    ? `The string "${text}" matches the pattern "${pattern}".`
    : `The string "${text}" does not match the pattern "${pattern}".`
}

export function describeSuggestion(suggestion: PatternSuggestion): string {
  return `${suggestion.kind}: ${suggestion.pattern}`
}

export function formatPatternError(error: PatternError): string {
  return error.position === undefined
    ? `${error.code}: ${error.message}`
    : `${error.code} at ${error.position}: ${error.message}`
}

/**
 * Match `text` against `pattern`, print the result sentence and return it.
 */
export function runMatch(pattern: string, text: string, options: MatchCommandOptions, output: Output): boolean {
  if (options.warnings) {
    for (const error of validatePattern(parsePattern(pattern))) {
      output.warn(formatPatternError(error))
    }
  }

  const matched = compile(pattern, { strategy: options.strategy }).match(text)
  output.print(describeMatch(pattern, text, matched))
  return matched
}

export function runSuggest(input: string, output: Output): PatternSuggestion {
  const suggestion = suggestPattern(input)
  output.print(describeSuggestion(suggestion))
  return suggestion
}
