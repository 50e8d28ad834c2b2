/**
 * Pattern suggestion - guesses a conventional regex for a sample string.
 * @packageDocumentation
 */

import type { PatternSuggestion } from '../types'

/** Suggested pattern for web addresses */
export const URL_PATTERN = String.raw`(http|https):\/\/(www\.)?[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}([\/a-zA-Z0-9#-]*)?`

/** Suggested pattern for email addresses */
export const EMAIL_PATTERN = String.raw`[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}`

/** Suggested pattern for North American phone numbers */
export const PHONE_PATTERN = String.raw`(\+?1[-.\s]?)?(\(?\d{3}\)?)[-.\s]?\d{3}[-.\s]?\d{4}`

/** Suggested pattern for US ZIP and ZIP+4 codes */
export const ZIP_PATTERN = String.raw`\d{5}(-\d{4})?`

const PHONE_PREFIX = /^[\p{Nd}\s()-]{10,}/u
const ZIP_PREFIX = /^\p{Nd}{5}/u
const DIGIT = /^\p{Nd}$/u
const LETTER = /^\p{L}$/u
const SPACE = /^\s$/u

/** Characters escaped with a backslash in literal suggestions */
const ESCAPED = new Set('()[]{}?*+-|^$\\.&~#')

/**
 * Suggest a pattern for a sample string by sniffing its shape.
 *
 * Checks run in order - URL, email, phone, ZIP - and the first hit wins.
 * Anything else gets a character-by-character pattern: digits become `\d`,
 * letters `[a-zA-Z]`, whitespace `\s`, and metacharacters are escaped.
 *
 * Suggestions use conventional regex syntax (classes, escapes, counted
 * repetition); most are not accepted by this package's own engine.
 *
 * @param input - Sample string
 * @returns The detected kind and a pattern for it
 *
 * @public
 */
export function suggestPattern(input: string): PatternSuggestion {
  if (input.startsWith('http://') || input.startsWith('https://') || input.includes('www.')) {
    return { kind: 'url', pattern: URL_PATTERN }
  }

  if (input.includes('@') && input.includes('.')) {
    return { kind: 'email', pattern: EMAIL_PATTERN }
  }

  if (PHONE_PREFIX.test(input)) {
    return { kind: 'phone', pattern: PHONE_PATTERN }
  }

  if (ZIP_PREFIX.test(input)) {
    return { kind: 'zip', pattern: ZIP_PATTERN }
  }

  return { kind: 'literal', pattern: literalPattern(input) }
}

/**
 * Build a character-by-character pattern for a string.
 */
function literalPattern(input: string): string {
  let pattern = ''

  for (const char of input) {
    if (DIGIT.test(char)) {
      pattern += String.raw`\d`
    } else if (LETTER.test(char)) {
      pattern += '[a-zA-Z]'
    } else if (SPACE.test(char)) {
      pattern += String.raw`\s`
    } else if (ESCAPED.has(char)) {
      pattern += '\\' + char
    } else {
      pattern += char
    }
  }

  return pattern
}
