import { describe, it, expect } from 'vitest'

import { suggestPattern, URL_PATTERN, EMAIL_PATTERN, PHONE_PATTERN, ZIP_PATTERN } from './suggest'

describe('suggestPattern', () => {
  describe('known shapes', () => {
    it('recognizes URLs by scheme or www.', () => {
      expect(suggestPattern('https://example.com')).toEqual({ kind: 'url', pattern: URL_PATTERN })
      expect(suggestPattern('http://example.org/test')).toEqual({ kind: 'url', pattern: URL_PATTERN })
      expect(suggestPattern('see www.example.net')).toEqual({ kind: 'url', pattern: URL_PATTERN })
    })

    it('recognizes email addresses', () => {
      expect(suggestPattern('user@example.com')).toEqual({ kind: 'email', pattern: EMAIL_PATTERN })
    })

    it('checks for URLs before emails', () => {
      expect(suggestPattern('https://user@example.com').kind).toBe('url')
    })

    it('recognizes phone numbers', () => {
      expect(suggestPattern('(123) 456-7890')).toEqual({ kind: 'phone', pattern: PHONE_PATTERN })
      expect(suggestPattern('123-456-7890')).toEqual({ kind: 'phone', pattern: PHONE_PATTERN })
    })

    it('recognizes ZIP codes', () => {
      expect(suggestPattern('12345')).toEqual({ kind: 'zip', pattern: ZIP_PATTERN })
      expect(suggestPattern('54321 north')).toEqual({ kind: 'zip', pattern: ZIP_PATTERN })
    })

    it('accepts any decimal digits, not only ASCII', () => {
      expect(suggestPattern('١٢٣٤٥').kind).toBe('zip')
      expect(suggestPattern('٠١٢٣٤٥٦٧٨٩').kind).toBe('phone')
    })

    it('checks for phone numbers before ZIP+4 codes', () => {
      expect(suggestPattern('12345-6789').kind).toBe('phone')
    })
  })

  describe('literal fallback', () => {
    it('maps digits, letters and whitespace to classes', () => {
      expect(suggestPattern('a1 b')).toEqual({ kind: 'literal', pattern: String.raw`[a-zA-Z]\d\s[a-zA-Z]` })
    })

    it('escapes metacharacters', () => {
      expect(suggestPattern('1+1=2').pattern).toBe(String.raw`\d\+\d=\d`)
      expect(suggestPattern('a.b').pattern).toBe(String.raw`[a-zA-Z]\.[a-zA-Z]`)
    })

    it('keeps other punctuation as is', () => {
      expect(suggestPattern('x_y!').pattern).toBe('[a-zA-Z]_[a-zA-Z]!')
    })

    it('treats non-ASCII letters as letters', () => {
      expect(suggestPattern('é').pattern).toBe('[a-zA-Z]')
    })

    it('returns an empty pattern for empty input', () => {
      expect(suggestPattern('')).toEqual({ kind: 'literal', pattern: '' })
    })
  })
})
