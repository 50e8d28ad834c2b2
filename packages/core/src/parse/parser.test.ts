import { describe, it, expect } from 'vitest'

import { parsePattern, classifyToken, type TokenRole } from './parser'
import { QUANTIFIER_RULES, type PrecedingNodeKind } from './quantifier-rules'
import type { RegexNode, LiteralNode, Token } from '../types'

const lit = (value: string): LiteralNode => ({ type: 'literal', value })
const seq = (...children: RegexNode[]): RegexNode => ({ type: 'sequence', children })

describe('parsePattern', () => {
  describe('basic patterns', () => {
    it('parses literals into a root sequence', () => {
      const pattern = parsePattern('abc')

      expect(pattern.source).toBe('abc')
      expect(pattern.errors).toBeUndefined()
      expect(pattern.root).toEqual(seq(lit('a'), lit('b'), lit('c')))
    })

    it('parses an empty pattern', () => {
      const pattern = parsePattern('')

      expect(pattern.root).toEqual(seq())
      expect(pattern.errors).toBeUndefined()
    })

    it('parses wildcard and anchors', () => {
      expect(parsePattern('^a.$').root).toEqual(seq({ type: 'start' }, lit('a'), { type: 'wildcard' }, { type: 'end' }))
    })

    it('accepts anchors anywhere', () => {
      const pattern = parsePattern('a^b')

      expect(pattern.root).toEqual(seq(lit('a'), { type: 'start' }, lit('b')))
      expect(pattern.errors).toBeUndefined()
    })

    it('treats a backslash as an ordinary literal', () => {
      expect(parsePattern('\\*').root).toEqual(seq({ type: 'star', child: lit('\\') }))
    })
  })

  describe('quantifiers', () => {
    it('wraps the preceding literal', () => {
      expect(parsePattern('a*b+c?').root).toEqual(
        seq({ type: 'star', child: lit('a') }, { type: 'plus', child: lit('b') }, { type: 'question', child: lit('c') }),
      )
    })

    it('ignores a quantifier after a wildcard', () => {
      const pattern = parsePattern('.*')

      expect(pattern.root).toEqual(seq({ type: 'wildcard' }))
      expect(pattern.errors).toEqual([
        {
          code: 'IGNORED_QUANTIFIER',
          message: 'Quantifier * does not follow a literal and is ignored',
          position: 1,
          length: 1,
        },
      ])
    })

    it('ignores a quantifier after a group', () => {
      const pattern = parsePattern('(ab)*')

      expect(pattern.root).toEqual(seq(seq(lit('a'), lit('b'))))
      expect(pattern.errors?.map((e) => [e.code, e.position])).toEqual([['IGNORED_QUANTIFIER', 4]])
    })

    it('ignores a second quantifier', () => {
      const pattern = parsePattern('a*+')

      expect(pattern.root).toEqual(seq({ type: 'star', child: lit('a') }))
      expect(pattern.errors?.map((e) => [e.code, e.position])).toEqual([['IGNORED_QUANTIFIER', 2]])
    })

    it('ignores a leading quantifier', () => {
      expect(parsePattern('?a').root).toEqual(seq(lit('a')))
    })

    const prefixes: Record<PrecedingNodeKind, { source: string; node: RegexNode }> = {
      literal: { source: 'a', node: lit('a') },
      wildcard: { source: '.', node: { type: 'wildcard' } },
      'start-anchor': { source: '^', node: { type: 'start' } },
      'end-anchor': { source: '$', node: { type: 'end' } },
      group: { source: '(a)', node: seq(lit('a')) },
    }
    const quantifiers = [
      ['*', 'star'],
      ['+', 'plus'],
      ['?', 'question'],
    ] as const

    for (const [kind, { source, node }] of Object.entries(prefixes)) {
      for (const [symbol, type] of quantifiers) {
        it(`${kind} followed by ${symbol}`, () => {
          const { root } = parsePattern(source + symbol)
          const expected = kind === 'literal' ? { type, child: node } : node

          expect(root.children).toEqual([expected])
        })
      }
    }

    it('only literals take a quantifier', () => {
      expect(QUANTIFIER_RULES).toEqual({
        literal: 'wrap',
        wildcard: 'ignore',
        'start-anchor': 'ignore',
        'end-anchor': 'ignore',
        group: 'ignore',
      })
    })
  })

  describe('groups', () => {
    it('parses a group as a nested sequence', () => {
      const pattern = parsePattern('a(bc)d')

      expect(pattern.root).toEqual(seq(lit('a'), seq(lit('b'), lit('c')), lit('d')))
      expect(pattern.errors).toBeUndefined()
    })

    it('runs an unclosed group to the end of the pattern', () => {
      const pattern = parsePattern('(ab')

      expect(pattern.root).toEqual(seq(seq(lit('a'), lit('b'))))
      expect(pattern.errors).toEqual([
        {
          code: 'UNCLOSED_GROUP',
          message: 'Unclosed group; it runs to the end of the pattern',
          position: 0,
          length: 3,
        },
      ])
    })

    it('lets a group absorb a directly following )', () => {
      const pattern = parsePattern('((a))b')

      expect(pattern.root).toEqual(seq(seq(seq(lit('a')), lit('b'))))
      expect(pattern.errors?.map((e) => [e.code, e.position, e.length])).toEqual([['UNCLOSED_GROUP', 0, 6]])
    })

    it('ends the pattern at an unmatched )', () => {
      const pattern = parsePattern('ab)cd')

      expect(pattern.root).toEqual(seq(lit('a'), lit('b')))
      expect(pattern.errors).toEqual([
        {
          code: 'UNMATCHED_CLOSE',
          message: 'Unmatched ) ends the pattern; the rest is ignored',
          position: 2,
          length: 3,
        },
      ])
    })
  })

  describe('alternation', () => {
    it('truncates the sequence at |', () => {
      const pattern = parsePattern('ab|cd')

      expect(pattern.root).toEqual(seq(lit('a'), lit('b')))
      expect(pattern.errors?.map((e) => [e.code, e.position])).toEqual([['TRUNCATED_ALTERNATION', 2]])
    })

    it('resumes the enclosing sequence after | in a group', () => {
      const pattern = parsePattern('(a|b)c')

      expect(pattern.root).toEqual(seq(seq(lit('a')), lit('b')))
      expect(pattern.errors?.map((e) => [e.code, e.position, e.length])).toEqual([
        ['TRUNCATED_ALTERNATION', 2, 1],
        ['UNMATCHED_CLOSE', 4, 2],
      ])
    })
  })
})

describe('classifyToken', () => {
  const cases: Array<[Token, TokenRole]> = [
    [{ type: 'symbol', symbol: ')', position: 0 }, { type: 'terminator', reason: 'close-group' }],
    [{ type: 'char', value: '|', position: 0 }, { type: 'terminator', reason: 'alternation' }],
    [{ type: 'symbol', symbol: '(', position: 0 }, { type: 'group-open' }],
    [{ type: 'symbol', symbol: '.', position: 0 }, { type: 'wildcard' }],
    [{ type: 'char', value: '^', position: 0 }, { type: 'start-anchor' }],
    [{ type: 'char', value: '$', position: 0 }, { type: 'end-anchor' }],
    [{ type: 'symbol', symbol: '+', position: 0 }, { type: 'quantifier', symbol: '+' }],
    [{ type: 'char', value: 'z', position: 0 }, { type: 'literal', value: 'z' }],
  ]

  it.each(cases)('classifies %o', (token, role) => {
    expect(classifyToken(token)).toEqual(role)
  })
})
