/**
 * Pattern validation - reports syntax the parser tolerated but did not honor.
 * @packageDocumentation
 */

import type { RegexPattern, RegexNode, PatternError } from '../types'
import { assertNever } from '../types'

/**
 * Validate a parsed pattern.
 *
 * Returns errors for:
 * - Diagnostics already recorded by the parser
 * - `^` anywhere but the start of the pattern
 * - `$` anywhere but the end of the pattern
 *
 * A pattern with errors still compiles and matches; the errors say where
 * it will not behave as it reads.
 *
 * @param pattern - The parsed pattern to validate
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePattern(pattern: RegexPattern): readonly PatternError[] {
  const errors: PatternError[] = []

  if (pattern.errors) {
    errors.push(...pattern.errors)
  }

  const children = pattern.root.children
  children.forEach((child, index) => {
    validateNode(child, { first: index === 0, last: index === children.length - 1 }, errors)
  })

  return errors
}

interface Placement {
  /** First child of the root sequence */
  readonly first: boolean
  /** Last child of the root sequence */
  readonly last: boolean
}

const NESTED: Placement = { first: false, last: false }

function validateNode(node: RegexNode, placement: Placement, errors: PatternError[]): void {
  switch (node.type) {
    case 'literal':
    case 'wildcard':
      break

    case 'start':
      if (!placement.first) {
        errors.push({
          code: 'MISPLACED_ANCHOR',
          message: '^ only matches at position 0 and is not at the start of the pattern',
        })
      }
      break

    case 'end':
      if (!placement.last) {
        errors.push({
          code: 'MISPLACED_ANCHOR',
          message: '$ only matches at the end of the text and is not at the end of the pattern',
        })
      }
      break

    case 'star':
    case 'plus':
    case 'question':
      validateNode(node.child, NESTED, errors)
      break

    case 'sequence':
      for (const child of node.children) {
        validateNode(child, NESTED, errors)
      }
      break

    default:
      assertNever(node, 'node')
  }
}

/**
 * Check if a pattern is valid (has no errors).
 *
 * @param pattern - The pattern to check
 * @returns true if the pattern has no errors
 *
 * @public
 */
export function isValidPattern(pattern: RegexPattern): boolean {
  return validatePattern(pattern).length === 0
}
