/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { parsePattern, classifyToken, type TokenRole } from './parser'
export { validatePattern, isValidPattern } from './validator'
export {
  QUANTIFIER_RULES,
  isQuantifierSymbol,
  quantify,
  type PrecedingNodeKind,
  type QuantifierAction,
  type QuantifierSymbol,
} from './quantifier-rules'
