/**
 * AST matching strategies.
 * @packageDocumentation
 */

export { matchNode, greedyStrategy } from './matcher'
export { matchEnds, backtrackingStrategy } from './backtracking'
