/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compile, fullmatch, resolveStrategy, Engine } from './engine'
