/**
 * Pattern tokenizing utilities.
 * @packageDocumentation
 */

export { Tokenizer, tokenize, tokenValue, isStructuralSymbol } from './tokenizer'
