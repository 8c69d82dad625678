/**
 * Manifold Lexer
 * Converts source text into tokens
 */

export { LexerError } from '../error-classes.js';
export { tokenize, type TokenizeOptions } from './tokenizer.js';
