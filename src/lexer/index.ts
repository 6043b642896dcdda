/**
 * Fountain Lexer
 * Converts source text into tokens
 */

export { LexError } from './errors.js';
export { nextToken, tokenize, tokenStream } from './tokenizer.js';
export { createLexerState, type LexerState } from './state.js';
export { isKeyword, KEYWORDS } from './operators.js';
