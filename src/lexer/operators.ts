/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '+=': TOKEN_TYPES.PLUS_ASSIGN,
  '-=': TOKEN_TYPES.MINUS_ASSIGN,
  '*=': TOKEN_TYPES.STAR_ASSIGN,
  '/=': TOKEN_TYPES.SLASH_ASSIGN,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '=': TOKEN_TYPES.ASSIGN,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  ',': TOKEN_TYPES.COMMA,
  '.': TOKEN_TYPES.DOT,
  ';': TOKEN_TYPES.SEMICOLON,
};

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
  nil: TOKEN_TYPES.NIL,
  print: TOKEN_TYPES.PRINT,
  if: TOKEN_TYPES.IF,
  else: TOKEN_TYPES.ELSE,
  for: TOKEN_TYPES.FOR,
  fn: TOKEN_TYPES.FN,
  return: TOKEN_TYPES.RETURN,
  break: TOKEN_TYPES.BREAK,
  continue: TOKEN_TYPES.CONTINUE,
  assert: TOKEN_TYPES.ASSERT,
  and: TOKEN_TYPES.AND,
  or: TOKEN_TYPES.OR,
  not: TOKEN_TYPES.NOT,
  do: TOKEN_TYPES.DO,
  end: TOKEN_TYPES.END,
};

/** Keyword token type for a word, or undefined for plain identifiers */
export function keywordType(word: string): TokenType | undefined {
  return Object.hasOwn(KEYWORDS, word) ? KEYWORDS[word] : undefined;
}

/** Whether a word is reserved and cannot name a variable */
export function isKeyword(word: string): boolean {
  return keywordType(word) !== undefined;
}
