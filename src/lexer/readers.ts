/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { keywordType } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a single- or double-quoted string.
 * Contents are taken verbatim: no escapes, no interpolation.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const quote = advance(state); // consume opening quote

  let value = '';
  while (peek(state) !== quote) {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw new LexError('FTN-L001', 'Unterminated string', start);
    }
    value += advance(state);
  }

  advance(state); // consume closing quote
  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  // A trailing '.' stays a separate token: `1.` is 1 followed by DOT
  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state); // consume .
    while (!isAtEnd(state) && isDigit(peek(state))) {
      value += advance(state);
    }
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = keywordType(value) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}
