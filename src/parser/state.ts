/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Statements and expressions currently being parsed inside one another */
  depth: number;
  /** `for` bodies enclosing the current statement, within the current function */
  loopDepth: number;
  /** `fn` bodies enclosing the current statement */
  functionDepth: number;
}

/** Deepest nesting of statements and expressions the parser accepts */
export const MAX_NESTING_DEPTH = 200;

export function createParserState(tokens: Token[]): ParserState {
  return { tokens, pos: 0, depth: 0, loopDepth: 0, functionDepth: 0 };
}

/**
 * Run a parse function one nesting level deeper.
 * Fails with ParseError (FTN-P008) past MAX_NESTING_DEPTH.
 */
export function nested<T>(state: ParserState, parseFn: () => T): T {
  if (state.depth >= MAX_NESTING_DEPTH) {
    throw new ParseError(
      'FTN-P008',
      `Maximum nesting depth exceeded (${MAX_NESTING_DEPTH})`,
      current(state).span.start,
      { limit: MAX_NESTING_DEPTH }
    );
  }
  state.depth++;
  try {
    return parseFn();
  } finally {
    state.depth--;
  }
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Consume the current token when it matches; report whether it did */
export function match(state: ParserState, ...types: string[]): boolean {
  if (!check(state, ...types)) return false;
  advance(state);
  return true;
}

/** @internal */
export function expect(
  state: ParserState,
  type: string,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const hint = generateHint(type, token);
  const fullMessage = hint ? `${message}. ${hint}` : message;
  throw new ParseError('FTN-P005', fullMessage, token.span.start, {
    expected: type,
    found: describeToken(token),
  });
}

/** Human-readable token text for messages */
export function describeToken(token: Token): string {
  if (token.type === TOKEN_TYPES.EOF) return 'end of input';
  if (token.type === TOKEN_TYPES.STRING) return `"${token.value}"`;
  return token.value;
}

// ============================================================
// ERROR HINTS
// ============================================================

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(expectedType: string, actualToken: Token): string | null {
  const actual = actualToken.type;

  if (actual === TOKEN_TYPES.EOF) {
    switch (expectedType) {
      case TOKEN_TYPES.RPAREN:
        return 'Hint: Check for unclosed parenthesis';
      case TOKEN_TYPES.RBRACE:
        return 'Hint: Check for unclosed brace';
      case TOKEN_TYPES.RBRACKET:
        return 'Hint: Check for unclosed bracket';
      case TOKEN_TYPES.END:
        return "Hint: Every 'do', 'if', 'for' and 'fn' needs a closing 'end'";
    }
  }

  if (actual === TOKEN_TYPES.IDENTIFIER) {
    const typoHints: Record<string, string> = {
      tru: 'true',
      ture: 'true',
      fals: 'false',
      flase: 'false',
      nill: 'nil',
      null: 'nil',
      retrn: 'return',
      retrun: 'return',
      brek: 'break',
      braek: 'break',
      then: 'do',
      elif: 'else if',
      ned: 'end',
    };
    const suggestion = typoHints[actualToken.value.toLowerCase()];
    if (suggestion) {
      return `Hint: Did you mean '${suggestion}'?`;
    }
  }

  if (expectedType === TOKEN_TYPES.DO && actual === TOKEN_TYPES.LBRACE) {
    return "Hint: Blocks are written 'do ... end', not braces";
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** End location of the most recently consumed token */
export function previousEnd(state: ParserState): SourceLocation {
  const prev = state.tokens[state.pos - 1];
  return prev ? prev.span.end : current(state).span.start;
}
