/**
 * Fountain Language Tests: Lexer
 * Token kinds, positions, comments and lexical errors
 */

import { describe, expect, it } from 'vitest';

import { LexError, tokenize, tokenStream } from '../../src/index.js';
import { captureError } from '../helpers/runtime.js';

function types(source: string): string[] {
  return tokenize(source).map((token) => token.type);
}

describe('Fountain Language: Lexer', () => {
  describe('Token Kinds', () => {
    it('tokenizes an assignment', () => {
      const tokens = tokenize('x = 1.5 + "hi"');
      expect(tokens.map((t) => t.type)).toEqual([
        'IDENTIFIER',
        'ASSIGN',
        'NUMBER',
        'PLUS',
        'STRING',
        'EOF',
      ]);
      expect(tokens.map((t) => t.value)).toEqual(['x', '=', '1.5', '+', 'hi', '']);
    });

    it('prefers two-character operators', () => {
      expect(types('<= >= == != += -= *= /=')).toEqual([
        'LE',
        'GE',
        'EQ',
        'NE',
        'PLUS_ASSIGN',
        'MINUS_ASSIGN',
        'STAR_ASSIGN',
        'SLASH_ASSIGN',
        'EOF',
      ]);
    });

    it('recognizes keywords', () => {
      expect(types('fn do end and or not nil')).toEqual([
        'FN',
        'DO',
        'END',
        'AND',
        'OR',
        'NOT',
        'NIL',
        'EOF',
      ]);
    });

    it('treats object prototype names as identifiers', () => {
      expect(types('constructor toString')).toEqual([
        'IDENTIFIER',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('leaves a trailing dot out of a number', () => {
      const tokens = tokenize('1.');
      expect(tokens.map((t) => [t.type, t.value])).toEqual([
        ['NUMBER', '1'],
        ['DOT', '.'],
        ['EOF', ''],
      ]);
    });

    it('reads single-quoted strings verbatim', () => {
      expect(tokenize(`'say "hi"'`)[0]?.value).toBe('say "hi"');
    });

    it('reads backslashes without escaping', () => {
      expect(tokenize('"a\\n"')[0]?.value).toBe('a\\n');
    });
  });

  describe('Trivia', () => {
    it('skips comments to end of line', () => {
      expect(types('x -- note = 1\ny')).toEqual([
        'IDENTIFIER',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('skips a comment at end of input', () => {
      expect(types('x --')).toEqual(['IDENTIFIER', 'EOF']);
    });
  });

  describe('Positions', () => {
    it('tracks lines and columns', () => {
      const tokens = tokenize('a\n  b');
      expect(tokens[1]?.span.start).toEqual({ line: 2, column: 3, offset: 4 });
      expect(tokens[1]?.span.end).toEqual({ line: 2, column: 4, offset: 5 });
    });

    it('places EOF after the last character', () => {
      const tokens = tokenize('ab');
      expect(tokens[1]?.span.start).toEqual({ line: 1, column: 3, offset: 2 });
    });
  });

  describe('Errors', () => {
    it('rejects an unterminated string at its opening quote', () => {
      const error = captureError(() => tokenize('x = "abc'), LexError);
      expect(error.errorId).toBe('FTN-L001');
      expect(error.location).toEqual({ line: 1, column: 5, offset: 4 });
      expect(error.message).toBe('Unterminated string at 1:5');
    });

    it('rejects a newline inside a string', () => {
      const error = captureError(() => tokenize('"a\nb"'), LexError);
      expect(error.errorId).toBe('FTN-L001');
    });

    it('rejects an unknown character', () => {
      const error = captureError(() => tokenize('x = @'), LexError);
      expect(error.errorId).toBe('FTN-L002');
      expect(error.message).toBe("Unexpected character '@' at 1:5");
      expect(error.context).toEqual({ char: '@' });
    });

    it('rejects a lone bang', () => {
      expect(() => tokenize('!x')).toThrow("Unexpected character '!'");
    });
  });

  describe('Streaming', () => {
    it('yields tokens before reaching an error', () => {
      const stream = tokenStream('a @');
      expect(stream.next().value).toMatchObject({ type: 'IDENTIFIER', value: 'a' });
      expect(() => stream.next()).toThrow(LexError);
    });

    it('ends after EOF', () => {
      const stream = tokenStream('');
      expect(stream.next().value).toMatchObject({ type: 'EOF' });
      expect(stream.next().done).toBe(true);
    });
  });
});
