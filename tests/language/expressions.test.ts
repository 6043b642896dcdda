/**
 * Fountain Language Tests: Expressions
 * Arithmetic, comparison, equality, logical and conditional operators
 */

import { describe, expect, it } from 'vitest';

import { FountainTypeError, UndefinedNameError } from '../../src/index.js';
import { captureError, run } from '../helpers/runtime.js';

describe('Fountain Language: Expressions', () => {
  describe('Arithmetic', () => {
    it('follows precedence', () => {
      expect(run('1 + 2 * 3')).toBe(7);
      expect(run('(1 + 2) * 3')).toBe(9);
      expect(run('10 - 2 - 3')).toBe(5);
    });

    it('computes with decimals', () => {
      expect(run('-3 * (12.4 + 2)')).toBeCloseTo(-43.2);
      expect(run('7 / 2')).toBe(3.5);
    });

    it('divides by zero without error', () => {
      expect(run('1 / 0')).toBe(Infinity);
      expect(run('-1 / 0')).toBe(-Infinity);
      expect(run('0 / 0')).toBeNaN();
    });

    it('negates repeatedly', () => {
      expect(run('- -4')).toBe(4);
    });

    it('reads a double minus as a comment', () => {
      expect(run('1 --4')).toBe(1);
    });

    it('rejects mixed operand types', () => {
      const error = captureError(() => run('"a" + 1'), FountainTypeError);
      expect(error.errorId).toBe('FTN-R001');
      expect(error.name).toBe('TypeError');
      expect(error.message).toBe(
        "Unsupported operand type(s) for '+': string, number at 1:1"
      );
    });

    it('does not concatenate strings', () => {
      expect(() => run('"a" + "b"')).toThrow(
        "Unsupported operand type(s) for '+': string, string"
      );
    });

    it('rejects negating a non-number', () => {
      expect(() => run('-"a"')).toThrow(
        "Unsupported operand type(s) for '-': string at 1:1"
      );
    });

    it('rejects arithmetic on nil', () => {
      expect(() => run('x = nil; x * 2')).toThrow(
        "Unsupported operand type(s) for '*': nil, number at 1:10"
      );
    });
  });

  describe('Comparison', () => {
    it('orders numbers', () => {
      expect(run('1 < 2')).toBe(true);
      expect(run('2 <= 2')).toBe(true);
      expect(run('1 > 2')).toBe(false);
      expect(run('3 >= 4')).toBe(false);
    });

    it('rejects ordering other kinds', () => {
      expect(() => run('1 < "2"')).toThrow(
        "Unsupported operand type(s) for '<': number, string"
      );
      expect(() => run('"a" < "b"')).toThrow(FountainTypeError);
    });
  });

  describe('Equality', () => {
    it('compares scalars by value', () => {
      expect(run('1 == 1.0')).toBe(true);
      expect(run('"a" == "a"')).toBe(true);
      expect(run('nil == nil')).toBe(true);
      expect(run('1 != 2')).toBe(true);
    });

    it('never coerces across kinds', () => {
      expect(run('1 == "1"')).toBe(false);
      expect(run('nil == false')).toBe(false);
      expect(run('0 == false')).toBe(false);
    });

    it('compares tables by identity', () => {
      expect(run('{} == {}')).toBe(false);
      expect(run('t = {}; u = t; t == u')).toBe(true);
    });

    it('compares functions by identity', () => {
      expect(run('fn f() end; g = f; f == g')).toBe(true);
      expect(run('fn f() end; fn g() end; f == g')).toBe(false);
    });

    it('treats nan as unequal to itself', () => {
      expect(run('n = 0 / 0; n == n')).toBe(false);
    });
  });

  describe('Logical Operators', () => {
    it('treats only nil and false as falsy', () => {
      expect(run('not nil')).toBe(true);
      expect(run('not false')).toBe(true);
      expect(run('not 0')).toBe(false);
      expect(run('not ""')).toBe(false);
      expect(run('not {}')).toBe(false);
    });

    it('returns operand values', () => {
      expect(run('0 and "x"')).toBe('x');
      expect(run('nil and "x"')).toBe(null);
      expect(run('nil or 5')).toBe(5);
      expect(run('"first" or "second"')).toBe('first');
    });

    it('short-circuits the right operand', () => {
      expect(run('false and missing')).toBe(false);
      expect(run('1 or missing()')).toBe(1);
    });

    it('evaluates the right operand when needed', () => {
      expect(() => run('true and missing')).toThrow(UndefinedNameError);
    });
  });

  describe('Conditional Expressions', () => {
    it('selects by truthiness', () => {
      expect(run('"yes" if true else "no"')).toBe('yes');
      expect(run('"yes" if nil else "no"')).toBe('no');
      expect(run('x = 0; "yes" if x else "no"')).toBe('yes');
    });

    it('evaluates only the taken branch', () => {
      expect(run('1 if true else missing')).toBe(1);
      expect(run('missing if false else 2')).toBe(2);
    });

    it('chains to the right', () => {
      expect(run('n = 5; "small" if n < 3 else "mid" if n < 7 else "big"')).toBe(
        'mid'
      );
    });
  });

  describe('Names', () => {
    it('rejects reading an unbound name', () => {
      const error = captureError(() => run('x = 1\ny + 1'), UndefinedNameError);
      expect(error.errorId).toBe('FTN-R005');
      expect(error.variableName).toBe('y');
      expect(error.message).toBe("Undefined variable 'y' at 2:1");
    });
  });
});
