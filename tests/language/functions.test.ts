/**
 * Fountain Language Tests: Functions
 * Declarations, argument binding, defaults and returns
 */

import { describe, expect, it } from 'vitest';

import {
  ArgumentError,
  FountainTypeError,
  UndefinedNameError,
} from '../../src/index.js';
import { captureError, createPrintCollector, run } from '../helpers/runtime.js';

describe('Fountain Language: Functions', () => {
  describe('Declaration and Return', () => {
    it('returns a value', () => {
      expect(run('fn add(a, b) return a + b end; add(2, 3)')).toBe(5);
    });

    it('returns nil without a return statement', () => {
      expect(run('fn f() x = 1 end; f()')).toBe(null);
    });

    it('returns nil from a bare return', () => {
      expect(run('fn f() return end; f()')).toBe(null);
    });

    it('stops at the first return', () => {
      expect(run('fn f() return 1; return 2 end; f()')).toBe(1);
    });

    it('recurses', () => {
      const source = [
        'fn fib(n)',
        '  if n < 2 do return n end',
        '  return fib(n - 1) + fib(n - 2)',
        'end',
        'fib(10)',
      ].join('\n');
      expect(run(source)).toBe(55);
    });

    it('binds the name in the innermost scope', () => {
      const error = captureError(
        () => run('do fn inner() return 1 end end; inner()'),
        UndefinedNameError
      );
      expect(error.variableName).toBe('inner');
    });

    it('yields nil from the declaration statement', () => {
      expect(run('fn f() end')).toBe(null);
    });
  });

  describe('Arguments', () => {
    it('binds named arguments by parameter name', () => {
      expect(run('fn f(a, b) return a - b end; f(b = 1, a = 5)')).toBe(4);
    });

    it('mixes positional, named and default arguments', () => {
      const source =
        'fn f(a, b = 1, c = 2) return a * 100 + b * 10 + c end; f(1, c = 5)';
      expect(run(source)).toBe(115);
    });

    it('evaluates defaults after earlier parameters are bound', () => {
      expect(run('fn f(a, b = a * 2) return b end; f(3)')).toBe(6);
    });

    it('evaluates defaults on every call', () => {
      expect(
        run('fn f(t = {}) t.n = 1 return t end; a = f(); b = f(); a == b')
      ).toBe(false);
    });

    it('passes nil explicitly without using the default', () => {
      expect(run('fn f(a = 1) return a end; f(nil)')).toBe(null);
    });

    it('evaluates arguments left to right', () => {
      const source = [
        'log = {}',
        'n = 0',
        'fn note(x) n += 1; log[n] = x; return x end',
        'fn pair(a, b) return a end',
        'pair(note("first"), b = note("second"))',
        'log[1] == "first" and log[2] == "second"',
      ].join('\n');
      expect(run(source)).toBe(true);
    });
  });

  describe('Binding Errors', () => {
    it('rejects too many positional arguments', () => {
      const error = captureError(
        () => run('fn f(a, b) end; f(1, 2, 3)'),
        ArgumentError
      );
      expect(error.errorId).toBe('FTN-R004');
      expect(error.functionName).toBe('f');
      expect(error.message).toBe(
        'f() expected at most 2 arguments, got 3 at 1:17'
      );
    });

    it('rejects an unknown named argument', () => {
      expect(() => run('fn f(a) end; f(1, z = 2)')).toThrow(
        "f() got an unexpected keyword argument 'z'"
      );
    });

    it('rejects a name bound twice', () => {
      expect(() => run('fn f(a) end; f(1, a = 2)')).toThrow(
        "f() got multiple values for argument 'a'"
      );
    });

    it('lists every missing argument', () => {
      expect(() => run('fn f(a, b, c = 1) end; f()')).toThrow(
        "f() missing 2 required arguments: 'a', 'b'"
      );
      expect(() => run('fn f(a, b) end; f(1)')).toThrow(
        "f() missing 1 required argument: 'b'"
      );
    });

    it('uses singular wording for one parameter', () => {
      expect(() => run('fn f(a) end; f(1, 2)')).toThrow(
        'f() expected at most 1 argument, got 2'
      );
    });
  });

  describe('Callees', () => {
    it('rejects calling a non-function', () => {
      const error = captureError(() => run('x = 1; x()'), FountainTypeError);
      expect(error.errorId).toBe('FTN-R002');
      expect(error.message).toBe('Can only call functions, got number at 1:8');
    });

    it('checks the callee before evaluating arguments', () => {
      const { output, callbacks } = createPrintCollector();
      const error = captureError(
        () => run('n = nil; fn f() print "side" end; n(f())', { callbacks }),
        FountainTypeError
      );
      expect(error.message).toBe('Can only call functions, got nil at 1:35');
      expect(output).toEqual([]);
    });

    it('evaluates arguments left to right, positional before named', () => {
      const { output, callbacks } = createPrintCollector();
      const source =
        'fn say(s) print s return s end; fn f(a, b, c = 0) end; f(say(1), say(2), c = say(3))';
      run(source, { callbacks });
      expect(output).toEqual(['1', '2', '3']);
    });

    it('calls functions stored in tables', () => {
      expect(run('fn sq(x) return x * x end; m = {op = sq}; m.op(4)')).toBe(16);
    });

    it('calls the result of a call', () => {
      expect(
        run('fn adder(n) fn add(x) return x + n end return add end; adder(2)(5)')
      ).toBe(7);
    });
  });
});
