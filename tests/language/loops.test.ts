/**
 * Fountain Language Tests: Loops
 * for loops, break/continue, iteration limits
 */

import { describe, expect, it } from 'vitest';

import {
  ControlFlowError,
  createRuntimeContext,
  execute,
  parse,
  ParseError,
  ResourceError,
  UndefinedNameError,
} from '../../src/index.js';
import { captureError, run } from '../helpers/runtime.js';

describe('Fountain Language: Loops', () => {
  describe('Break and Continue', () => {
    it('stops at break', () => {
      expect(run('i = 0; for do i += 1; if i == 5 do break end end; i')).toBe(5);
    });

    it('skips the rest of the body on continue', () => {
      const source = [
        'i = 0',
        's = 0',
        'for do',
        '  i += 1',
        '  if i > 6 do break end',
        '  if i == 3 do continue end',
        '  s += i',
        'end',
        's',
      ].join('\n');
      expect(run(source)).toBe(18);
    });

    it('breaks only the innermost loop', () => {
      const source =
        'n = 0; for do n += 1; for do break end; if n == 3 do break end end; n';
      expect(run(source)).toBe(3);
    });

    it('returns from a function through a loop', () => {
      const source =
        'fn find() i = 0 for do i += 1 if i == 7 do return i end end end; find()';
      expect(run(source)).toBe(7);
    });

    it('yields nil from the loop statement', () => {
      expect(run('for do break end')).toBe(null);
    });
  });

  describe('Scoping', () => {
    it('gives each iteration a fresh scope', () => {
      const error = captureError(
        () => run('for do tmp = 1; break end; tmp'),
        UndefinedNameError
      );
      expect(error.variableName).toBe('tmp');
    });

    it('does not carry locals into the next iteration', () => {
      const source = [
        'seen = 0',
        'n = 0',
        'for do',
        '  n += 1',
        '  if n > 2 do break end',
        '  if n == 2 do seen = type(marker) end',
        '  marker = 1',
        'end',
        'seen',
      ].join('\n');
      expect(() => run(source)).toThrow("Undefined variable 'marker' at 6:28");
    });
  });

  describe('Misplaced Control Flow', () => {
    it('rejects break at top level', () => {
      const error = captureError(() => run('break'), ParseError);
      expect(error.errorId).toBe('FTN-P007');
      expect(error.context).toEqual({ keyword: 'break', construct: 'loop' });
      expect(error.message).toBe("'break' outside loop at 1:1");
    });

    it('rejects continue at top level', () => {
      expect(() => run('x = 1; continue')).toThrow(
        "'continue' outside loop at 1:8"
      );
    });

    it('rejects break that would leave a function', () => {
      const error = captureError(
        () => run('fn f() break end; for do f() end'),
        ParseError
      );
      expect(error.message).toBe("'break' outside loop at 1:8");
    });

    it('rejects break in a function declared inside a loop', () => {
      expect(() => run('for do fn f() continue end break end')).toThrow(
        "'continue' outside loop at 1:15"
      );
    });

    it('rejects break inside a plain block at top level', () => {
      expect(() => run('do break end')).toThrow("'break' outside loop at 1:4");
    });

    it('rejects break in an untaken branch', () => {
      expect(() => run('if false do break end')).toThrow(
        "'break' outside loop at 1:13"
      );
    });

    it('guards hand-built trees at run time', () => {
      const script = parse('for do break end');
      const loop = script.statements[0];
      if (loop?.type !== 'For') throw new Error('expected a for loop');
      const stray = loop.body.statements[0];
      if (!stray) throw new Error('expected a break statement');

      const error = captureError(
        () => execute({ ...script, statements: [stray] }, createRuntimeContext()),
        ControlFlowError
      );
      expect(error.errorId).toBe('FTN-R007');
      expect(error.keyword).toBe('break');
      expect(error.message).toBe("'break' outside loop at 1:8");
    });
  });

  describe('Iteration Limit', () => {
    it('stops a loop that runs past the limit', () => {
      const error = captureError(
        () => run('for do end', { maxLoopIterations: 100 }),
        ResourceError
      );
      expect(error.errorId).toBe('FTN-R011');
      expect(error.limit).toBe(100);
      expect(error.message).toBe('Loop exceeded 100 iterations at 1:1');
    });

    it('allows exactly the limit', () => {
      expect(
        run('i = 0; for do i += 1; if i == 3 do break end end; i', {
          maxLoopIterations: 3,
        })
      ).toBe(3);
    });

    it('counts each loop separately', () => {
      const source = [
        'total = 0',
        'a = 0',
        'for do a += 1; total += 1; if a == 3 do break end end',
        'b = 0',
        'for do b += 1; total += 1; if b == 3 do break end end',
        'total',
      ].join('\n');
      expect(run(source, { maxLoopIterations: 3 })).toBe(6);
    });

    it('rejects an invalid limit', () => {
      expect(() => run('1', { maxLoopIterations: -1 })).toThrow(
        'maxLoopIterations must be a non-negative integer, got -1'
      );
    });
  });
});
