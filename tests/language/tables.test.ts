/**
 * Fountain Language Tests: Tables
 * Literals, indexing, field access, mutation and aliasing
 */

import { describe, expect, it } from 'vitest';

import {
  FountainTypeError,
  isTable,
  type FountainValue,
} from '../../src/index.js';
import { captureError, run } from '../helpers/runtime.js';

function entries(value: FountainValue): [FountainValue, FountainValue][] {
  if (!isTable(value)) throw new Error('expected a table');
  return [...value.entries];
}

describe('Fountain Language: Tables', () => {
  describe('Literals', () => {
    it('auto-indexes positional items from zero', () => {
      expect(run('t = {10, 20, 30}; t[0] + t[2]')).toBe(40);
      expect(run('t = {10, 20, 30}; t[1]')).toBe(20);
    });

    it('counts only positional items for auto-indexes', () => {
      expect(entries(run('{10, x = 1, 20}'))).toEqual([
        [0, 10],
        ['x', 1],
        [1, 20],
      ]);
    });

    it('evaluates computed keys', () => {
      expect(run('k = "z"; t = {[k] = 1, [true] = 2}; t[true] + t.z')).toBe(3);
    });

    it('lets a later item overwrite an earlier key in place', () => {
      expect(entries(run('{a = 1, b = 2, a = 3}'))).toEqual([
        ['a', 3],
        ['b', 2],
      ]);
    });

    it('creates an empty table', () => {
      expect(entries(run('{}'))).toEqual([]);
    });
  });

  describe('Reading', () => {
    it('reads missing keys as nil', () => {
      expect(run('t = {}; t[99]')).toBe(null);
      expect(run('t = {}; t.missing')).toBe(null);
    });

    it('treats field access as a string key', () => {
      expect(run('t = {name = "a"}; t["name"]')).toBe('a');
    });

    it('compares numeric keys by value', () => {
      expect(run('t = {}; t[1] = "a"; t[1.0]')).toBe('a');
      expect(run('t = {}; t[1] = "a"; t["1"]')).toBe(null);
    });

    it('uses tables as keys by identity', () => {
      expect(run('k = {}; t = {[k] = "hit"}; t[k]')).toBe('hit');
      expect(run('k = {}; t = {[k] = "hit"}; t[{}]')).toBe(null);
    });

    it('rejects indexing a non-table', () => {
      const error = captureError(() => run('x = 5; x[0]'), FountainTypeError);
      expect(error.errorId).toBe('FTN-R003');
      expect(error.message).toBe('Cannot index number at 1:8');
    });

    it('rejects field access on nil', () => {
      expect(() => run('n = nil; n.f')).toThrow('Cannot index nil at 1:10');
    });
  });

  describe('Writing', () => {
    it('appends new keys and updates existing ones in place', () => {
      expect(entries(run('t = {a = 1, b = 2}; t.a = 3; t.c = 4; t'))).toEqual([
        ['a', 3],
        ['b', 2],
        ['c', 4],
      ]);
    });

    it('shares tables by reference', () => {
      expect(run('a = {n = 1}; b = a; b.n += 1; a.n')).toBe(2);
    });

    it('writes through nested access', () => {
      expect(run('t = {inner = {}}; t.inner["k"] = 5; t.inner.k')).toBe(5);
    });

    it('applies compound operators to fields', () => {
      expect(run('s = {y = 10, vy = 3}; s.y += s.vy; s.y -= 1; s.y')).toBe(12);
    });

    it('rejects compound assignment to a missing key', () => {
      const error = captureError(() => run('t = {}; t.n += 1'), FountainTypeError);
      expect(error.message).toBe(
        "Unsupported operand type(s) for '+': nil, number at 1:9"
      );
    });

    it('rejects assigning into a non-table', () => {
      expect(() => run('s = "str"; s.x = 1')).toThrow(
        'Cannot index string at 1:12'
      );
    });

    it('evaluates the table and key before the value', () => {
      const order: string[] = [];
      const result = run(
        't = {}\nmark("obj", t)[mark("key", "k")] = mark("value", 1)\nt.k',
        {
          functions: {
            mark: {
              params: [{ name: 'label' }, { name: 'value' }],
              fn: ([label, value]) => {
                order.push(String(label));
                return value ?? null;
              },
            },
          },
        }
      );
      expect(order).toEqual(['obj', 'key', 'value']);
      expect(result).toBe(1);
    });

    it('yields the stored value from an assignment', () => {
      expect(run('t = {}; t.x = 7')).toBe(7);
    });
  });

  describe('Cycles', () => {
    it('lets a table hold itself', () => {
      expect(run('t = {}; t.self = t; t.self.self == t')).toBe(true);
    });
  });
});
