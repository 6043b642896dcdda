/**
 * Built-in Functions
 *
 * Minimal set of built-in operations. Host applications provide
 * domain-specific functions via RuntimeOptions.functions, which may
 * replace any of these.
 *
 * @internal - Not part of public API
 */

import type { HostFunctionDefinition } from '../core/callable.js';
import { FountainTypeError } from '../../types.js';
import { isTable, tableSize } from '../core/table.js';
import { inferType } from '../core/values.js';

export const BUILTIN_FUNCTIONS: Record<string, HostFunctionDefinition> = {
  /** Seconds since the Unix epoch, with fractional part */
  clock: {
    params: [],
    fn: () => Date.now() / 1000,
    description: 'Current time in seconds since the Unix epoch',
  },

  /** Return the type name of a value */
  type: {
    params: [{ name: 'value' }],
    fn: ([value]) => inferType(value ?? null),
    description: 'Type name of a value',
  },

  /** Number of entries in a table, or characters in a string */
  len: {
    params: [{ name: 'value' }],
    fn: ([value], _ctx, location) => {
      if (typeof value === 'string') return [...value].length;
      if (isTable(value)) return tableSize(value);
      const type = inferType(value ?? null);
      throw new FountainTypeError(
        'FTN-R001',
        `Unsupported operand type(s) for 'len()': ${type}`,
        location,
        { operator: 'len()', types: type }
      );
    },
    description: 'Size of a table or string',
  },
};
