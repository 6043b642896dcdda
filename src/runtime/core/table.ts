/**
 * Tables
 *
 * The single composite value: an insertion-ordered mapping from values to
 * values. Keys compare by value for nil, bools, numbers and strings, and by
 * identity for tables and functions, which is exactly Map key semantics.
 *
 * Public API for host applications.
 */

import type { FountainValue } from './values.js';

export interface FountainTable {
  readonly __type: 'table';
  readonly entries: Map<FountainValue, FountainValue>;
}

/** Type guard for tables */
export function isTable(value: unknown): value is FountainTable {
  return (
    typeof value === 'object' &&
    value !== null &&
    '__type' in value &&
    value.__type === 'table'
  );
}

/** Create a table, optionally from [key, value] pairs */
export function createTable(
  entries: Iterable<readonly [FountainValue, FountainValue]> = []
): FountainTable {
  const map = new Map<FountainValue, FountainValue>();
  for (const [key, value] of entries) {
    map.set(key, value);
  }
  return { __type: 'table', entries: map };
}

/**
 * Create a table keyed 0, 1, 2, ... in list order.
 *
 * @example
 * tableFromList(['a', 'b']) // same as the literal {"a", "b"}
 */
export function tableFromList(values: readonly FountainValue[]): FountainTable {
  return createTable(values.map((value, index) => [index, value] as const));
}

/** Create a table with the record's own string keys, in property order */
export function tableFromRecord(
  record: Readonly<Record<string, FountainValue>>
): FountainTable {
  return createTable(Object.entries(record));
}

/** Read a key; missing keys read as nil */
export function tableGet(table: FountainTable, key: FountainValue): FountainValue {
  return table.entries.get(key) ?? null;
}

/**
 * Write a key in place.
 * New keys go to the end of the iteration order; existing keys keep their position.
 */
export function tableSet(
  table: FountainTable,
  key: FountainValue,
  value: FountainValue
): void {
  table.entries.set(key, value);
}

export function tableSize(table: FountainTable): number {
  return table.entries.size;
}
