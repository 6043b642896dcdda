/**
 * Fountain Value Types and Utilities
 *
 * Core value types that flow through Fountain programs.
 * Public API for host applications.
 */

import { isKeyword } from '../../lexer/operators.js';
import { isCallable, type FountainCallable } from './callable.js';
import { isTable, type FountainTable } from './table.js';

/** Any value that can flow through Fountain; `null` is nil */
export type FountainValue =
  | null
  | boolean
  | number
  | string
  | FountainTable
  | FountainCallable;

export type FountainTypeName =
  | 'nil'
  | 'bool'
  | 'number'
  | 'string'
  | 'table'
  | 'function';

/** Infer the Fountain type name of a value */
export function inferType(value: FountainValue): FountainTypeName {
  if (value === null) return 'nil';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  return isTable(value) ? 'table' : 'function';
}

/** Only nil and false are falsy; 0 and "" are truthy */
export function isTruthy(value: FountainValue): boolean {
  return value !== null && value !== false;
}

/**
 * Equality as seen by `==`.
 * Never coerces across kinds; tables and functions compare by identity.
 */
export function valuesEqual(a: FountainValue, b: FountainValue): boolean {
  return a === b;
}

/**
 * Structural equality: tables are equal when they hold equal values under
 * the same keys, in any order. Functions compare by identity.
 */
export function deepEquals(a: FountainValue, b: FountainValue): boolean {
  return deepEqualsTracked(a, b, new Map());
}

function deepEqualsTracked(
  a: FountainValue,
  b: FountainValue,
  assumed: Map<FountainTable, Set<FountainTable>>
): boolean {
  if (a === b) return true;
  if (!isTable(a) || !isTable(b)) return false;
  if (a.entries.size !== b.entries.size) return false;

  // Pairs already under comparison are taken as equal so cycles terminate
  const pending = assumed.get(a);
  if (pending?.has(b)) return true;
  if (pending) pending.add(b);
  else assumed.set(a, new Set([b]));

  for (const [key, value] of a.entries) {
    if (!b.entries.has(key)) return false;
    const other = b.entries.get(key) ?? null;
    if (!deepEqualsTracked(value, other, assumed)) return false;
  }
  return true;
}

// ============================================================
// FORMATTING
// ============================================================

/**
 * Format a number the way Fountain prints it.
 * Integral values drop the fraction; non-finite values print as inf, -inf, nan.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  const text = String(value);
  return text.includes('e') ? expandExponent(text) : text;
}

/** Rewrite `1e+21` or `-1.5e-7` as plain positional digits */
function expandExponent(text: string): string {
  const negative = text.startsWith('-');
  const [mantissa = '', exponent = '0'] = (negative ? text.slice(1) : text).split('e');
  const [whole = '', fraction = ''] = mantissa.split('.');
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  let body: string;
  if (point <= 0) {
    body = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    body = digits + '0'.repeat(point - digits.length);
  } else {
    body = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return negative ? `-${body}` : body;
}

/**
 * Quote a string as a literal.
 * Uses double quotes unless the text contains one; there are no escapes,
 * so a string holding both quote kinds renders as text that does not
 * parse back.
 */
export function quoteString(value: string): string {
  return value.includes('"') ? `'${value}'` : `"${value}"`;
}

/** Whether a string can be written as a bare `name = value` table key */
export function isIdentifierName(value: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(value) && !isKeyword(value);
}

/**
 * Format a value for `print` and host display.
 * Strings print raw at top level and quoted inside tables.
 */
export function formatValue(value: FountainValue): string {
  return typeof value === 'string' ? value : formatNested(value, new Set());
}

function formatNested(
  value: FountainValue,
  active: Set<FountainTable>
): string {
  if (value === null) return 'nil';
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'string') return quoteString(value);
  if (isCallable(value)) {
    return value.kind === 'host'
      ? `<builtin fn ${value.name}>`
      : `<fn ${value.name}>`;
  }
  return formatTable(value, active);
}

/**
 * Render a table as a literal.
 *
 * Entries whose key equals the next auto-index render positionally, so
 * `{10, x = 1, 20}` prints as written. A table nested inside itself
 * renders as `{...}`.
 */
function formatTable(table: FountainTable, active: Set<FountainTable>): string {
  if (active.has(table)) return '{...}';
  active.add(table);

  const parts: string[] = [];
  let nextIndex = 0;
  for (const [key, value] of table.entries) {
    const rendered = formatNested(value, active);
    if (key === nextIndex) {
      parts.push(rendered);
      nextIndex++;
    } else if (typeof key === 'string' && isIdentifierName(key)) {
      parts.push(`${key} = ${rendered}`);
    } else {
      parts.push(`[${formatNested(key, active)}] = ${rendered}`);
    }
  }

  active.delete(table);
  return `{${parts.join(', ')}}`;
}
