/**
 * Control Flow Signals
 *
 * Every statement execution returns a completion record. `break`,
 * `continue` and `return` travel outward as values until a loop or call
 * boundary consumes them; no exceptions are involved.
 */

import type { SourceSpan } from '../../types.js';
import type { FountainValue } from './values.js';

/** Statement ran to the end; `value` is what a top-level step reports */
export interface NormalCompletion {
  readonly type: 'normal';
  readonly value: FountainValue;
}

/** `break` looking for its loop */
export interface BreakCompletion {
  readonly type: 'break';
  readonly span: SourceSpan;
}

/** `continue` looking for its loop */
export interface ContinueCompletion {
  readonly type: 'continue';
  readonly span: SourceSpan;
}

/** `return` looking for its call frame */
export interface ReturnCompletion {
  readonly type: 'return';
  readonly value: FountainValue;
}

export type Completion =
  | NormalCompletion
  | BreakCompletion
  | ContinueCompletion
  | ReturnCompletion;

/** Shared completion for statements that produce no value */
export const NORMAL: NormalCompletion = { type: 'normal', value: null };

export function normal(value: FountainValue): NormalCompletion {
  return { type: 'normal', value };
}

/** Whether execution of the enclosing statement list must stop */
export function isAbrupt(
  completion: Completion
): completion is BreakCompletion | ContinueCompletion | ReturnCompletion {
  return completion.type !== 'normal';
}
