/**
 * Type Infrastructure for Evaluator Mixins
 *
 * Defines the constructor type for the mixin pattern.
 * Mixins receive a base constructor and return an extended constructor.
 *
 * @internal
 */

import type { RuntimeContext } from '../types.js';
import type { EvaluatorBase } from './base.js';

/**
 * Constructor type for EvaluatorBase or any class extending it.
 * This is the input type for mixin functions.
 *
 * Every evaluator is constructed from the context it starts in, so the
 * signature is fixed rather than a rest parameter.
 */
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> =
  new (ctx: RuntimeContext) => TBase;

/**
 * Mixin function type.
 * Receives a constructor extending EvaluatorBase and returns an extended constructor.
 */
export type Mixin<
  TBase extends EvaluatorBase = EvaluatorBase,
  TExtension extends TBase = TBase,
> = (Base: EvaluatorConstructor<TBase>) => EvaluatorConstructor<TExtension>;
