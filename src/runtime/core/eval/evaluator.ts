/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Active scope and shared utilities
 * 2. CoreMixin - Expression and statement dispatch
 * 3. LiteralsMixin - Table literals
 * 4. VariablesMixin - Names, indexing, assignment
 * 5. ExpressionsMixin - Unary, binary, logical, conditional operators
 * 6. ControlFlowMixin - Blocks, if, for, print, assert, return
 * 7. ClosuresMixin - Function declaration and invocation
 *
 * Every cross-mixin method is declared on EvaluatorBase, so the order
 * only decides which class in the chain defines each method.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { ClosuresMixin } from './mixins/closures.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { CoreMixin } from './mixins/core.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { LiteralsMixin } from './mixins/literals.js';
import { VariablesMixin } from './mixins/variables.js';
import type { RuntimeContext } from '../types.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export const Evaluator = ClosuresMixin(
  ControlFlowMixin(
    ExpressionsMixin(VariablesMixin(LiteralsMixin(CoreMixin(EvaluatorBase))))
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 *
 * Key: RuntimeContext object reference
 * Value: Evaluator instance for that context
 *
 * Cache eviction happens automatically when the RuntimeContext is
 * garbage collected, since WeakMap keys don't prevent GC.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
