/**
 * ControlFlowMixin: Blocks, Conditionals, Loops
 *
 * Handles block statements, `if`, `for`, and the statements that end
 * abruptly or talk to the host: `print`, `assert`, `return`.
 *
 * Blocks, `if` branches and each loop iteration run in a fresh child
 * scope. Completions other than normal pass through untouched, except
 * that `for` consumes `break` and `continue`.
 *
 * Error Handling:
 * - Falsy `assert` throws AssertionError (FTN-R006)
 * - Exceeding maxLoopIterations throws ResourceError (FTN-R011)
 *
 * @internal
 */

import type {
  AssertNode,
  BlockNode,
  ForNode,
  IfNode,
  PrintNode,
  ReturnNode,
} from '../../../../types.js';
import { AssertionError, ResourceError } from '../../../../types.js';
import { createChildContext } from '../../context.js';
import type { Completion } from '../../signals.js';
import { NORMAL, isAbrupt } from '../../signals.js';
import { formatValue, isTruthy, type FountainValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

const DEFAULT_ASSERT_MESSAGE = 'assertion failed';

function createControlFlowMixin(Base: EvaluatorConstructor) {
  return class ControlFlowEvaluator extends Base {
    /** Run a block in a new child scope; a normal completion yields nil */
    executeBlock(node: BlockNode): Completion {
      const completion = this.withScope(createChildContext(this.ctx), () =>
        this.executeStatements(node.statements)
      );
      return isAbrupt(completion) ? completion : NORMAL;
    }

    executeIf(node: IfNode): Completion {
      if (isTruthy(this.evaluateExpression(node.condition))) {
        return this.executeBlock(node.thenBranch);
      }
      return node.elseBranch ? this.executeBlock(node.elseBranch) : NORMAL;
    }

    /**
     * Loop until the body breaks or returns.
     * `continue` skips to the next iteration; `return` leaves the loop
     * and keeps travelling outward.
     */
    executeFor(node: ForNode): Completion {
      const limit = this.ctx.maxLoopIterations;
      let iterations = 0;

      for (;;) {
        if (limit !== undefined && iterations >= limit) {
          throw new ResourceError(
            'FTN-R011',
            `Loop exceeded ${limit} iterations`,
            limit,
            this.getNodeLocation(node)
          );
        }
        iterations++;

        const completion = this.executeBlock(node.body);
        if (completion.type === 'break') return NORMAL;
        if (completion.type === 'return') return completion;
      }
    }

    executePrint(node: PrintNode): Completion {
      const value = this.evaluateExpression(node.value);
      this.ctx.callbacks.onPrint(formatValue(value), value);
      return NORMAL;
    }

    /** The message expression is evaluated only when the assertion fails */
    executeAssert(node: AssertNode): Completion {
      if (isTruthy(this.evaluateExpression(node.condition))) return NORMAL;

      const payload: FountainValue = node.message
        ? this.evaluateExpression(node.message)
        : DEFAULT_ASSERT_MESSAGE;
      throw new AssertionError(
        payload,
        formatValue(payload),
        this.getNodeLocation(node)
      );
    }

    executeReturn(node: ReturnNode): Completion {
      const value = node.value ? this.evaluateExpression(node.value) : null;
      return { type: 'return', value };
    }
  };
}

export const ControlFlowMixin = createControlFlowMixin;
