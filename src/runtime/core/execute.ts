/**
 * Script Execution
 *
 * Public API for executing Fountain scripts.
 * Provides both full execution and step-by-step execution.
 */

import type { ScriptNode } from '../../types.js';
import { ControlFlowError } from '../../types.js';
import { rootVariables } from './context.js';
import { getEvaluator } from './eval/evaluator.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import type { FountainValue } from './values.js';

/**
 * Execute a parsed Fountain script.
 *
 * @param script The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns The final value and the root scope's variables
 */
export function execute(
  script: ScriptNode,
  context: RuntimeContext
): ExecutionResult {
  const stepper = createStepper(script, context);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to control the execution loop and inspect state between steps.
 *
 * Each step runs one top-level statement in the given context. The
 * parser rejects top-level `return`, `break` and `continue`; for a syntax
 * tree built by hand, `return` finishes the script and the other two
 * throw ControlFlowError.
 *
 * @param script The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns A stepper for step-by-step execution
 */
export function createStepper(
  script: ScriptNode,
  context: RuntimeContext
): ExecutionStepper {
  const statements = script.statements;
  const total = statements.length;
  const evaluator = getEvaluator(context);
  let index = 0;
  let lastValue: FountainValue = null;
  let isDone = total === 0;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { value: lastValue, done: true, index, total };
      }

      const startTime = performance.now();
      context.observability.onStepStart?.({ index, total });

      try {
        const completion = evaluator.executeStatement(stmt);

        if (completion.type === 'break' || completion.type === 'continue') {
          throw new ControlFlowError(completion.type, completion.span.start);
        }

        lastValue = completion.value;
        context.observability.onStepEnd?.({
          index,
          total,
          value: lastValue,
          durationMs: performance.now() - startTime,
        });

        const stepIndex = index;
        index++;
        isDone = completion.type === 'return' || index >= total;
        return { value: lastValue, done: isDone, index: stepIndex, total };
      } catch (error) {
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }
    },

    getResult(): ExecutionResult {
      return {
        value: lastValue,
        variables: rootVariables(context),
      };
    },
  };
}
