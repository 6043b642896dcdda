/**
 * ClosuresMixin: Function Declaration and Invocation
 *
 * Handles `fn` declarations, call expressions, and the shared invocation
 * path for script and host functions:
 * - argument binding (positional, then named, then defaults)
 * - call depth limiting and the call stack used for error reports
 * - observability events around each call
 *
 * Script functions run in a new scope chained to their closure. Defaults
 * are evaluated in that scope, in parameter order, after the arguments
 * are bound. Host functions receive the bound arguments in parameter
 * order with their plain default values applied.
 *
 * Error Handling:
 * - Calling a non-function throws FountainTypeError (FTN-R002)
 * - Binding failures throw ArgumentError (FTN-R004)
 * - `break`/`continue` escaping a function body throws ControlFlowError (FTN-R007)
 * - Exceeding maxCallDepth, or exhausting the host stack, throws ResourceError (FTN-R010)
 *
 * @internal
 */

import type {
  CallNode,
  FnDeclNode,
  NamedArgNode,
  SourceSpan,
} from '../../../../types.js';
import {
  ControlFlowError,
  FountainError,
  FountainTypeError,
  ResourceError,
} from '../../../../types.js';
import {
  bindArguments,
  checkMissing,
  isCallable,
  type FountainCallable,
  type HostCallable,
  type ScriptCallable,
} from '../../callable.js';
import {
  createChildContext,
  defineVariable,
  getCallDepth,
  popCallFrame,
  pushCallFrame,
} from '../../context.js';
import type { Completion } from '../../signals.js';
import { NORMAL } from '../../signals.js';
import { inferType, type FountainValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

function callDepthExceeded(limit: number, callSite: SourceSpan): ResourceError {
  return new ResourceError(
    'FTN-R010',
    `Maximum call depth exceeded (${limit})`,
    limit,
    callSite.start
  );
}

/** V8 reports native stack exhaustion as a RangeError */
function isStackOverflow(error: unknown): error is RangeError {
  return error instanceof RangeError && /call stack/i.test(error.message);
}

function createClosuresMixin(Base: EvaluatorConstructor) {
  return class ClosuresEvaluator extends Base {
    /** Bind a closure over the current scope to its name in that scope */
    executeFnDecl(node: FnDeclNode): Completion {
      const fn: ScriptCallable = {
        __type: 'callable',
        kind: 'script',
        name: node.name,
        params: node.params,
        body: node.body,
        closure: this.ctx,
      };
      defineVariable(this.ctx, node.name, fn);
      return NORMAL;
    }

    /**
     * Evaluate call expression: callee(args, name = value)
     * The callee must be a function before any argument is evaluated;
     * arguments then run left to right, positional before named.
     */
    evaluateCall(node: CallNode): FountainValue {
      const callee = this.evaluateExpression(node.callee);
      if (!isCallable(callee)) {
        const type = inferType(callee);
        throw new FountainTypeError(
          'FTN-R002',
          `Can only call functions, got ${type}`,
          this.getNodeLocation(node),
          { type }
        );
      }

      const args = node.args.map((arg) => this.evaluateExpression(arg));
      const namedArgs = this.evaluateNamedArgs(node.namedArgs);
      return this.invokeCallable(callee, args, namedArgs, node.span);
    }

    evaluateNamedArgs(
      namedArgs: readonly NamedArgNode[]
    ): [string, FountainValue][] {
      return namedArgs.map((arg): [string, FountainValue] => [
        arg.name,
        this.evaluateExpression(arg.value),
      ]);
    }

    /**
     * Invoke a function value.
     *
     * Pushes a call frame for the duration of the call. A Fountain error
     * leaving the call records the stack as it stood at the innermost
     * frame; a native stack overflow is reported as a call depth error.
     */
    invokeCallable(
      callee: FountainCallable,
      args: readonly FountainValue[],
      namedArgs: ReadonlyArray<readonly [string, FountainValue]>,
      callSite: SourceSpan
    ): FountainValue {
      const limit = this.ctx.maxCallDepth;
      if (getCallDepth(this.ctx) >= limit) {
        const error = callDepthExceeded(limit, callSite);
        error.recordCallStack(this.ctx.callStack);
        throw error;
      }

      pushCallFrame(this.ctx, { location: callSite, functionName: callee.name });
      try {
        const startTime = performance.now();
        const value =
          callee.kind === 'script'
            ? this.callScript(callee, args, namedArgs, callSite)
            : this.callHost(callee, args, namedArgs, callSite);

        this.ctx.observability.onFunctionReturn?.({
          name: callee.name,
          value,
          durationMs: performance.now() - startTime,
        });
        return value;
      } catch (error) {
        if (error instanceof FountainError) {
          error.recordCallStack(this.ctx.callStack);
          throw error;
        }
        if (isStackOverflow(error)) {
          const converted = callDepthExceeded(limit, callSite);
          converted.recordCallStack(this.ctx.callStack);
          throw converted;
        }
        throw error;
      } finally {
        popCallFrame(this.ctx);
      }
    }

    callScript(
      callee: ScriptCallable,
      args: readonly FountainValue[],
      namedArgs: ReadonlyArray<readonly [string, FountainValue]>,
      callSite: SourceSpan
    ): FountainValue {
      const location = callSite.start;
      const slots = bindArguments(
        callee.name,
        callee.params.map((param) => param.name),
        args,
        namedArgs,
        location
      );
      checkMissing(
        callee.name,
        callee.params
          .filter((param, i) => slots[i] === undefined && !param.defaultValue)
          .map((param) => param.name),
        location
      );

      const scope = createChildContext(callee.closure);
      const completion = this.withScope(scope, () => {
        callee.params.forEach((param, i) => {
          const value = slots[i];
          if (value !== undefined) defineVariable(scope, param.name, value);
        });
        callee.params.forEach((param, i) => {
          if (slots[i] === undefined && param.defaultValue) {
            defineVariable(
              scope,
              param.name,
              this.evaluateExpression(param.defaultValue)
            );
          }
        });
        return this.executeStatements(callee.body.statements);
      });

      switch (completion.type) {
        case 'return':
          return completion.value;
        case 'break':
        case 'continue':
          throw new ControlFlowError(completion.type, completion.span.start);
        case 'normal':
          return null;
      }
    }

    callHost(
      callee: HostCallable,
      args: readonly FountainValue[],
      namedArgs: ReadonlyArray<readonly [string, FountainValue]>,
      callSite: SourceSpan
    ): FountainValue {
      const location = callSite.start;
      const slots = bindArguments(
        callee.name,
        callee.params.map((param) => param.name),
        args,
        namedArgs,
        location
      );
      checkMissing(
        callee.name,
        callee.params
          .filter(
            (param, i) =>
              slots[i] === undefined && param.defaultValue === undefined
          )
          .map((param) => param.name),
        location
      );

      const bound = callee.params.map((param, i): FountainValue => {
        const value = slots[i];
        if (value !== undefined) return value;
        return param.defaultValue ?? null;
      });

      this.ctx.observability.onHostCall?.({ name: callee.name, args: bound });
      return callee.fn(bound, this.ctx, location);
    }
  };
}

export const ClosuresMixin = createClosuresMixin;
