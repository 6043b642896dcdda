/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import type { CallFrame } from '../../types.js';
import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import { hostCallable } from './callable.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import type { FountainValue } from './values.js';

/** Default nesting limit for function calls */
export const DEFAULT_MAX_CALL_DEPTH = 256;

const defaultCallbacks: RuntimeCallbacks = {
  onPrint: (text) => {
    console.log(text);
  },
};

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the Fountain runtime.
 *
 * The root scope is populated in order: built-in functions, host
 * functions (which may shadow built-ins), then initial variables.
 *
 * @throws RuntimeError (FTN-R008) for an invalid host function definition
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const variables = new Map<string, FountainValue>();

  for (const [name, definition] of Object.entries(BUILTIN_FUNCTIONS)) {
    variables.set(name, hostCallable(name, definition));
  }

  if (options.functions) {
    for (const [name, definition] of Object.entries(options.functions)) {
      variables.set(name, hostCallable(name, definition));
    }
  }

  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      variables.set(name, value);
    }
  }

  const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
    throw new RangeError(`maxCallDepth must be a positive integer, got ${maxCallDepth}`);
  }
  const maxLoopIterations = options.maxLoopIterations;
  if (
    maxLoopIterations !== undefined &&
    (!Number.isInteger(maxLoopIterations) || maxLoopIterations < 0)
  ) {
    throw new RangeError(
      `maxLoopIterations must be a non-negative integer, got ${maxLoopIterations}`
    );
  }

  return {
    parent: undefined,
    variables,
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    maxCallDepth,
    maxLoopIterations,
    callStack: [],
  };
}

/**
 * Create a child context for block scoping.
 * Child shares the parent's callbacks, limits and call stack
 * but has its own variables map. Variable lookups walk the parent chain.
 */
export function createChildContext(parent: RuntimeContext): RuntimeContext {
  return {
    parent,
    variables: new Map<string, FountainValue>(),
    callbacks: parent.callbacks,
    observability: parent.observability,
    maxCallDepth: parent.maxCallDepth,
    maxLoopIterations: parent.maxLoopIterations,
    callStack: parent.callStack,
  };
}

/**
 * Find the innermost scope that binds a name.
 * Returns undefined if no scope in the chain binds it.
 */
export function findScope(
  ctx: RuntimeContext,
  name: string
): RuntimeContext | undefined {
  let scope: RuntimeContext | undefined = ctx;
  while (scope) {
    if (scope.variables.has(name)) return scope;
    scope = scope.parent;
  }
  return undefined;
}

/**
 * Get a variable value, walking the parent chain.
 * Returns undefined if not found in any scope.
 */
export function getVariable(
  ctx: RuntimeContext,
  name: string
): FountainValue | undefined {
  return findScope(ctx, name)?.variables.get(name);
}

/**
 * Check if a variable exists in any scope.
 */
export function hasVariable(ctx: RuntimeContext, name: string): boolean {
  return findScope(ctx, name) !== undefined;
}

/** Bind a name in the given scope, shadowing any outer binding */
export function defineVariable(
  ctx: RuntimeContext,
  name: string,
  value: FountainValue
): void {
  ctx.variables.set(name, value);
}

/**
 * Assign a variable.
 * Updates the innermost existing binding; a name bound nowhere is
 * declared in the current scope.
 */
export function assignVariable(
  ctx: RuntimeContext,
  name: string,
  value: FountainValue
): void {
  (findScope(ctx, name) ?? ctx).variables.set(name, value);
}

/** Current function-call nesting depth */
export function getCallDepth(ctx: RuntimeContext): number {
  return ctx.callStack.length;
}

/**
 * Push frame onto call stack before function execution.
 * Depth limiting is the caller's job; see maxCallDepth.
 */
export function pushCallFrame(ctx: RuntimeContext, frame: CallFrame): void {
  ctx.callStack.push(frame);
}

/**
 * Pop frame from call stack after function returns.
 */
export function popCallFrame(ctx: RuntimeContext): void {
  ctx.callStack.pop();
}

/** Snapshot of the root scope's variables, for execution results */
export function rootVariables(
  ctx: RuntimeContext
): Record<string, FountainValue> {
  let root = ctx;
  while (root.parent) root = root.parent;
  return Object.fromEntries(root.variables);
}
