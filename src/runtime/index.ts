/**
 * Fountain Runtime
 *
 * Public API for executing Fountain scripts.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: FountainValue and value utilities
 *   - table.ts: Table construction and access
 *   - callable.ts: Function values and argument binding
 *   - signals.ts: Completion records for break, continue, return
 *   - context.ts: Runtime context factory and scope chain
 *   - execute.ts: Script execution (execute, createStepper)
 *   - eval/: Evaluator composed from mixins (internal)
 * - ext/: Self-contained extensions
 *   - builtins.ts: Built-in functions
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  AssignEvent,
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  FunctionReturnEvent,
  HostCallEvent,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// CALLABLE TYPES AND GUARDS
// ============================================================

export type {
  FountainCallable,
  HostCallable,
  HostFn,
  HostFunctionDefinition,
  HostFunctionParam,
  ScriptCallable,
} from './core/callable.js';

export {
  hostCallable,
  isCallable,
  isHostCallable,
  isScriptCallable,
} from './core/callable.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type { FountainTypeName, FountainValue } from './core/values.js';

export {
  deepEquals,
  formatNumber,
  formatValue,
  inferType,
  isTruthy,
  valuesEqual,
} from './core/values.js';

export type { FountainTable } from './core/table.js';

export {
  createTable,
  isTable,
  tableFromList,
  tableFromRecord,
  tableGet,
  tableSet,
  tableSize,
} from './core/table.js';

// ============================================================
// CONTEXT FACTORY AND SCOPES
// ============================================================

export {
  createChildContext,
  createRuntimeContext,
  DEFAULT_MAX_CALL_DEPTH,
  getVariable,
  hasVariable,
} from './core/context.js';

// ============================================================
// SCRIPT EXECUTION
// ============================================================

export { createStepper, execute } from './core/execute.js';
