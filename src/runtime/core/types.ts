/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { CallFrame } from '../../types.js';
import type { HostFunctionDefinition } from './callable.js';
import type { FountainValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called by `print` with the formatted text and the original value */
  onPrint: (text: string, value: FountainValue) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a host function is invoked */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called after any function call returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a variable is assigned */
  onAssign?: (event: AssignEvent) => void;
  /** Called when a top-level statement fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  /** Statement index (0-based) */
  index: number;
  total: number;
  /** Value produced by the statement */
  value: FountainValue;
  durationMs: number;
}

/** Event emitted before a host function call */
export interface HostCallEvent {
  name: string;
  /** Bound arguments in parameter order, defaults applied */
  args: FountainValue[];
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  name: string;
  value: FountainValue;
  durationMs: number;
}

/** Event emitted when a variable binding is written */
export interface AssignEvent {
  name: string;
  value: FountainValue;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
  /** Statement index where the error occurred */
  index?: number;
}

/**
 * Runtime context: one lexical scope plus the run-wide settings it shares
 * with every scope chained to it.
 */
export interface RuntimeContext {
  /** Enclosing scope (undefined = root scope) */
  readonly parent?: RuntimeContext | undefined;
  /** Variables declared in this scope */
  readonly variables: Map<string, FountainValue>;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
  /** Maximum nesting of function calls */
  readonly maxCallDepth: number;
  /** Per-loop iteration cap (undefined = unlimited) */
  readonly maxLoopIterations: number | undefined;
  /** Active calls, outermost first; shared by all scopes of a run */
  readonly callStack: CallFrame[];
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Initial variables */
  variables?: Record<string, FountainValue>;
  /** Host functions, bound as variables (override built-ins of the same name) */
  functions?: Record<string, HostFunctionDefinition>;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Maximum nesting of function calls (default 256) */
  maxCallDepth?: number;
  /** Iteration cap for each `for` loop (default unlimited) */
  maxLoopIterations?: number;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Value of the last top-level statement */
  value: FountainValue;
  /** Variables of the root scope */
  variables: Record<string, FountainValue>;
}

/** Result of a single step execution */
export interface StepResult {
  /** Value produced by this step */
  value: FountainValue;
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the statement this step executed (0-based) */
  index: number;
  total: number;
}

/** Stepper for controlled statement-by-statement execution */
export interface ExecutionStepper {
  readonly done: boolean;
  /** Index of the next statement (0-based) */
  readonly index: number;
  readonly total: number;
  /** The root context (for inspecting variables between steps) */
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): StepResult;
  /** Get final result (only valid after done=true) */
  getResult(): ExecutionResult;
}
