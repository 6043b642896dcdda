/**
 * Fountain Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';
import type { FountainValue } from './runtime/core/values.js';

// ============================================================
// CALL FRAME
// ============================================================

/**
 * Call stack frame information for error reporting.
 * Represents a single active call with its call-site location.
 */
export interface CallFrame {
  /** Source location of the call expression */
  readonly location: SourceSpan;
  /** Name of the function (script or host) */
  readonly functionName: string;
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface FountainErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(errorId: string, category?: ErrorCategory) {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Fountain errors.
 * Provides structured data for host applications to format as needed.
 */
export class FountainError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  private frames: readonly CallFrame[] | undefined;

  constructor(data: FountainErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'FountainError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Frames active when the error left the innermost call, outermost first */
  get callStack(): readonly CallFrame[] {
    return this.frames ?? [];
  }

  /**
   * Record the call stack once, at the innermost frame the error passes.
   * Later calls are ignored so outer frames cannot overwrite the snapshot.
   * @internal
   */
  recordCallStack(frames: readonly CallFrame[]): void {
    if (this.frames === undefined) {
      this.frames = [...frames];
    }
  }

  /** Get structured error data for custom formatting */
  toData(): FountainErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: FountainErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * @example
 * createError("FTN-R005", { name: "foo" }, location)
 * // FountainError: "Undefined variable 'foo' at 1:5"
 *
 * @throws TypeError if errorId is not registered
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): FountainError {
  const definition = lookupDefinition(errorId);
  return new FountainError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Parse-time errors */
export class ParseError extends FountainError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Runtime execution errors */
export class RuntimeError extends FountainError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'runtime');
    super({ errorId, message, location, context });
    this.name = 'RuntimeError';
  }
}

/** Error IDs raised as type errors */
export type TypeErrorId = 'FTN-R001' | 'FTN-R002' | 'FTN-R003';

/** Operand kind mismatches, calls of non-functions, indexing non-tables */
export class FountainTypeError extends RuntimeError {
  constructor(
    errorId: TypeErrorId,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super(errorId, message, location, context);
    this.name = 'TypeError';
  }
}

/** Arity and naming mismatches while binding call arguments */
export class ArgumentError extends RuntimeError {
  readonly functionName: string;

  constructor(
    functionName: string,
    detail: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super('FTN-R004', `${functionName}() ${detail}`, location, {
      function: functionName,
      detail,
      ...context,
    });
    this.name = 'ArgumentError';
    this.functionName = functionName;
  }
}

/** Read of a name with no binding in any enclosing scope */
export class UndefinedNameError extends RuntimeError {
  readonly variableName: string;

  constructor(name: string, location?: SourceLocation) {
    super('FTN-R005', `Undefined variable '${name}'`, location, { name });
    this.name = 'UndefinedNameError';
    this.variableName = name;
  }
}

/**
 * Failed `assert`.
 * `payload` holds the evaluated message expression, or the default
 * message string when the statement has none.
 */
export class AssertionError extends RuntimeError {
  readonly payload: FountainValue;

  constructor(
    payload: FountainValue,
    message: string,
    location?: SourceLocation
  ) {
    super('FTN-R006', message, location, { message });
    this.name = 'AssertionError';
    this.payload = payload;
  }
}

/** `break` or `continue` that escaped every enclosing loop */
export class ControlFlowError extends RuntimeError {
  readonly keyword: 'break' | 'continue';

  constructor(keyword: 'break' | 'continue', location?: SourceLocation) {
    super('FTN-R007', `'${keyword}' outside loop`, location, { keyword });
    this.name = 'ControlFlowError';
    this.keyword = keyword;
  }
}

/** Error IDs raised as resource errors */
export type ResourceErrorId = 'FTN-R010' | 'FTN-R011';

/** Call depth or loop iteration limits exhausted */
export class ResourceError extends RuntimeError {
  readonly limit: number;

  constructor(
    errorId: ResourceErrorId,
    message: string,
    limit: number,
    location?: SourceLocation
  ) {
    super(errorId, message, location, { limit });
    this.name = 'ResourceError';
    this.limit = limit;
  }
}

/**
 * Get the call stack recorded on an error.
 * Returns an empty array for errors raised outside any function call.
 */
export function getCallStack(error: FountainError): readonly CallFrame[] {
  if (!(error instanceof FountainError)) {
    throw new TypeError('Expected FountainError instance');
  }
  return [...error.callStack];
}
