/**
 * Callable Types
 *
 * Unified representation for function values in Fountain:
 * - ScriptCallable: functions declared with `fn` in source, closing over their scope
 * - HostCallable: functions supplied by the host application
 *
 * Public API for host applications.
 */

import type { BlockNode, ParamNode, SourceLocation } from '../../types.js';
import { ArgumentError, RuntimeError } from '../../types.js';
import type { RuntimeContext } from './types.js';
import type { FountainValue } from './values.js';

/**
 * Host function signature.
 * Receives bound arguments in parameter order, defaults already applied.
 */
export type HostFn = (
  args: FountainValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
) => FountainValue;

/**
 * Parameter metadata for host-provided functions.
 *
 * Parameters without defaultValue are required.
 * Parameters with defaultValue are optional.
 */
export interface HostFunctionParam {
  /** Parameter name, matched by named arguments */
  readonly name: string;

  /** Default value if argument omitted. Makes parameter optional. */
  readonly defaultValue?: FountainValue;

  readonly description?: string;
}

/** Host function with its parameter declarations */
export interface HostFunctionDefinition {
  readonly params: readonly HostFunctionParam[];

  /** Function implementation (receives bound args) */
  readonly fn: HostFn;

  readonly description?: string;
}

/** Common fields for all callable types */
interface CallableBase {
  readonly __type: 'callable';
  readonly name: string;
}

/** Function declared in Fountain source */
export interface ScriptCallable extends CallableBase {
  readonly kind: 'script';
  readonly params: readonly ParamNode[];
  readonly body: BlockNode;
  /** Scope active at the declaration; shared, not copied */
  readonly closure: RuntimeContext;
}

/** Function implemented by the host */
export interface HostCallable extends CallableBase {
  readonly kind: 'host';
  readonly params: readonly HostFunctionParam[];
  readonly fn: HostFn;
  readonly description?: string | undefined;
}

export type FountainCallable = ScriptCallable | HostCallable;

// ============================================================
// TYPE GUARDS
// ============================================================

export function isCallable(value: unknown): value is FountainCallable {
  return (
    typeof value === 'object' &&
    value !== null &&
    '__type' in value &&
    value.__type === 'callable'
  );
}

export function isScriptCallable(value: unknown): value is ScriptCallable {
  return isCallable(value) && value.kind === 'script';
}

export function isHostCallable(value: unknown): value is HostCallable {
  return isCallable(value) && value.kind === 'host';
}

// ============================================================
// CONSTRUCTION
// ============================================================

/**
 * Wrap a host function definition as a callable value.
 *
 * @throws RuntimeError (FTN-R008) on duplicate parameter names or a
 *   required parameter after an optional one
 */
export function hostCallable(
  name: string,
  definition: HostFunctionDefinition
): HostCallable {
  const seen = new Set<string>();
  let optional: string | undefined;

  for (const param of definition.params) {
    if (seen.has(param.name)) {
      throw invalidHostFunction(name, `duplicate parameter '${param.name}'`);
    }
    seen.add(param.name);

    if (param.defaultValue !== undefined) {
      optional ??= param.name;
    } else if (optional !== undefined) {
      throw invalidHostFunction(
        name,
        `required parameter '${param.name}' follows optional parameter '${optional}'`
      );
    }
  }

  return {
    __type: 'callable',
    kind: 'host',
    name,
    params: [...definition.params],
    fn: definition.fn,
    description: definition.description,
  };
}

function invalidHostFunction(name: string, reason: string): RuntimeError {
  return new RuntimeError(
    'FTN-R008',
    `Host function '${name}': ${reason}`,
    undefined,
    { function: name, reason }
  );
}

// ============================================================
// ARGUMENT BINDING
// ============================================================

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Bind call arguments to parameter slots.
 *
 * Positional arguments fill slots left to right, then named arguments fill
 * slots by name. Slots left unbound are `undefined`; the caller supplies
 * defaults and reports anything still missing with {@link checkMissing}.
 *
 * @throws ArgumentError for excess positional arguments, unknown names,
 *   and names bound twice
 */
export function bindArguments(
  functionName: string,
  paramNames: readonly string[],
  args: readonly FountainValue[],
  namedArgs: ReadonlyArray<readonly [string, FountainValue]>,
  location?: SourceLocation
): (FountainValue | undefined)[] {
  if (args.length > paramNames.length) {
    throw new ArgumentError(
      functionName,
      `expected at most ${plural(paramNames.length, 'argument')}, got ${args.length}`,
      location,
      { expectedCount: paramNames.length, actualCount: args.length }
    );
  }

  const slots: (FountainValue | undefined)[] = paramNames.map(
    (_, i) => args[i]
  );

  for (const [name, value] of namedArgs) {
    const index = paramNames.indexOf(name);
    if (index === -1) {
      throw new ArgumentError(
        functionName,
        `got an unexpected keyword argument '${name}'`,
        location,
        { paramName: name }
      );
    }
    if (slots[index] !== undefined) {
      throw new ArgumentError(
        functionName,
        `got multiple values for argument '${name}'`,
        location,
        { paramName: name }
      );
    }
    slots[index] = value;
  }

  return slots;
}

/**
 * Report required parameters that are still unbound.
 *
 * @throws ArgumentError listing every missing name in declaration order
 */
export function checkMissing(
  functionName: string,
  missing: readonly string[],
  location?: SourceLocation
): void {
  if (missing.length === 0) return;
  const names = missing.map((name) => `'${name}'`).join(', ');
  throw new ArgumentError(
    functionName,
    `missing ${plural(missing.length, 'required argument')}: ${names}`,
    location,
    { missing: [...missing] }
  );
}
