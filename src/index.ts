/**
 * Fountain Module
 * Exports lexer, parser, runtime, and AST types
 */

export { LexError, tokenize, tokenStream } from './lexer/index.js';
export {
  parse,
  parseExpression,
  Parser,
  unparse,
  unparseDebug,
} from './parser/index.js';
export type * from './ast-nodes.js';
export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export {
  createChildContext,
  createRuntimeContext,
  createStepper,
  createTable,
  deepEquals,
  DEFAULT_MAX_CALL_DEPTH,
  execute,
  formatNumber,
  formatValue,
  getVariable,
  hasVariable,
  hostCallable,
  inferType,
  isCallable,
  isHostCallable,
  isScriptCallable,
  isTable,
  isTruthy,
  tableFromList,
  tableFromRecord,
  tableGet,
  tableSet,
  tableSize,
  valuesEqual,
  type AssignEvent,
  type ErrorEvent,
  type ExecutionResult,
  type ExecutionStepper,
  type FountainCallable,
  type FountainTable,
  type FountainTypeName,
  type FountainValue,
  type FunctionReturnEvent,
  type HostCallable,
  type HostCallEvent,
  type HostFn,
  type HostFunctionDefinition,
  type HostFunctionParam,
  type ObservabilityCallbacks,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  type ScriptCallable,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
} from './runtime/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ArgumentError,
  AssertionError,
  ControlFlowError,
  createError,
  ERROR_REGISTRY,
  FountainError,
  FountainTypeError,
  getCallStack,
  ParseError,
  renderMessage,
  ResourceError,
  RuntimeError,
  UndefinedNameError,
  type CallFrame,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type FountainErrorData,
  type ResourceErrorId,
  type TypeErrorId,
} from './types.js';
