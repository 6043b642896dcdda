/**
 * Fountain Types
 * Shared source, token, AST and error definitions
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export type * from './ast-nodes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ArgumentError,
  AssertionError,
  ControlFlowError,
  createError,
  FountainError,
  FountainTypeError,
  getCallStack,
  ParseError,
  ResourceError,
  RuntimeError,
  UndefinedNameError,
  type CallFrame,
  type FountainErrorData,
  type ResourceErrorId,
  type TypeErrorId,
} from './error-classes.js';
