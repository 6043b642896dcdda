/**
 * Fountain Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ExpressionNode, ScriptNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { Parser } from './parser.js';
import { expect } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse Fountain source code into an AST.
 *
 * Throws LexError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('x = 1 + 2\nprint x');
 * ```
 */
export function parse(source: string): ScriptNode {
  return new Parser(tokenize(source)).parse();
}

/**
 * Parse source consisting of exactly one expression.
 *
 * @example
 * ```typescript
 * unparseDebug(parseExpression('1 + 2 * 3')); // "(+ 1 (* 2 3))"
 * ```
 */
export function parseExpression(source: string): ExpressionNode {
  const parser = new Parser(tokenize(source));
  const expr = parser.parseExpression();
  expect(parser.state, TOKEN_TYPES.EOF, 'Expected end of input after expression');
  return expr;
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
export { MAX_ARGUMENTS, type CallArguments } from './parser-functions.js';
export { unparse, unparseDebug } from './unparse.js';
