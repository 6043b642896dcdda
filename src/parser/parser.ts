/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ScriptNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Script, statement sequences, assignment
 * - parser-control.ts: Blocks, if/else, for, break/continue/return, assert, print
 * - parser-functions.ts: fn declarations, parameters, call arguments
 * - parser-expr.ts: Precedence chain from conditional down to postfix
 * - parser-literals.ts: Primary expressions and table literals
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a complete AST.
   * Throws ParseError on the first syntax error.
   */
  parse(): ScriptNode {
    return this.parseScript();
  }
}
