/**
 * Parser Extension: Control Flow Parsing
 * Blocks, conditionals, loops, and the simple keyword statements
 */

import { Parser } from './parser.js';
import type {
  AssertNode,
  BlockNode,
  BreakNode,
  ContinueNode,
  ForNode,
  IfNode,
  PrintNode,
  ReturnNode,
  SourceLocation,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  match,
  previousEnd,
} from './state.js';

/** Tokens after which `return` carries no value */
const RETURN_TERMINATORS = [
  TOKEN_TYPES.END,
  TOKEN_TYPES.ELSE,
  TOKEN_TYPES.SEMICOLON,
  TOKEN_TYPES.EOF,
];

/** `break`/`continue` outside a loop, or `return` outside a function */
function misplaced(
  keyword: string,
  construct: 'loop' | 'function',
  location: SourceLocation
): ParseError {
  return new ParseError(
    'FTN-P007',
    `'${keyword}' outside ${construct}`,
    location,
    { keyword, construct }
  );
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseDoBlock(): BlockNode;
    parseBlockUntil(start: SourceLocation, ...terminators: string[]): BlockNode;
    parseIf(): IfNode;
    parseFor(): ForNode;
    parseLoopControl(): BreakNode | ContinueNode;
    parseReturn(): ReturnNode;
    parseAssert(): AssertNode;
    parsePrint(): PrintNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

/** do stmt* end */
Parser.prototype.parseDoBlock = function (this: Parser): BlockNode {
  const start = expect(this.state, TOKEN_TYPES.DO, "Expected 'do'").span.start;
  const block = this.parseBlockUntil(start, TOKEN_TYPES.END);
  expect(this.state, TOKEN_TYPES.END, "Expected 'end' after block");
  return { ...block, span: makeSpan(start, previousEnd(this.state)) };
};

/**
 * Statements up to (not including) a terminator, as a block node.
 * Used for bodies whose closing keyword belongs to the enclosing construct.
 */
Parser.prototype.parseBlockUntil = function (
  this: Parser,
  start: SourceLocation,
  ...terminators: string[]
): BlockNode {
  const statements = this.parseStatementsUntil(...terminators);
  return {
    type: 'Block',
    statements,
    span: makeSpan(start, current(this.state).span.start),
  };
};

// ============================================================
// CONDITIONALS AND LOOPS
// ============================================================

/** if cond do stmt* (else stmt*)? end */
Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = advance(this.state).span.start; // consume 'if'
  const condition = this.parseExpression();
  const doToken = expect(
    this.state,
    TOKEN_TYPES.DO,
    "Expected 'do' after condition"
  );

  const thenBranch = this.parseBlockUntil(
    doToken.span.end,
    TOKEN_TYPES.ELSE,
    TOKEN_TYPES.END
  );

  let elseBranch: BlockNode | null = null;
  if (check(this.state, TOKEN_TYPES.ELSE)) {
    const elseToken = advance(this.state);
    elseBranch = this.parseBlockUntil(elseToken.span.end, TOKEN_TYPES.END);
  }

  expect(this.state, TOKEN_TYPES.END, "Expected 'end' to close 'if'");

  return {
    type: 'If',
    condition,
    thenBranch,
    elseBranch,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** for do stmt* end */
Parser.prototype.parseFor = function (this: Parser): ForNode {
  const start = advance(this.state).span.start; // consume 'for'
  const doToken = expect(this.state, TOKEN_TYPES.DO, "Expected 'do' after 'for'");

  this.state.loopDepth++;
  let body: BlockNode;
  try {
    body = this.parseBlockUntil(doToken.span.end, TOKEN_TYPES.END);
  } finally {
    this.state.loopDepth--;
  }
  expect(this.state, TOKEN_TYPES.END, "Expected 'end' to close 'for'");

  return {
    type: 'For',
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

// ============================================================
// KEYWORD STATEMENTS
// ============================================================

Parser.prototype.parseLoopControl = function (
  this: Parser
): BreakNode | ContinueNode {
  const token = advance(this.state);
  const span = token.span;
  if (this.state.loopDepth === 0) {
    throw misplaced(token.value, 'loop', span.start);
  }
  return token.type === TOKEN_TYPES.BREAK
    ? { type: 'Break', span }
    : { type: 'Continue', span };
};

/** return expression? */
Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const start = advance(this.state).span.start; // consume 'return'
  if (this.state.functionDepth === 0) {
    throw misplaced('return', 'function', start);
  }
  const value = check(this.state, ...RETURN_TERMINATORS)
    ? null
    : this.parseExpression();

  return {
    type: 'Return',
    value,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** assert expression ("," expression)? */
Parser.prototype.parseAssert = function (this: Parser): AssertNode {
  const start = advance(this.state).span.start; // consume 'assert'
  const condition = this.parseExpression();
  const message = match(this.state, TOKEN_TYPES.COMMA)
    ? this.parseExpression()
    : null;

  return {
    type: 'Assert',
    condition,
    message,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** print expression */
Parser.prototype.parsePrint = function (this: Parser): PrintNode {
  const start = advance(this.state).span.start; // consume 'print'
  const value = this.parseExpression();

  return {
    type: 'Print',
    value,
    span: makeSpan(start, previousEnd(this.state)),
  };
};
