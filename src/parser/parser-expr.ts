/**
 * Parser Extension: Expression Parsing
 * Precedence chain from conditional expressions down to postfix calls
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  TokenType,
  UnaryOp,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  nested,
  previousEnd,
} from './state.js';

const EQUALITY_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
};

const COMPARISON_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
};

const TERM_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const FACTOR_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
};

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseConditional(): ExpressionNode;
    parseDisjunction(): ExpressionNode;
    parseConjunction(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseTerm(): ExpressionNode;
    parseFactor(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parseCall(): ExpressionNode;
    parseBinaryLevel(
      ops: Partial<Record<TokenType, BinaryOp>>,
      next: () => ExpressionNode
    ): ExpressionNode;
    tryParse<T>(parseFn: () => T): T | null;
  }
}

// ============================================================
// ENTRY POINT
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return nested(this.state, () => this.parseConditional());
};

/**
 * Run a parse function, rewinding and returning null on ParseError.
 * Other errors propagate.
 */
Parser.prototype.tryParse = function <T>(
  this: Parser,
  parseFn: () => T
): T | null {
  const saved = this.state.pos;
  try {
    return parseFn();
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    this.state.pos = saved;
    return null;
  }
};

// ============================================================
// CONDITIONAL
// ============================================================

/**
 * then "if" condition "else" otherwise
 *
 * An `if` after a complete expression is only taken as a conditional when
 * a condition and `else` follow; otherwise the parser rewinds so the `if`
 * can start the next statement.
 */
Parser.prototype.parseConditional = function (this: Parser): ExpressionNode {
  const thenBranch = this.parseDisjunction();
  if (!check(this.state, TOKEN_TYPES.IF)) return thenBranch;

  const saved = this.state.pos;
  advance(this.state); // consume 'if'
  const condition = this.tryParse(() => this.parseDisjunction());
  if (condition === null || !check(this.state, TOKEN_TYPES.ELSE)) {
    this.state.pos = saved;
    return thenBranch;
  }
  advance(this.state); // consume 'else'

  const elseBranch = nested(this.state, () => this.parseConditional());
  return {
    type: 'ConditionalExpr',
    condition,
    thenBranch,
    elseBranch,
    span: makeSpan(thenBranch.span.start, elseBranch.span.end),
  };
};

// ============================================================
// LOGICAL OPERATORS
// ============================================================

Parser.prototype.parseDisjunction = function (this: Parser): ExpressionNode {
  let left = this.parseConjunction();

  while (check(this.state, TOKEN_TYPES.OR)) {
    advance(this.state);
    const right = this.parseConjunction();
    left = {
      type: 'LogicalExpr',
      op: 'or',
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseConjunction = function (this: Parser): ExpressionNode {
  let left = this.parseEquality();

  while (check(this.state, TOKEN_TYPES.AND)) {
    advance(this.state);
    const right = this.parseEquality();
    left = {
      type: 'LogicalExpr',
      op: 'and',
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

// ============================================================
// BINARY OPERATORS
// ============================================================

/** One left-associative level of the precedence ladder */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  ops: Partial<Record<TokenType, BinaryOp>>,
  next: () => ExpressionNode
): ExpressionNode {
  let left = next();

  for (;;) {
    const op = ops[current(this.state).type];
    if (op === undefined) return left;
    advance(this.state);
    const right = next();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(COMPARISON_OPS, () => this.parseTerm());
};

Parser.prototype.parseTerm = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(TERM_OPS, () => this.parseFactor());
};

Parser.prototype.parseFactor = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(FACTOR_OPS, () => this.parseUnary());
};

// ============================================================
// UNARY AND POSTFIX
// ============================================================

/** ("-" | "not") unary | call */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.MINUS, TOKEN_TYPES.NOT)) {
    const opToken = advance(this.state);
    const op: UnaryOp = opToken.type === TOKEN_TYPES.MINUS ? '-' : 'not';
    const operand = nested(this.state, () => this.parseUnary());
    return {
      type: 'UnaryExpr',
      op,
      operand,
      span: makeSpan(opToken.span.start, operand.span.end),
    };
  }

  return this.parseCall();
};

/** primary ( "(" arguments? ")" | "[" expression "]" | "." IDENTIFIER )* */
Parser.prototype.parseCall = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();
  const start = expr.span.start;

  for (;;) {
    if (check(this.state, TOKEN_TYPES.LPAREN)) {
      advance(this.state);
      const { args, namedArgs, end } = this.parseCallArgs();
      expr = {
        type: 'Call',
        callee: expr,
        args,
        namedArgs,
        span: makeSpan(start, end),
      };
    } else if (check(this.state, TOKEN_TYPES.LBRACKET)) {
      advance(this.state);
      const key = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after index");
      expr = {
        type: 'Index',
        object: expr,
        key,
        span: makeSpan(start, previousEnd(this.state)),
      };
    } else if (check(this.state, TOKEN_TYPES.DOT)) {
      advance(this.state);
      const name = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        "Expected field name after '.'"
      );
      expr = {
        type: 'FieldAccess',
        object: expr,
        name: name.value,
        span: makeSpan(start, name.span.end),
      };
    } else {
      return expr;
    }
  }
};
