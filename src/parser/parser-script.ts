/**
 * Parser Extension: Script Parsing
 * Script, statement sequences, and assignment
 */

import { Parser } from './parser.js';
import type {
  AssignNode,
  AssignOp,
  AssignTarget,
  ExpressionNode,
  ScriptNode,
  StatementNode,
  Token,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  isAtEnd,
  makeSpan,
  match,
  nested,
  previousEnd,
} from './state.js';

const ASSIGN_OPS: Partial<Record<string, AssignOp>> = {
  [TOKEN_TYPES.ASSIGN]: '=',
  [TOKEN_TYPES.PLUS_ASSIGN]: '+=',
  [TOKEN_TYPES.MINUS_ASSIGN]: '-=',
  [TOKEN_TYPES.STAR_ASSIGN]: '*=',
  [TOKEN_TYPES.SLASH_ASSIGN]: '/=',
};

/** Readable names for expressions that cannot be assigned to */
const TARGET_NAMES: Partial<Record<ExpressionNode['type'], string>> = {
  NumberLiteral: 'literal',
  StringLiteral: 'literal',
  BoolLiteral: 'literal',
  NilLiteral: 'literal',
  UnaryExpr: 'operator',
  BinaryExpr: 'operator',
  LogicalExpr: 'operator',
  ConditionalExpr: 'conditional expression',
  Call: 'function call',
  GroupedExpr: 'parenthesized expression',
  TableLiteral: 'table literal',
};

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseScript(): ScriptNode;
    parseStatement(): StatementNode;
    parseSimpleStatement(): StatementNode;
    parseStatementsUntil(...terminators: string[]): StatementNode[];
    parseAssignmentOrExpression(): StatementNode;
    toAssignTarget(expr: ExpressionNode, opToken: Token): AssignTarget;
  }
}

// ============================================================
// SCRIPT PARSING
// ============================================================

Parser.prototype.parseScript = function (this: Parser): ScriptNode {
  const start = current(this.state).span.start;
  const statements = this.parseStatementsUntil();

  return {
    type: 'Script',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Parse statements until EOF or one of the terminator tokens.
 * The terminator itself is left for the caller to consume.
 */
Parser.prototype.parseStatementsUntil = function (
  this: Parser,
  ...terminators: string[]
): StatementNode[] {
  const statements: StatementNode[] = [];
  while (!isAtEnd(this.state) && !check(this.state, ...terminators)) {
    statements.push(this.parseStatement());
  }
  return statements;
};

// ============================================================
// STATEMENTS
// ============================================================

/** stmt = simple_stmt ";"? */
Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const stmt = nested(this.state, () => this.parseSimpleStatement());
  match(this.state, TOKEN_TYPES.SEMICOLON);
  return stmt;
};

Parser.prototype.parseSimpleStatement = function (
  this: Parser
): StatementNode {
  switch (current(this.state).type) {
    case TOKEN_TYPES.DO:
      return this.parseDoBlock();
    case TOKEN_TYPES.PRINT:
      return this.parsePrint();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.FN:
      return this.parseFnDecl();
    case TOKEN_TYPES.BREAK:
    case TOKEN_TYPES.CONTINUE:
      return this.parseLoopControl();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.ASSERT:
      return this.parseAssert();
    default:
      return this.parseAssignmentOrExpression();
  }
};

/**
 * Assignment or expression statement.
 *
 * The left side is parsed as an ordinary expression, then checked to be a
 * valid target once an assignment operator follows. This keeps one token of
 * lookahead while allowing targets like `a.b[c].d`.
 */
Parser.prototype.parseAssignmentOrExpression = function (
  this: Parser
): StatementNode {
  const start = current(this.state).span.start;
  const expr = this.parseExpression();

  const opToken = current(this.state);
  const op = ASSIGN_OPS[opToken.type];
  if (op === undefined) {
    return {
      type: 'ExprStatement',
      expression: expr,
      span: makeSpan(start, previousEnd(this.state)),
    };
  }

  const target = this.toAssignTarget(expr, opToken);
  advance(this.state); // consume assignment operator
  const value = this.parseExpression();

  const node: AssignNode = {
    type: 'Assign',
    target,
    op,
    value,
    span: makeSpan(start, previousEnd(this.state)),
  };
  return node;
};

Parser.prototype.toAssignTarget = function (
  this: Parser,
  expr: ExpressionNode,
  opToken: Token
): AssignTarget {
  switch (expr.type) {
    case 'Identifier':
    case 'Index':
    case 'FieldAccess':
      return expr;
    default: {
      const target = TARGET_NAMES[expr.type] ?? expr.type;
      throw new ParseError(
        'FTN-P002',
        `Cannot assign to ${target}`,
        opToken.span.start,
        { target }
      );
    }
  }
};
