/**
 * Parser Extension: Literal Parsing
 * Primary expressions and table literals
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  TableItemNode,
  TableLiteralNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  describeToken,
  expect,
  makeSpan,
  match,
  peek,
  previousEnd,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseTableLiteral(): TableLiteralNode;
    parseTableItem(): TableItemNode;
  }
}

// ============================================================
// PRIMARY
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const span = token.span;

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'NumberLiteral', value: Number(token.value), span };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span };
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span,
      };
    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'NilLiteral', span };
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Identifier', name: token.value, span };
    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const expression = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after expression");
      return {
        type: 'GroupedExpr',
        expression,
        span: makeSpan(span.start, previousEnd(this.state)),
      };
    }
    case TOKEN_TYPES.LBRACE:
      return this.parseTableLiteral();
    default: {
      const found = describeToken(token);
      const message =
        token.type === TOKEN_TYPES.EOF
          ? 'Unexpected end of input, expected expression'
          : `Unexpected token '${found}'`;
      throw new ParseError('FTN-P001', message, span.start, { token: found });
    }
  }
};

// ============================================================
// TABLE LITERALS
// ============================================================

/** "{" (table_item ("," table_item)* ","?)? "}" */
Parser.prototype.parseTableLiteral = function (this: Parser): TableLiteralNode {
  const start = advance(this.state).span.start; // consume {
  const items: TableItemNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    items.push(this.parseTableItem());
    if (!match(this.state, TOKEN_TYPES.COMMA)) break;
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' after table items");

  return {
    type: 'TableLiteral',
    items,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/**
 * One table item:
 * - name = value
 * - [key] = value
 * - value
 */
Parser.prototype.parseTableItem = function (this: Parser): TableItemNode {
  const start = current(this.state).span.start;

  if (
    check(this.state, TOKEN_TYPES.IDENTIFIER) &&
    peek(this.state, 1).type === TOKEN_TYPES.ASSIGN
  ) {
    const name = advance(this.state).value;
    advance(this.state); // consume =
    const value = this.parseExpression();
    return {
      type: 'NamedItem',
      name,
      value,
      span: makeSpan(start, value.span.end),
    };
  }

  if (match(this.state, TOKEN_TYPES.LBRACKET)) {
    const key = this.parseExpression();
    expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after table key");
    expect(this.state, TOKEN_TYPES.ASSIGN, "Expected '=' after table key");
    const value = this.parseExpression();
    return {
      type: 'KeyedItem',
      key,
      value,
      span: makeSpan(start, value.span.end),
    };
  }

  const value = this.parseExpression();
  return { type: 'PositionalItem', value, span: value.span };
};
