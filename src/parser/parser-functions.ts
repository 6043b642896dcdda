/**
 * Parser Extension: Function Parsing
 * fn declarations, parameter lists, and call arguments
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ExpressionNode,
  FnDeclNode,
  NamedArgNode,
  ParamNode,
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
  peek,
  previousEnd,
} from './state.js';

/** Upper bound on arguments per call and parameters per declaration */
export const MAX_ARGUMENTS = 255;

/** Parsed argument list of a call expression */
export interface CallArguments {
  readonly args: ExpressionNode[];
  readonly namedArgs: NamedArgNode[];
  /** End of the closing parenthesis */
  readonly end: SourceLocation;
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFnDecl(): FnDeclNode;
    parseParams(): ParamNode[];
    parseParam(): ParamNode;
    parseCallArgs(): CallArguments;
    isNamedArgStart(): boolean;
  }
}

function tooMany(kind: string, location: SourceLocation): ParseError {
  return new ParseError(
    'FTN-P006',
    `Cannot have more than ${MAX_ARGUMENTS} ${kind}`,
    location,
    { limit: MAX_ARGUMENTS, kind }
  );
}

// ============================================================
// DECLARATIONS
// ============================================================

/** fn name(params) stmt* end */
Parser.prototype.parseFnDecl = function (this: Parser): FnDeclNode {
  const start = advance(this.state).span.start; // consume 'fn'
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected function name'
  ).value;

  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '(' after function name");
  const params = check(this.state, TOKEN_TYPES.RPAREN) ? [] : this.parseParams();
  const rparen = expect(
    this.state,
    TOKEN_TYPES.RPAREN,
    "Expected ')' after parameters"
  );

  // Loops outside the function do not enclose its body
  const outerLoops = this.state.loopDepth;
  this.state.loopDepth = 0;
  this.state.functionDepth++;
  let body: BlockNode;
  try {
    body = this.parseBlockUntil(rparen.span.end, TOKEN_TYPES.END);
  } finally {
    this.state.loopDepth = outerLoops;
    this.state.functionDepth--;
  }
  expect(this.state, TOKEN_TYPES.END, "Expected 'end' to close function");

  return {
    type: 'FnDecl',
    name,
    params,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/**
 * param ("," param)*
 * Names must be distinct; once a parameter has a default, all later ones must too.
 */
Parser.prototype.parseParams = function (this: Parser): ParamNode[] {
  const params: ParamNode[] = [];
  const seen = new Set<string>();
  let defaulted: ParamNode | undefined;

  do {
    if (params.length >= MAX_ARGUMENTS) {
      throw tooMany('parameters', current(this.state).span.start);
    }

    const param = this.parseParam();

    if (seen.has(param.name)) {
      throw new ParseError(
        'FTN-P004',
        `Duplicate parameter '${param.name}'`,
        param.span.start,
        { reason: `Duplicate parameter '${param.name}'` }
      );
    }
    if (defaulted && param.defaultValue === null) {
      const reason = `Parameter '${param.name}' without default follows parameter '${defaulted.name}' with default`;
      throw new ParseError('FTN-P004', reason, param.span.start, { reason });
    }

    seen.add(param.name);
    if (param.defaultValue !== null) defaulted ??= param;
    params.push(param);
  } while (match(this.state, TOKEN_TYPES.COMMA));

  return params;
};

/** IDENTIFIER ("=" expression)? */
Parser.prototype.parseParam = function (this: Parser): ParamNode {
  const nameToken = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected parameter name'
  );
  const defaultValue = match(this.state, TOKEN_TYPES.ASSIGN)
    ? this.parseExpression()
    : null;

  return {
    type: 'Param',
    name: nameToken.value,
    defaultValue,
    span: makeSpan(nameToken.span.start, previousEnd(this.state)),
  };
};

// ============================================================
// CALL ARGUMENTS
// ============================================================

/** IDENTIFIER "=" starts a named argument */
Parser.prototype.isNamedArgStart = function (this: Parser): boolean {
  return (
    check(this.state, TOKEN_TYPES.IDENTIFIER) &&
    peek(this.state, 1).type === TOKEN_TYPES.ASSIGN
  );
};

/**
 * Arguments after the opening parenthesis, through the closing one.
 * Positional arguments must all come before named ones.
 */
Parser.prototype.parseCallArgs = function (this: Parser): CallArguments {
  const args: ExpressionNode[] = [];
  const namedArgs: NamedArgNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    do {
      if (args.length + namedArgs.length >= MAX_ARGUMENTS) {
        throw tooMany('arguments', current(this.state).span.start);
      }

      if (this.isNamedArgStart()) {
        const nameToken = advance(this.state);
        advance(this.state); // consume =
        const value = this.parseExpression();
        namedArgs.push({
          type: 'NamedArg',
          name: nameToken.value,
          value,
          span: makeSpan(nameToken.span.start, previousEnd(this.state)),
        });
        continue;
      }

      const argStart = current(this.state).span.start;
      if (namedArgs.length > 0) {
        throw new ParseError(
          'FTN-P003',
          'Positional argument follows named argument',
          argStart
        );
      }
      args.push(this.parseExpression());
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }

  const rparen = expect(
    this.state,
    TOKEN_TYPES.RPAREN,
    "Expected ')' after arguments"
  );

  return { args, namedArgs, end: rparen.span.end };
};
