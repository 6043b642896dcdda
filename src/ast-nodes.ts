import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// SCRIPT STRUCTURE
// ============================================================

export interface ScriptNode extends BaseNode {
  readonly type: 'Script';
  readonly statements: StatementNode[];
}

/**
 * Function parameter with optional default.
 * - fn f(x) ... end
 * - fn f(x, y = x * 2) ... end
 *
 * Defaults are expressions, evaluated per call in the callee's scope.
 */
export interface ParamNode extends BaseNode {
  readonly type: 'Param';
  readonly name: string;
  readonly defaultValue: ExpressionNode | null;
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | ExprStatementNode
  | PrintNode
  | AssignNode
  | BlockNode
  | IfNode
  | ForNode
  | BreakNode
  | ContinueNode
  | ReturnNode
  | FnDeclNode
  | AssertNode;

/** Bare expression evaluated for its value and side effects */
export interface ExprStatementNode extends BaseNode {
  readonly type: 'ExprStatement';
  readonly expression: ExpressionNode;
}

export interface PrintNode extends BaseNode {
  readonly type: 'Print';
  readonly value: ExpressionNode;
}

export type AssignOp = '=' | '+=' | '-=' | '*=' | '/=';

/** Targets that may appear on the left of `=` */
export type AssignTarget = IdentifierNode | IndexNode | FieldAccessNode;

/**
 * Assignment: target op value
 * Plain `=` declares on first use; compound forms read, combine and write back.
 */
export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly target: AssignTarget;
  readonly op: AssignOp;
  readonly value: ExpressionNode;
}

/** do ... end */
export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatementNode[];
}

/**
 * if cond do ... [else ...] end
 * Both branches are blocks; each runs in its own scope.
 */
export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBranch: BlockNode;
  readonly elseBranch: BlockNode | null;
}

/** for do ... end: loops until `break` */
export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly body: BlockNode;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode | null;
}

/**
 * fn name(params) ... end
 * Binds a closure over the current scope to `name` in that same scope.
 */
export interface FnDeclNode extends BaseNode {
  readonly type: 'FnDecl';
  readonly name: string;
  readonly params: ParamNode[];
  readonly body: BlockNode;
}

/** assert cond [, message] */
export interface AssertNode extends BaseNode {
  readonly type: 'Assert';
  readonly condition: ExpressionNode;
  readonly message: ExpressionNode | null;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | NumberLiteralNode
  | StringLiteralNode
  | BoolLiteralNode
  | NilLiteralNode
  | IdentifierNode
  | UnaryExprNode
  | BinaryExprNode
  | LogicalExprNode
  | ConditionalExprNode
  | CallNode
  | IndexNode
  | FieldAccessNode
  | GroupedExprNode
  | TableLiteralNode;

export type LiteralNode =
  | NumberLiteralNode
  | StringLiteralNode
  | BoolLiteralNode
  | NilLiteralNode;

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface NilLiteralNode extends BaseNode {
  readonly type: 'NilLiteral';
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

export type UnaryOp = '-' | 'not';

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export type ArithmeticOp = '+' | '-' | '*' | '/';
export type ComparisonOp = '<' | '<=' | '>' | '>=';
export type EqualityOp = '==' | '!=';
export type BinaryOp = ArithmeticOp | ComparisonOp | EqualityOp;

/** Eager binary operators: both operands are always evaluated */
export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

/** Short-circuit `and` / `or`; the result is one of the operand values */
export interface LogicalExprNode extends BaseNode {
  readonly type: 'LogicalExpr';
  readonly op: 'and' | 'or';
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

/** then if condition else otherwise */
export interface ConditionalExprNode extends BaseNode {
  readonly type: 'ConditionalExpr';
  readonly condition: ExpressionNode;
  readonly thenBranch: ExpressionNode;
  readonly elseBranch: ExpressionNode;
}

/** Named argument in a call: name = value */
export interface NamedArgNode extends BaseNode {
  readonly type: 'NamedArg';
  readonly name: string;
  readonly value: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
  readonly namedArgs: NamedArgNode[];
}

/** object[key] */
export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly object: ExpressionNode;
  readonly key: ExpressionNode;
}

/** object.name, equivalent to object["name"] */
export interface FieldAccessNode extends BaseNode {
  readonly type: 'FieldAccess';
  readonly object: ExpressionNode;
  readonly name: string;
}

export interface GroupedExprNode extends BaseNode {
  readonly type: 'GroupedExpr';
  readonly expression: ExpressionNode;
}

// ============================================================
// TABLE LITERALS
// ============================================================

/**
 * Table literal items:
 * - value          positional, auto-indexed from 0
 * - name = value   string key
 * - [key] = value  computed key
 */
export type TableItemNode = PositionalItemNode | NamedItemNode | KeyedItemNode;

export interface PositionalItemNode extends BaseNode {
  readonly type: 'PositionalItem';
  readonly value: ExpressionNode;
}

export interface NamedItemNode extends BaseNode {
  readonly type: 'NamedItem';
  readonly name: string;
  readonly value: ExpressionNode;
}

export interface KeyedItemNode extends BaseNode {
  readonly type: 'KeyedItem';
  readonly key: ExpressionNode;
  readonly value: ExpressionNode;
}

export interface TableLiteralNode extends BaseNode {
  readonly type: 'TableLiteral';
  readonly items: TableItemNode[];
}

// ============================================================
// UNIONS
// ============================================================

export type ASTNode =
  | ScriptNode
  | ParamNode
  | StatementNode
  | ExpressionNode
  | NamedArgNode
  | TableItemNode;

export type NodeType = ASTNode['type'];
