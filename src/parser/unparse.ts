/**
 * Expression Rendering
 *
 * Two renderers over expression ASTs:
 * - unparse: Fountain source form, e.g. `-3 * (12.4 + 2)`
 * - unparseDebug: fully parenthesized prefix form, e.g. `(* (- 3) (group (+ 12.4 2)))`
 */

import type { ExpressionNode, NamedArgNode, TableItemNode } from '../types.js';
import { formatNumber, quoteString } from '../runtime/core/values.js';

// ============================================================
// SOURCE FORM
// ============================================================

/** Render an expression back to Fountain source */
export function unparse(expr: ExpressionNode): string {
  switch (expr.type) {
    case 'NumberLiteral':
      return formatNumber(expr.value);
    case 'StringLiteral':
      return quoteString(expr.value);
    case 'BoolLiteral':
      return String(expr.value);
    case 'NilLiteral':
      return 'nil';
    case 'Identifier':
      return expr.name;
    case 'UnaryExpr': {
      const operand = unparse(expr.operand);
      if (expr.op === 'not') return `not ${operand}`;
      // `--` would start a comment
      return operand.startsWith('-') ? `- ${operand}` : `-${operand}`;
    }
    case 'BinaryExpr':
    case 'LogicalExpr':
      return `${unparse(expr.left)} ${expr.op} ${unparse(expr.right)}`;
    case 'ConditionalExpr':
      return `${unparse(expr.thenBranch)} if ${unparse(expr.condition)} else ${unparse(expr.elseBranch)}`;
    case 'Call': {
      const args = [
        ...expr.args.map(unparse),
        ...expr.namedArgs.map(unparseNamedArg),
      ];
      return `${unparse(expr.callee)}(${args.join(', ')})`;
    }
    case 'Index':
      return `${unparse(expr.object)}[${unparse(expr.key)}]`;
    case 'FieldAccess':
      return `${unparse(expr.object)}.${expr.name}`;
    case 'GroupedExpr':
      return `(${unparse(expr.expression)})`;
    case 'TableLiteral':
      return `{${expr.items.map(unparseTableItem).join(', ')}}`;
  }
}

function unparseNamedArg(arg: NamedArgNode): string {
  return `${arg.name} = ${unparse(arg.value)}`;
}

function unparseTableItem(item: TableItemNode): string {
  switch (item.type) {
    case 'PositionalItem':
      return unparse(item.value);
    case 'NamedItem':
      return `${item.name} = ${unparse(item.value)}`;
    case 'KeyedItem':
      return `[${unparse(item.key)}] = ${unparse(item.value)}`;
  }
}

// ============================================================
// DEBUG FORM
// ============================================================

/** Render an expression as a parenthesized prefix tree, for debugging */
export function unparseDebug(expr: ExpressionNode): string {
  switch (expr.type) {
    case 'NumberLiteral':
    case 'StringLiteral':
    case 'BoolLiteral':
    case 'NilLiteral':
    case 'Identifier':
      return unparse(expr);
    case 'UnaryExpr':
      return `(${expr.op} ${unparseDebug(expr.operand)})`;
    case 'BinaryExpr':
    case 'LogicalExpr':
      return `(${expr.op} ${unparseDebug(expr.left)} ${unparseDebug(expr.right)})`;
    case 'ConditionalExpr':
      return `(if ${unparseDebug(expr.condition)} ${unparseDebug(expr.thenBranch)} ${unparseDebug(expr.elseBranch)})`;
    case 'Call':
      return list('call', [
        unparseDebug(expr.callee),
        ...expr.args.map(unparseDebug),
        ...expr.namedArgs.map((arg) => `(= ${arg.name} ${unparseDebug(arg.value)})`),
      ]);
    case 'Index':
      return `(index ${unparseDebug(expr.object)} ${unparseDebug(expr.key)})`;
    case 'FieldAccess':
      return `(. ${unparseDebug(expr.object)} ${expr.name})`;
    case 'GroupedExpr':
      return `(group ${unparseDebug(expr.expression)})`;
    case 'TableLiteral':
      return list('table', expr.items.map(debugTableItem));
  }
}

function debugTableItem(item: TableItemNode): string {
  switch (item.type) {
    case 'PositionalItem':
      return unparseDebug(item.value);
    case 'NamedItem':
      return `(= ${item.name} ${unparseDebug(item.value)})`;
    case 'KeyedItem':
      return `([] ${unparseDebug(item.key)} ${unparseDebug(item.value)})`;
  }
}

function list(head: string, parts: string[]): string {
  return parts.length === 0 ? `(${head})` : `(${head} ${parts.join(' ')})`;
}
