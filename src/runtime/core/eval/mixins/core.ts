/**
 * CoreMixin: Dispatch
 *
 * Routes expression and statement nodes to the evaluator method that
 * handles them, and runs statement lists.
 *
 * Statement values: an expression statement yields its value, an
 * assignment yields the stored value, every other statement yields nil.
 *
 * @internal
 */

import type { ExpressionNode, StatementNode } from '../../../../types.js';
import type { Completion } from '../../signals.js';
import { NORMAL, isAbrupt, normal } from '../../signals.js';
import type { FountainValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

function createCoreMixin(Base: EvaluatorConstructor) {
  return class CoreEvaluator extends Base {
    evaluateExpression(expr: ExpressionNode): FountainValue {
      switch (expr.type) {
        case 'NumberLiteral':
        case 'StringLiteral':
        case 'BoolLiteral':
          return expr.value;
        case 'NilLiteral':
          return null;
        case 'Identifier':
          return this.evaluateIdentifier(expr);
        case 'UnaryExpr':
          return this.evaluateUnary(expr);
        case 'BinaryExpr':
          return this.evaluateBinary(expr);
        case 'LogicalExpr':
          return this.evaluateLogical(expr);
        case 'ConditionalExpr':
          return this.evaluateConditional(expr);
        case 'Call':
          return this.evaluateCall(expr);
        case 'Index':
          return this.evaluateIndex(expr);
        case 'FieldAccess':
          return this.evaluateFieldAccess(expr);
        case 'GroupedExpr':
          return this.evaluateExpression(expr.expression);
        case 'TableLiteral':
          return this.evaluateTableLiteral(expr);
      }
    }

    executeStatement(stmt: StatementNode): Completion {
      switch (stmt.type) {
        case 'ExprStatement':
          return normal(this.evaluateExpression(stmt.expression));
        case 'Print':
          return this.executePrint(stmt);
        case 'Assign':
          return this.executeAssign(stmt);
        case 'Block':
          return this.executeBlock(stmt);
        case 'If':
          return this.executeIf(stmt);
        case 'For':
          return this.executeFor(stmt);
        case 'Break':
          return { type: 'break', span: stmt.span };
        case 'Continue':
          return { type: 'continue', span: stmt.span };
        case 'Return':
          return this.executeReturn(stmt);
        case 'FnDecl':
          return this.executeFnDecl(stmt);
        case 'Assert':
          return this.executeAssert(stmt);
      }
    }

    /**
     * Run statements in order in the active scope.
     * Stops at the first abrupt completion and hands it back; otherwise
     * completes with the value of the last statement.
     */
    executeStatements(statements: readonly StatementNode[]): Completion {
      let last: Completion = NORMAL;
      for (const stmt of statements) {
        last = this.executeStatement(stmt);
        if (isAbrupt(last)) return last;
      }
      return last;
    }
  };
}

export const CoreMixin = createCoreMixin;
