/**
 * ExpressionsMixin: Operators
 *
 * Handles unary, binary, logical and conditional expressions.
 *
 * - Arithmetic and ordering operators take numbers only; `/` follows
 *   IEEE-754, so `1 / 0` is inf and `0 / 0` is nan
 * - `==` and `!=` never coerce; tables and functions compare by identity
 * - `and` / `or` short-circuit and yield an operand, not a bool
 *
 * Error Handling:
 * - Operand kind mismatches throw FountainTypeError (FTN-R001)
 *
 * @internal
 */

import type {
  BinaryExprNode,
  BinaryOp,
  ConditionalExprNode,
  LogicalExprNode,
  SourceLocation,
  UnaryExprNode,
} from '../../../../types.js';
import { FountainTypeError } from '../../../../types.js';
import {
  inferType,
  isTruthy,
  valuesEqual,
  type FountainValue,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

function unsupportedOperands(
  operator: string,
  operands: readonly FountainValue[],
  location?: SourceLocation
): FountainTypeError {
  const types = operands.map(inferType).join(', ');
  return new FountainTypeError(
    'FTN-R001',
    `Unsupported operand type(s) for '${operator}': ${types}`,
    location,
    { operator, types }
  );
}

function createExpressionsMixin(Base: EvaluatorConstructor) {
  return class ExpressionsEvaluator extends Base {
    evaluateUnary(node: UnaryExprNode): FountainValue {
      const operand = this.evaluateExpression(node.operand);
      if (node.op === 'not') return !isTruthy(operand);
      if (typeof operand !== 'number') {
        throw unsupportedOperands('-', [operand], this.getNodeLocation(node));
      }
      return -operand;
    }

    evaluateBinary(node: BinaryExprNode): FountainValue {
      const left = this.evaluateExpression(node.left);
      const right = this.evaluateExpression(node.right);
      return this.applyBinaryOperator(
        node.op,
        left,
        right,
        this.getNodeLocation(node)
      );
    }

    applyBinaryOperator(
      op: BinaryOp,
      left: FountainValue,
      right: FountainValue,
      location?: SourceLocation
    ): FountainValue {
      if (op === '==') return valuesEqual(left, right);
      if (op === '!=') return !valuesEqual(left, right);

      if (typeof left !== 'number' || typeof right !== 'number') {
        throw unsupportedOperands(op, [left, right], location);
      }

      switch (op) {
        case '+':
          return left + right;
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '/':
          return left / right;
        case '<':
          return left < right;
        case '<=':
          return left <= right;
        case '>':
          return left > right;
        case '>=':
          return left >= right;
      }
    }

    evaluateLogical(node: LogicalExprNode): FountainValue {
      const left = this.evaluateExpression(node.left);
      if (node.op === 'and') {
        return isTruthy(left) ? this.evaluateExpression(node.right) : left;
      }
      return isTruthy(left) ? left : this.evaluateExpression(node.right);
    }

    evaluateConditional(node: ConditionalExprNode): FountainValue {
      return isTruthy(this.evaluateExpression(node.condition))
        ? this.evaluateExpression(node.thenBranch)
        : this.evaluateExpression(node.elseBranch);
    }
  };
}

export const ExpressionsMixin = createExpressionsMixin;
