/**
 * VariablesMixin: Variable Access and Mutation
 *
 * Handles reads through the scope chain, table indexing and field access,
 * and assignment (plain and compound) to names, indexes and fields.
 *
 * Error Handling:
 * - Reading an unbound name throws UndefinedNameError (FTN-R005)
 * - Indexing or assigning into a non-table throws FountainTypeError (FTN-R003)
 *
 * @internal
 */

import type {
  ArithmeticOp,
  AssignNode,
  AssignOp,
  FieldAccessNode,
  IdentifierNode,
  IndexNode,
  SourceLocation,
} from '../../../../types.js';
import { FountainTypeError, UndefinedNameError } from '../../../../types.js';
import { assignVariable, getVariable } from '../../context.js';
import type { Completion } from '../../signals.js';
import { normal } from '../../signals.js';
import { isTable, tableGet, tableSet, type FountainTable } from '../../table.js';
import { inferType, type FountainValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

const COMPOUND_OPERATORS: Record<Exclude<AssignOp, '='>, ArithmeticOp> = {
  '+=': '+',
  '-=': '-',
  '*=': '*',
  '/=': '/',
};

function requireTable(
  value: FountainValue,
  location?: SourceLocation
): FountainTable {
  if (!isTable(value)) {
    const type = inferType(value);
    throw new FountainTypeError(
      'FTN-R003',
      `Cannot index ${type}`,
      location,
      { type }
    );
  }
  return value;
}

function createVariablesMixin(Base: EvaluatorConstructor) {
  return class VariablesEvaluator extends Base {
    evaluateIdentifier(node: IdentifierNode): FountainValue {
      const value = getVariable(this.ctx, node.name);
      if (value === undefined) {
        throw new UndefinedNameError(node.name, this.getNodeLocation(node));
      }
      return value;
    }

    evaluateIndex(node: IndexNode): FountainValue {
      const object = this.evaluateExpression(node.object);
      const key = this.evaluateExpression(node.key);
      return tableGet(requireTable(object, this.getNodeLocation(node)), key);
    }

    evaluateFieldAccess(node: FieldAccessNode): FountainValue {
      const object = this.evaluateExpression(node.object);
      return tableGet(requireTable(object, this.getNodeLocation(node)), node.name);
    }

    /**
     * Assign to a name, index or field.
     * For table targets the table and key are evaluated before the value.
     * Completes with the stored value.
     */
    executeAssign(node: AssignNode): Completion {
      const { target } = node;
      const location = this.getNodeLocation(node);

      if (target.type === 'Identifier') {
        const value = this.combine(
          node,
          () => this.evaluateIdentifier(target),
          location
        );
        assignVariable(this.ctx, target.name, value);
        this.ctx.observability.onAssign?.({ name: target.name, value });
        return normal(value);
      }

      const table = requireTable(
        this.evaluateExpression(target.object),
        this.getNodeLocation(target)
      );
      const key =
        target.type === 'Index'
          ? this.evaluateExpression(target.key)
          : target.name;
      const value = this.combine(node, () => tableGet(table, key), location);
      tableSet(table, key, value);
      return normal(value);
    }

    /**
     * Evaluate the right-hand side; for compound operators, fold it into
     * the current value read by `current`.
     */
    combine(
      node: AssignNode,
      current: () => FountainValue,
      location?: SourceLocation
    ): FountainValue {
      if (node.op === '=') return this.evaluateExpression(node.value);
      const left = current();
      const right = this.evaluateExpression(node.value);
      return this.applyBinaryOperator(
        COMPOUND_OPERATORS[node.op],
        left,
        right,
        location
      );
    }
  };
}

export const VariablesMixin = createVariablesMixin;
