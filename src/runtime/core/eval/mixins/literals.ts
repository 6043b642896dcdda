/**
 * LiteralsMixin: Table Literals
 *
 * Builds tables from `{...}` literals. Items are evaluated left to right;
 * positional items take keys 0, 1, 2, ... counting positional items only,
 * so `{10, x = 1, 20}` has keys 0, "x", 1. A later item with the same
 * key overwrites the earlier value in place.
 *
 * @internal
 */

import type { TableLiteralNode } from '../../../../types.js';
import { createTable, tableSet } from '../../table.js';
import type { FountainValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

function createLiteralsMixin(Base: EvaluatorConstructor) {
  return class LiteralsEvaluator extends Base {
    evaluateTableLiteral(node: TableLiteralNode): FountainValue {
      const table = createTable();
      let nextIndex = 0;

      for (const item of node.items) {
        switch (item.type) {
          case 'PositionalItem':
            tableSet(table, nextIndex++, this.evaluateExpression(item.value));
            break;
          case 'NamedItem':
            tableSet(table, item.name, this.evaluateExpression(item.value));
            break;
          case 'KeyedItem': {
            const key = this.evaluateExpression(item.key);
            tableSet(table, key, this.evaluateExpression(item.value));
            break;
          }
        }
      }

      return table;
    }
  };
}

export const LiteralsMixin = createLiteralsMixin;
