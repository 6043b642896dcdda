/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities and context access for all mixins.
 *
 * @internal
 */

import type {
  AssignNode,
  ASTNode,
  BinaryExprNode,
  BlockNode,
  CallNode,
  ConditionalExprNode,
  ExpressionNode,
  FieldAccessNode,
  FnDeclNode,
  ForNode,
  IdentifierNode,
  IfNode,
  IndexNode,
  LogicalExprNode,
  NamedArgNode,
  SourceLocation,
  SourceSpan,
  StatementNode,
  TableLiteralNode,
  UnaryExprNode,
  AssertNode,
  PrintNode,
  ReturnNode,
} from '../../../types.js';
import type { FountainCallable } from '../callable.js';
import type { Completion } from '../signals.js';
import type { RuntimeContext } from '../types.js';
import type { FountainValue } from '../values.js';

/**
 * Methods contributed by the mixins.
 *
 * Declared on the base so any mixin can call into any other regardless of
 * composition order; the composed Evaluator supplies every implementation.
 */
export interface EvaluatorBase {
  // CoreMixin
  evaluateExpression(expr: ExpressionNode): FountainValue;
  executeStatement(stmt: StatementNode): Completion;
  executeStatements(statements: readonly StatementNode[]): Completion;

  // LiteralsMixin
  evaluateTableLiteral(node: TableLiteralNode): FountainValue;

  // VariablesMixin
  evaluateIdentifier(node: IdentifierNode): FountainValue;
  evaluateIndex(node: IndexNode): FountainValue;
  evaluateFieldAccess(node: FieldAccessNode): FountainValue;
  executeAssign(node: AssignNode): Completion;

  // ExpressionsMixin
  evaluateUnary(node: UnaryExprNode): FountainValue;
  evaluateBinary(node: BinaryExprNode): FountainValue;
  evaluateLogical(node: LogicalExprNode): FountainValue;
  evaluateConditional(node: ConditionalExprNode): FountainValue;
  applyBinaryOperator(
    op: BinaryExprNode['op'],
    left: FountainValue,
    right: FountainValue,
    location?: SourceLocation
  ): FountainValue;

  // ControlFlowMixin
  executeBlock(node: BlockNode): Completion;
  executeIf(node: IfNode): Completion;
  executeFor(node: ForNode): Completion;
  executePrint(node: PrintNode): Completion;
  executeAssert(node: AssertNode): Completion;
  executeReturn(node: ReturnNode): Completion;

  // ClosuresMixin
  executeFnDecl(node: FnDeclNode): Completion;
  evaluateCall(node: CallNode): FountainValue;
  evaluateNamedArgs(namedArgs: readonly NamedArgNode[]): [string, FountainValue][];
  invokeCallable(
    callee: FountainCallable,
    args: readonly FountainValue[],
    namedArgs: ReadonlyArray<readonly [string, FountainValue]>,
    callSite: SourceSpan
  ): FountainValue;
}

/**
 * Base class for the evaluator.
 * Holds the active scope; mixins swap it while running nested code.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class EvaluatorBase {
  constructor(public ctx: RuntimeContext) {}

  /**
   * Get source location from an AST node.
   * Used for error reporting with precise location information.
   */
  getNodeLocation(node?: ASTNode): SourceLocation | undefined {
    return node?.span.start;
  }

  /**
   * Run `fn` with `scope` as the active context, restoring the previous
   * context afterwards even when `fn` throws.
   */
  withScope<T>(scope: RuntimeContext, fn: () => T): T {
    const saved = this.ctx;
    this.ctx = scope;
    try {
      return fn();
    } finally {
      this.ctx = saved;
    }
  }
}
