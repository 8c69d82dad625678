/**
 * CoreMixin: Statement and Expression Dispatch
 *
 * Outermost mixin. Routes each AST node to the handler provided by the
 * mixins below it and evaluates plain literals directly.
 *
 * @internal
 */

import type { ExpressionNode, StatementNode } from '../../../../types.js';
import type { ManifoldValue } from '../../values.js';
import type { DispatchTargets, EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

export function CoreMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase & DispatchTargets>,
>(Base: TBase) {
  return class CoreEvaluator extends Base {
    override evaluateStatement(node: StatementNode): void {
      switch (node.type) {
        case 'Assignment':
          return this.evaluateAssignment(node);
        case 'Call':
          this.evaluateCall(node);
          return;
        case 'If':
          return this.evaluateIf(node);
        case 'Unless':
          return this.evaluateUnless(node);
        case 'Case':
          return this.evaluateCase(node);
        case 'Define':
          return this.evaluateDefine(node);
        case 'Class':
          return this.evaluateClass(node);
        case 'Resource':
          return this.evaluateResource(node);
      }
    }

    override evaluateExpression(node: ExpressionNode): ManifoldValue {
      switch (node.type) {
        case 'StringLiteral':
        case 'NumberLiteral':
        case 'BoolLiteral':
        case 'BareWord':
          return node.value;
        case 'UndefLiteral':
          return null;
        case 'InterpolatedString':
          return this.evaluateInterpolatedString(node);
        case 'ArrayLiteral':
          return this.evaluateArray(node);
        case 'HashLiteral':
          return this.evaluateHash(node);
        case 'Variable':
          return this.evaluateVariable(node);
        case 'Access':
          return this.evaluateAccess(node);
        case 'Call':
          return this.evaluateCall(node);
        case 'UnaryExpr':
          return this.evaluateUnaryExpr(node);
        case 'BinaryExpr':
          return this.evaluateBinaryExpr(node);
      }
    }
  };
}
