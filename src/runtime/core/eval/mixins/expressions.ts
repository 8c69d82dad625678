/**
 * ExpressionsMixin: Binary and Unary Expressions
 *
 * Handles arithmetic, comparison, membership and logical operators.
 *
 * Error Handling:
 * - Operand type mismatches throw RuntimeError MF-R008
 *
 * @internal
 */

import type {
  BinaryExprNode,
  BinaryOp,
  ExpressionNode,
  UnaryExprNode,
} from '../../../../types.js';
import type { ManifoldValue } from '../../values.js';
import { deepEquals, inferType, isHash, isTruthy } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

export function ExpressionsMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase>,
>(Base: TBase) {
  return class ExpressionsEvaluator extends Base {
    evaluateBinaryExpr(node: BinaryExprNode): ManifoldValue {
      const { op } = node;

      // Logical operators with short-circuit evaluation
      if (op === 'or') {
        if (isTruthy(this.evaluateExpression(node.left))) return true;
        return isTruthy(this.evaluateExpression(node.right));
      }
      if (op === 'and') {
        if (!isTruthy(this.evaluateExpression(node.left))) return false;
        return isTruthy(this.evaluateExpression(node.right));
      }

      const left = this.evaluateExpression(node.left);
      const right = this.evaluateExpression(node.right);

      switch (op) {
        case '==':
          return deepEquals(left, right);
        case '!=':
          return !deepEquals(left, right);
        case '<':
        case '>':
        case '<=':
        case '>=':
          return this.compareValues(op, left, right, node);
        case 'in':
          return this.evaluateIn(left, right, node);
        case '+':
          if (Array.isArray(left) && Array.isArray(right)) {
            return [...left, ...right];
          }
          if (isHash(left) && isHash(right)) {
            return { ...left, ...right };
          }
          return this.arithmetic(op, left, right, node);
        default:
          return this.arithmetic(op, left, right, node);
      }
    }

    evaluateUnaryExpr(node: UnaryExprNode): ManifoldValue {
      const operand = this.evaluateExpression(node.operand);

      if (node.op === '!') {
        return !isTruthy(operand);
      }

      if (typeof operand !== 'number') {
        throw this.operatorError('-', `is not applicable to ${inferType(operand)}`, node.operand);
      }
      return -operand;
    }

    /** Numbers compare numerically, strings lexically; no mixing */
    protected compareValues(
      op: '<' | '>' | '<=' | '>=',
      left: ManifoldValue,
      right: ManifoldValue,
      node: BinaryExprNode
    ): boolean {
      let order: number;
      if (typeof left === 'number' && typeof right === 'number') {
        order = left - right;
      } else if (typeof left === 'string' && typeof right === 'string') {
        order = left < right ? -1 : left > right ? 1 : 0;
      } else {
        throw this.operatorError(
          op,
          `is not applicable to ${inferType(left)} and ${inferType(right)}`,
          node
        );
      }

      switch (op) {
        case '<':
          return order < 0;
        case '>':
          return order > 0;
        case '<=':
          return order <= 0;
        case '>=':
          return order >= 0;
      }
    }

    /** Array element, hash key or substring membership */
    protected evaluateIn(
      needle: ManifoldValue,
      haystack: ManifoldValue,
      node: BinaryExprNode
    ): boolean {
      if (Array.isArray(haystack)) {
        return haystack.some((item) => deepEquals(item, needle));
      }
      if (isHash(haystack) && typeof needle === 'string') {
        return Object.prototype.hasOwnProperty.call(haystack, needle);
      }
      if (typeof haystack === 'string' && typeof needle === 'string') {
        return haystack.includes(needle);
      }
      throw this.operatorError(
        'in',
        `is not applicable to ${inferType(needle)} and ${inferType(haystack)}`,
        node
      );
    }

    protected arithmetic(
      op: Exclude<BinaryOp, 'or' | 'and' | '==' | '!=' | '<' | '>' | '<=' | '>=' | 'in'>,
      left: ManifoldValue,
      right: ManifoldValue,
      node: BinaryExprNode
    ): number {
      if (typeof left !== 'number' || typeof right !== 'number') {
        throw this.operatorError(
          op,
          `is not applicable to ${inferType(left)} and ${inferType(right)}`,
          node
        );
      }

      switch (op) {
        case '+':
          return left + right;
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '/':
        case '%':
          if (right === 0) {
            throw this.operatorError(op, 'cannot divide by zero', node.right);
          }
          return op === '/' ? left / right : left % right;
      }
    }

    protected operatorError(op: string, problem: string, node: ExpressionNode) {
      return this.runtimeError('MF-R008', `Operator ${op} ${problem}`, node, {
        op,
        problem,
      });
    }
  };
}
