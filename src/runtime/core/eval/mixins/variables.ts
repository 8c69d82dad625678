/**
 * VariablesMixin: Variable Resolution and Access
 *
 * Variable lookup through the scope chain, single assignment and
 * indexed access on arrays and hashes.
 *
 * Error Handling:
 * - Unassigned variables are undef, or MF-R002 with strictVariables
 * - Reassignment in the same scope throws MF-R003
 *
 * @internal
 */

import type {
  AccessNode,
  AssignmentNode,
  VariableNode,
} from '../../../../types.js';
import type { ManifoldValue } from '../../values.js';
import { hashGet, inferType, isHash } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

export function VariablesMixin<TBase extends EvaluatorConstructor<EvaluatorBase>>(
  Base: TBase
) {
  return class VariablesEvaluator extends Base {
    evaluateVariable(node: VariableNode): ManifoldValue {
      const value = this.scope.lookup(node.name);
      if (value !== undefined) return value;

      if (this.compilation.strictVariables) {
        throw this.runtimeError(
          'MF-R002',
          `Unknown variable: $${node.name}`,
          node,
          { name: node.name }
        );
      }
      return null;
    }

    evaluateAssignment(node: AssignmentNode): void {
      if (node.name.includes('::')) {
        throw this.runtimeError(
          'MF-R003',
          `Cannot reassign variable $${node.name}: qualified names are read-only`,
          node,
          { name: `$${node.name}` }
        );
      }
      const value = this.evaluateExpression(node.value);
      this.scope.setVariable(
        node.name,
        value,
        this.getNodeLocation(node),
        this.file
      );
    }

    /**
     * $array[index] or $hash[key]. Negative indexes count from the end;
     * a missing element is undef.
     */
    evaluateAccess(node: AccessNode): ManifoldValue {
      const target = this.evaluateExpression(node.target);
      const key = this.evaluateExpression(node.key);

      if (Array.isArray(target)) {
        if (typeof key !== 'number' || !Number.isInteger(key)) {
          throw this.runtimeError(
            'MF-R008',
            `Operator [] expects an integer index, got ${inferType(key)}`,
            node.key,
            { op: '[]', problem: `expects an integer index, got ${inferType(key)}` }
          );
        }
        const index = key < 0 ? target.length + key : key;
        return target[index] ?? null;
      }

      if (isHash(target)) {
        if (typeof key !== 'string' && typeof key !== 'number') {
          throw this.runtimeError(
            'MF-R008',
            `Operator [] expects a string key, got ${inferType(key)}`,
            node.key,
            { op: '[]', problem: `expects a string key, got ${inferType(key)}` }
          );
        }
        return hashGet(target, String(key)) ?? null;
      }

      throw this.runtimeError(
        'MF-R008',
        `Operator [] is not applicable to ${inferType(target)}`,
        node,
        { op: '[]', problem: `is not applicable to ${inferType(target)}` }
      );
    }
  };
}
