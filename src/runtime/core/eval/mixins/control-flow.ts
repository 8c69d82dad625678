/**
 * ControlFlowMixin: Conditionals
 *
 * if/elsif/else, unless/else and case. Branch bodies run in the current
 * scope; conditionals do not open a scope of their own.
 *
 * @internal
 */

import type { CaseNode, IfNode, UnlessNode } from '../../../../types.js';
import { deepEquals, isTruthy } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

export function ControlFlowMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase>,
>(Base: TBase) {
  return class ControlFlowEvaluator extends Base {
    evaluateIf(node: IfNode): void {
      for (const branch of node.branches) {
        if (isTruthy(this.evaluateExpression(branch.condition))) {
          this.evaluateStatements(branch.body);
          return;
        }
      }
      if (node.otherwise) {
        this.evaluateStatements(node.otherwise);
      }
    }

    evaluateUnless(node: UnlessNode): void {
      if (!isTruthy(this.evaluateExpression(node.condition))) {
        this.evaluateStatements(node.body);
      } else if (node.otherwise) {
        this.evaluateStatements(node.otherwise);
      }
    }

    /**
     * First clause with a matching value wins. The default clause runs
     * only when nothing matched, wherever it appears.
     */
    evaluateCase(node: CaseNode): void {
      const subject = this.evaluateExpression(node.subject);

      for (const clause of node.clauses) {
        if (clause.isDefault) continue;
        const matched = clause.matches.some((match) =>
          deepEquals(this.evaluateExpression(match), subject)
        );
        if (matched) {
          this.evaluateStatements(clause.body);
          return;
        }
      }

      const fallback = node.clauses.find((clause) => clause.isDefault);
      if (fallback) {
        this.evaluateStatements(fallback.body);
      }
    }
  };
}
