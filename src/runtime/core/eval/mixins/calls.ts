/**
 * CallsMixin: Host Function Calls
 *
 * Evaluates arguments, validates them against the function definition
 * and invokes the host function with a CallerContext describing the
 * call site.
 *
 * Error Handling:
 * - Unknown functions and misplaced calls throw MF-R001 (the parser
 *   reports the same problems earlier when it has an environment)
 * - Nesting beyond maxDepth throws MF-R010
 *
 * @internal
 */

import type { CallNode } from '../../../../types.js';
import { validateHostFunctionArgs } from '../../callable.js';
import type { CallerContext } from '../../types.js';
import type { ManifoldValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

export function CallsMixin<TBase extends EvaluatorConstructor<EvaluatorBase>>(
  Base: TBase
) {
  return class CallsEvaluator extends Base {
    evaluateCall(node: CallNode): ManifoldValue {
      const { environment, observability } = this.compilation;
      const definition = environment.functions.get(node.name);

      if (!definition) {
        throw this.runtimeError(
          'MF-R001',
          `Function ${node.name} is not defined`,
          node,
          { name: node.name, problem: 'is not defined' }
        );
      }
      if (definition.type !== node.kind) {
        const problem =
          node.kind === 'statement'
            ? 'must be the value of a statement'
            : 'does not return a value';
        throw this.runtimeError(
          'MF-R001',
          `Function ${node.name} ${problem}`,
          node,
          { name: node.name, problem }
        );
      }

      const location = node.span.start;
      const args = validateHostFunctionArgs(
        node.args.map((arg) => this.evaluateExpression(arg)),
        definition,
        node.name,
        location,
        this.file
      );

      const caller: CallerContext = {
        file: this.file,
        line: node.span.start.line,
        location: node.span.start,
        environment,
        scope: this.scope,
        compilation: this.compilation,
      };

      observability.onHostCall?.({
        name: node.name,
        file: caller.file,
        line: caller.line,
      });

      return this.compilation.nested(
        () => definition.fn(args, caller),
        location,
        this.file
      );
    }
  };
}
