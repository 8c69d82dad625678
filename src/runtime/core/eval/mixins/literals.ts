/**
 * LiteralsMixin: Strings and Collections
 *
 * Interpolated strings, array literals and hash literals.
 *
 * @internal
 */

import type {
  ArrayLiteralNode,
  HashLiteralNode,
  InterpolatedStringNode,
} from '../../../../types.js';
import type { ManifoldHash, ManifoldValue } from '../../values.js';
import { formatValue, hashSet, inferType } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

export function LiteralsMixin<TBase extends EvaluatorConstructor<EvaluatorBase>>(
  Base: TBase
) {
  return class LiteralsEvaluator extends Base {
    /** "text $var" - undef interpolates as the empty string */
    evaluateInterpolatedString(node: InterpolatedStringNode): string {
      return node.parts
        .map((part) =>
          typeof part === 'string'
            ? part
            : formatValue(this.evaluateExpression(part))
        )
        .join('');
    }

    evaluateArray(node: ArrayLiteralNode): ManifoldValue[] {
      return node.elements.map((element) => this.evaluateExpression(element));
    }

    /** Keys must evaluate to strings or numbers; numbers are stringified */
    evaluateHash(node: HashLiteralNode): ManifoldHash {
      const hash: ManifoldHash = {};
      for (const entry of node.entries) {
        const key = this.evaluateExpression(entry.key);
        if (typeof key !== 'string' && typeof key !== 'number') {
          throw this.runtimeError(
            'MF-R008',
            `Operator {} is not applicable to ${inferType(key)} keys`,
            entry.key,
            { op: '{}', problem: `is not applicable to ${inferType(key)} keys` }
          );
        }
        hashSet(hash, String(key), this.evaluateExpression(entry.value));
      }
      return hash;
    }
  };
}
