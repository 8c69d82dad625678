/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - scope, file and shared helpers
 * 2. LiteralsMixin - interpolated strings, arrays, hashes
 * 3. VariablesMixin - lookup, assignment, access
 * 4. ExpressionsMixin - binary and unary operators
 * 5. ControlFlowMixin - if, unless, case
 * 6. DeclarationsMixin - define, class, resources
 * 7. CallsMixin - host function calls
 * 8. CoreMixin - statement and expression dispatch (outermost)
 *
 * CoreMixin sits on top so that dispatch can reach every handler below it.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { CallsMixin } from './mixins/calls.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { CoreMixin } from './mixins/core.js';
import { DeclarationsMixin } from './mixins/declarations.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { LiteralsMixin } from './mixins/literals.js';
import { VariablesMixin } from './mixins/variables.js';

/**
 * Complete Evaluator class composed from all mixins.
 * Constructed with the scope to evaluate in and the file being evaluated:
 * `new Evaluator(scope, '/site/init.mf')`.
 */
export const Evaluator = CoreMixin(
  CallsMixin(
    DeclarationsMixin(
      ControlFlowMixin(
        ExpressionsMixin(VariablesMixin(LiteralsMixin(EvaluatorBase)))
      )
    )
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;
