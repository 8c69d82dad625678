/**
 * Scope Splicer
 */

import type { UnitNode } from '../types.js';
import { evaluateUnit } from '../runtime/core/execute.js';
import type { Scope } from '../runtime/core/scope.js';

/**
 * Evaluate an included unit as if its text stood at the call site.
 *
 * Statements run in order directly in `scope`: assignments, definitions
 * and resources land where the caller's own statements would put them.
 * Errors propagate unchanged and earlier statements keep their effects.
 */
export function spliceAndEvaluate(unit: UnitNode, scope: Scope): void {
  evaluateUnit(unit, scope);
}
