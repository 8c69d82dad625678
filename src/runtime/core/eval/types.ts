/**
 * Evaluator mixin typing
 * @internal
 */

import type {
  AccessNode,
  ArrayLiteralNode,
  AssignmentNode,
  BinaryExprNode,
  CallNode,
  CaseNode,
  ClassNode,
  DefineNode,
  HashLiteralNode,
  IfNode,
  InterpolatedStringNode,
  ResourceNode,
  UnaryExprNode,
  UnlessNode,
  VariableNode,
} from '../../../types.js';
import type { ManifoldValue } from '../values.js';

/**
 * Constructor type accepted and returned by evaluator mixins.
 * Mixin classes must take a rest parameter of any[].
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<T = object> = new (...args: any[]) => T;

/** Node handlers the dispatching CoreMixin needs from the mixins below it */
export interface DispatchTargets {
  evaluateInterpolatedString(node: InterpolatedStringNode): string;
  evaluateArray(node: ArrayLiteralNode): ManifoldValue[];
  evaluateHash(node: HashLiteralNode): ManifoldValue;
  evaluateVariable(node: VariableNode): ManifoldValue;
  evaluateAssignment(node: AssignmentNode): void;
  evaluateAccess(node: AccessNode): ManifoldValue;
  evaluateBinaryExpr(node: BinaryExprNode): ManifoldValue;
  evaluateUnaryExpr(node: UnaryExprNode): ManifoldValue;
  evaluateIf(node: IfNode): void;
  evaluateUnless(node: UnlessNode): void;
  evaluateCase(node: CaseNode): void;
  evaluateDefine(node: DefineNode): void;
  evaluateClass(node: ClassNode): void;
  evaluateResource(node: ResourceNode): void;
  evaluateCall(node: CallNode): ManifoldValue;
}
