/**
 * Execution Entry Points
 *
 * Evaluation of parsed manifests and units against a compilation.
 */

import type { ManifestNode, UnitNode } from '../../types.js';
import type { Catalog } from './catalog.js';
import type { Compilation } from './compilation.js';
import { Evaluator } from './eval/evaluator.js';
import type { Scope } from './scope.js';
import type { CallerContext } from './types.js';

/** File name given to manifests that were not read from a file */
export const INLINE_FILE = '<inline>';

/**
 * Evaluate a whole manifest as the body of the implicit `main` class in
 * the compilation's top scope.
 *
 * @returns the compilation's catalog
 */
export function compile(manifest: ManifestNode, compilation: Compilation): Catalog {
  compilation.catalog.addClass('main');
  const evaluator = new Evaluator(
    compilation.topScope,
    manifest.file ?? INLINE_FILE
  );
  evaluator.evaluateStatements(manifest.statements);
  return compilation.catalog;
}

/**
 * Evaluate the statements of a unit, in order, directly in `scope`.
 * No child scope is created and nothing is rolled back on failure.
 */
export function evaluateUnit(unit: UnitNode, scope: Scope): void {
  const evaluator = new Evaluator(scope, unit.file ?? INLINE_FILE);
  evaluator.evaluateStatements(unit.statements);
}

/** Evaluate a class on behalf of a host function call */
export function includeClass(name: string, caller: CallerContext): void {
  new Evaluator(caller.scope, caller.file).includeClass(name, caller.location);
}
