/**
 * Manifold Runtime
 * Public API for compiling manifests and extending the environment
 */

export { Catalog, resourceRef } from './core/catalog.js';
export type { CatalogData, CatalogResource } from './core/catalog.js';
export {
  validateHostFunctionArgs,
  type HostFunction,
  type HostFunctionDefinition,
  type HostFunctionParam,
} from './core/callable.js';
export {
  Compilation,
  createCompilation,
  DEFAULT_MAX_DEPTH,
} from './core/compilation.js';
export {
  compileFile,
  compileSource,
  type CompileResult,
} from './core/compiler.js';
export {
  createEnvironment,
  NATIVE_RESOURCE_TYPES,
  type EnvironmentOptions,
} from './core/environment.js';
export { compile, evaluateUnit, INLINE_FILE } from './core/execute.js';
export { Scope, type Definition } from './core/scope.js';
export type {
  CallerContext,
  CompilationOptions,
  Environment,
  HostCallEvent,
  IncludeEvent,
  IncludePhase,
  ObservabilityCallbacks,
  ResourceEvent,
} from './core/types.js';
export {
  deepEquals,
  formatValue,
  hashGet,
  hashSet,
  inferType,
  isHash,
  isTruthy,
  type ManifoldHash,
  type ManifoldTypeName,
  type ManifoldValue,
} from './core/values.js';
export { createBuiltinFunctions } from './ext/builtins.js';
