/**
 * Manifold Types
 * Source locations, tokens, AST nodes and the error hierarchy.
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './ast-nodes.js';
export * from './error-registry.js';
export * from './error-classes.js';
