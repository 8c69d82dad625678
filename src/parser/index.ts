/**
 * Manifold Parser
 * Main entry points and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ManifestNode, UnitNode } from '../types.js';
import { Parser, type ParserOptions } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-manifest.js';
import './parser-control.js';
import './parser-declarations.js';
import './parser-functions.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a whole manifest. The result is the body of the implicit `main`
 * class and is meant to be handed to the compiler.
 *
 * Throws ParseError (or its LexerError subclass) on the first syntax error.
 *
 * @example
 * ```typescript
 * const ast = parse("notice('hello')", { file: '/site/init.mf' });
 * ```
 */
export function parse(source: string, options: ParserOptions = {}): ManifestNode {
  const tokens = tokenize(source, { file: options.file });
  return new Parser(tokens, options).parse();
}

/**
 * Parse one compilation unit for splicing into an existing scope.
 * Unlike `parse()`, the result carries no top-level semantics: it is never
 * wrapped in the main class and never triggers compilation.
 */
export function parseUnit(source: string, options: ParserOptions = {}): UnitNode {
  const tokens = tokenize(source, { file: options.file });
  return new Parser(tokens, options).parseCompilationUnit();
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { Parser, type ParserOptions } from './parser.js';
export { createParserState, type ParserEnvironment, type ParserState } from './state.js';
