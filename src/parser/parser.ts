/**
 * Parser Class - Core
 *
 * Methods are added via prototype extension from separate modules, using
 * declaration merging for type safety:
 * - parser-manifest.ts: manifests, units, statement dispatch, blocks
 * - parser-control.ts: if, unless, case
 * - parser-declarations.ts: define, class, resource declarations
 * - parser-functions.ts: function calls and environment checks
 * - parser-expr.ts: precedence chain, access, primaries
 * - parser-literals.ts: strings, interpolation, arrays, hashes
 */

import type { ManifestNode, Token, UnitNode } from '../types.js';
import {
  createParserState,
  type ParserEnvironment,
  type ParserState,
} from './state.js';

export interface ParserOptions {
  /** Source file, recorded on the AST and on syntax errors */
  file?: string | undefined;
  /** Function registry used to reject unknown or misused calls */
  environment?: ParserEnvironment | undefined;
}

export class Parser {
  state: ParserState;

  constructor(tokens: Token[], options: ParserOptions = {}) {
    this.state = createParserState(tokens, options);
  }

  /** Whole program: the body of the implicit main class */
  parse(): ManifestNode {
    return this.parseManifest();
  }

  /** Single compilation unit with no top-level semantics */
  parseCompilationUnit(): UnitNode {
    return this.parseUnitBody();
  }
}
