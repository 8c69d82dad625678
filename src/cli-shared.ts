/**
 * CLI Shared Utilities
 * Formatting and exit code helpers for the manifold-apply binary
 */

import * as yaml from 'yaml';
import type { CatalogData } from './runtime/index.js';
import {
  ConfigError,
  IncludeError,
  LexerError,
  ManifoldError,
  ParseError,
  RuntimeError,
} from './types.js';
import { VERSION } from './version.js';

export type OutputFormat = 'yaml' | 'json';

/** Raised for bad command-line usage; exits with code 2 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Render a compiled catalog for stdout
 */
export function formatCatalog(data: CatalogData, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(data, null, 2);
  }
  return yaml.stringify(data).trimEnd();
}

function errorKind(err: ManifoldError): string {
  if (err instanceof LexerError) return 'Lexer';
  if (err instanceof ParseError) return 'Parse';
  if (err instanceof RuntimeError) return 'Runtime';
  if (err instanceof IncludeError) return 'Include';
  if (err instanceof ConfigError) return 'Config';
  return 'Manifold';
}

/**
 * Format error for stderr output:
 * `Parse error in /site/init.mf at line 3: Syntax error at '}'`
 */
export function formatError(err: Error): string {
  if (err instanceof ManifoldError) {
    const kind = errorKind(err);
    const where = [
      err.file !== undefined ? ` in ${err.file}` : '',
      err.location !== undefined ? ` at line ${err.location.line}` : '',
    ].join('');
    return `${kind} error${where}: ${err.reason}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Exit code for a failed run: 2 for usage and configuration problems,
 * 1 for everything else
 */
export function determineExitCode(err: unknown): number {
  if (err instanceof UsageError || err instanceof ConfigError) {
    return 2;
  }
  return 1;
}

export { VERSION };
