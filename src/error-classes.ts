/**
 * Manifold Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { formatLocation } from './source-location.js';
import type { SourceLocation, SourceSpan } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ManifoldErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  /** File the error occurred in, when the source came from a file */
  readonly file?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function requireCategory(
  errorId: string,
  allowed: readonly ErrorCategory[],
  kind: string
): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (!allowed.includes(definition.category)) {
    throw new TypeError(`Expected ${kind} error ID, got: ${errorId}`);
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Manifold errors.
 * Provides structured data for host applications to format as needed.
 */
export class ManifoldError extends Error {
  readonly errorId: string;
  readonly location: SourceLocation | undefined;
  readonly file: string | undefined;
  readonly context: Record<string, unknown> | undefined;
  /** Message without the location suffix */
  readonly reason: string;

  constructor(data: ManifoldErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    let where = '';
    if (data.location) {
      where = ` at ${formatLocation(data.location, data.file)}`;
    } else if (data.file) {
      where = ` in ${data.file}`;
    }
    super(`${data.message}${where}`);
    this.name = 'ManifoldError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.file = data.file;
    this.context = data.context;
    this.reason = data.message;
  }

  /** Get structured error data for custom formatting */
  toData(): ManifoldErrorData {
    return {
      errorId: this.errorId,
      message: this.reason,
      location: this.location,
      file: this.file,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ManifoldErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Syntax errors. Raised by the parser, and by the lexer through the
 * LexerError subclass, so a single `instanceof ParseError` covers both.
 */
export class ParseError extends ManifoldError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    file?: string,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, ['parse', 'lexer'], 'parse');
    super({ errorId, message, location, file, context });
    this.name = 'ParseError';
  }
}

export class LexerError extends ParseError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    file?: string,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, ['lexer'], 'lexer');
    super(errorId, message, location, file, context);
    this.name = 'LexerError';
  }
}

/** Evaluation errors */
export class RuntimeError extends ManifoldError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    file?: string,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, ['runtime'], 'runtime');
    super({ errorId, message, location, file, context });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    message: string,
    node?: { span: SourceSpan },
    file?: string,
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(errorId, message, node?.span.start, file, context);
  }
}

/** Base class for failures of include_file before evaluation starts */
export class IncludeError extends ManifoldError {
  /** The include path as given, or as resolved for file errors */
  readonly path: string;

  constructor(
    errorId: string,
    context: { path: string } & Record<string, unknown>,
    location?: SourceLocation,
    file?: string
  ) {
    requireCategory(errorId, ['include'], 'include');
    const definition = ERROR_REGISTRY.get(errorId);
    const message = renderMessage(definition?.messageTemplate ?? '', context);
    super({ errorId, message, location, file, context });
    this.name = 'IncludeError';
    this.path = context.path;
  }
}

export class InvalidPathError extends IncludeError {
  constructor(
    path: string,
    reason: string,
    location?: SourceLocation,
    file?: string
  ) {
    super('MF-I001', { path, reason }, location, file);
    this.name = 'InvalidPathError';
  }
}

export class FileNotFoundError extends IncludeError {
  constructor(path: string, reason: string) {
    super('MF-I002', { path, reason });
    this.name = 'FileNotFoundError';
  }
}

export class EmptyFileError extends IncludeError {
  constructor(path: string) {
    super('MF-I003', { path });
    this.name = 'EmptyFileError';
  }
}

/** Configuration file errors */
export class ConfigError extends ManifoldError {
  constructor(reason: string, file?: string) {
    super({
      errorId: 'MF-C001',
      message: renderMessage(
        ERROR_REGISTRY.get('MF-C001')?.messageTemplate ?? '',
        { reason }
      ),
      file,
      context: { reason },
    });
    this.name = 'ConfigError';
  }
}
