/**
 * Parser State
 * Token cursor and error construction shared by all parser modules
 */

import type {
  FunctionKind,
  SourceLocation,
  SourceSpan,
  Token,
  TokenType,
} from '../types.js';
import {
  ERROR_REGISTRY,
  ParseError,
  TOKEN_TYPES,
  renderMessage,
} from '../types.js';

/**
 * The part of a runtime environment the parser needs to validate calls.
 * Kept structural so the parser does not depend on the runtime.
 */
export interface ParserEnvironment {
  readonly functions: ReadonlyMap<string, { readonly type: FunctionKind }>;
}

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** File being parsed, attached to syntax errors */
  readonly file: string | undefined;
  /** When set, calls are checked against its function registry */
  readonly environment: ParserEnvironment | undefined;
}

export function createParserState(
  tokens: Token[],
  options: { file?: string | undefined; environment?: ParserEnvironment | undefined } = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    file: options.file,
    environment: options.environment,
  };
}

const EOF_TOKEN: Token = {
  type: TOKEN_TYPES.EOF,
  value: '',
  span: {
    start: { line: 1, column: 1, offset: 0 },
    end: { line: 1, column: 1, offset: 0 },
  },
};

export function current(state: ParserState): Token {
  return (
    state.tokens[state.pos] ?? state.tokens[state.tokens.length - 1] ?? EOF_TOKEN
  );
}

export function peek(state: ParserState, offset = 0): Token {
  return (
    state.tokens[state.pos + offset] ??
    state.tokens[state.tokens.length - 1] ??
    EOF_TOKEN
  );
}

export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Human-readable token text for error messages */
export function describeToken(token: Token): string {
  if (token.type === TOKEN_TYPES.EOF) return 'end of file';
  if (token.type === TOKEN_TYPES.VARIABLE) return `'$${token.value}'`;
  return `'${token.value}'`;
}

/** Build a ParseError from a registry id, rendering its template */
export function parseError(
  state: ParserState,
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): ParseError {
  const template = ERROR_REGISTRY.get(errorId)?.messageTemplate ?? '';
  return new ParseError(
    errorId,
    renderMessage(template, context),
    location,
    state.file,
    context
  );
}

export function unexpectedToken(state: ParserState, token = current(state)): ParseError {
  return parseError(
    state,
    'MF-P001',
    { token: describeToken(token) },
    token.span.start
  );
}

export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  const token = current(state);
  if (token.type !== type) {
    throw parseError(
      state,
      'MF-P004',
      { expected, actual: describeToken(token) },
      token.span.start
    );
  }
  return advance(state);
}

export function makeSpan(start: SourceLocation, end: SourceLocation): SourceSpan {
  return { start, end };
}

/** End location of the most recently consumed token */
export function previousEnd(state: ParserState): SourceLocation {
  return (state.tokens[state.pos - 1] ?? current(state)).span.end;
}
