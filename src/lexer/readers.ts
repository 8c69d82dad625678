/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import {
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Single-quoted string. Only \\ and \' are escapes; any other backslash
 * is kept literally. May span lines.
 */
export function readSingleQuoted(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening '

  let value = '';
  while (!isAtEnd(state) && peek(state) !== "'") {
    if (peek(state) === '\\' && (peek(state, 1) === "'" || peek(state, 1) === '\\')) {
      advance(state); // consume backslash
    }
    value += advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError(
      'MF-L001',
      'Unterminated string literal',
      start,
      state.file
    );
  }
  advance(state); // consume closing '

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

/**
 * Double-quoted string. The raw content is kept (escapes and $ included);
 * the parser resolves escapes and interpolation.
 */
export function readDoubleQuoted(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    if (peek(state) === '\\' && peek(state, 1) !== '') {
      value += advance(state); // keep backslash
    }
    value += advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError(
      'MF-L001',
      'Unterminated string literal',
      start,
      state.file
    );
  }
  advance(state); // consume closing "

  return makeToken(TOKEN_TYPES.DQ_STRING, value, start, currentLocation(state));
}

export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state); // consume .
    while (!isAtEnd(state) && isDigit(peek(state))) {
      value += advance(state);
    }
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

/** Read name segments joined by `::` (ns::sub::name) */
function readQualifiedName(state: LexerState): string {
  let value = '';

  for (;;) {
    while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
      value += advance(state);
    }
    if (
      peek(state) === ':' &&
      peek(state, 1) === ':' &&
      isIdentifierStart(peek(state, 2))
    ) {
      value += advance(state) + advance(state);
      continue;
    }
    return value;
  }
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const value = readQualifiedName(state);
  const type = KEYWORDS.get(value) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}

/** $name, $ns::name or $::name (top scope) */
export function readVariable(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume $

  let prefix = '';
  if (peek(state) === ':' && peek(state, 1) === ':') {
    prefix = advance(state) + advance(state);
  }

  if (!isIdentifierStart(peek(state))) {
    throw new LexerError(
      'MF-L002',
      "Unexpected character '$'",
      start,
      state.file,
      { char: '$' }
    );
  }

  const name = prefix + readQualifiedName(state);
  return makeToken(TOKEN_TYPES.VARIABLE, name, start, currentLocation(state));
}
