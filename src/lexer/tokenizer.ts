/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import {
  readDoubleQuoted,
  readIdentifier,
  readNumber,
  readSingleQuoted,
  readVariable,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

export interface TokenizeOptions {
  /** File name attached to lexer errors */
  file?: string | undefined;
}

/** Skip whitespace and comments; returns when a token starts or input ends */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);

    if (isWhitespace(ch)) {
      advance(state);
    } else if (ch === '#') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
    } else if (ch === '/' && peek(state, 1) === '*') {
      const start = currentLocation(state);
      advance(state);
      advance(state);
      while (!(peek(state) === '*' && peek(state, 1) === '/')) {
        if (isAtEnd(state)) {
          throw new LexerError(
            'MF-L003',
            'Unterminated block comment',
            start,
            state.file
          );
        }
        advance(state);
      }
      advance(state);
      advance(state);
    } else {
      return;
    }
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === "'") {
    return readSingleQuoted(state);
  }

  if (ch === '"') {
    return readDoubleQuoted(state);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  if (ch === '$') {
    return readVariable(state);
  }

  // Two-character operators (lookup table)
  const twoChar = ch + peek(state, 1);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw new LexerError(
    'MF-L002',
    `Unexpected character '${ch}'`,
    start,
    state.file,
    { char: ch }
  );
}

export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
  const state = createLexerState(source, options.file);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
