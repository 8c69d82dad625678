/**
 * Parser Helpers
 * Lookahead predicates
 * @internal
 */

import type { Token, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

const PARENLESS_ARG_STARTS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.DQ_STRING,
  TOKEN_TYPES.VARIABLE,
  TOKEN_TYPES.NUMBER,
  TOKEN_TYPES.LBRACKET,
  TOKEN_TYPES.TRUE,
  TOKEN_TYPES.FALSE,
  TOKEN_TYPES.UNDEF,
  TOKEN_TYPES.IDENTIFIER,
]);

/**
 * Token after a name that makes `name arg, ...` a paren-less statement call:
 * include_file 'common.mf', include base
 * @internal
 */
export function startsParenlessArgs(type: TokenType): boolean {
  return PARENLESS_ARG_STARTS.has(type);
}

/**
 * Word usable as an attribute name. Keywords count: exec resources take
 * an `unless` attribute.
 * @internal
 */
export function isWordToken(token: Token): boolean {
  switch (token.type) {
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.DQ_STRING:
    case TOKEN_TYPES.VARIABLE:
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.EOF:
      return false;
    default:
      return /^[A-Za-z_]/.test(token.value);
  }
}

/**
 * `[` directly attached to the previous token is an access; with space
 * before it, it starts an array.
 * @internal
 */
export function isAdjacent(previous: Token, next: Token): boolean {
  return previous.span.end.offset === next.span.start.offset;
}
