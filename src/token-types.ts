import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING', // '...' (no interpolation)
  DQ_STRING: 'DQ_STRING', // "..." (raw content, parser handles escapes)
  NUMBER: 'NUMBER',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  UNDEF: 'UNDEF',

  // Names
  IDENTIFIER: 'IDENTIFIER', // may contain :: (ns::name)
  VARIABLE: 'VARIABLE', // $name, value excludes the $

  // Keywords
  IF: 'IF',
  ELSIF: 'ELSIF',
  ELSE: 'ELSE',
  UNLESS: 'UNLESS',
  CASE: 'CASE',
  DEFAULT: 'DEFAULT',
  DEFINE: 'DEFINE',
  CLASS: 'CLASS',
  AND: 'AND',
  OR: 'OR',
  NOT: 'NOT',
  IN: 'IN',

  // Operators
  ASSIGN: 'ASSIGN', // =
  FARROW: 'FARROW', // =>
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %
  BANG: 'BANG', // !

  // Delimiters
  COMMA: 'COMMA',
  SEMICOLON: 'SEMICOLON',
  COLON: 'COLON',
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACKET: 'LBRACKET',
  RBRACKET: 'RBRACKET',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',

  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}
