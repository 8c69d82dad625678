/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '=>': TOKEN_TYPES.FARROW,
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '!': TOKEN_TYPES.BANG,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
  ':': TOKEN_TYPES.COLON,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
};

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['true', TOKEN_TYPES.TRUE],
  ['false', TOKEN_TYPES.FALSE],
  ['undef', TOKEN_TYPES.UNDEF],
  ['if', TOKEN_TYPES.IF],
  ['elsif', TOKEN_TYPES.ELSIF],
  ['else', TOKEN_TYPES.ELSE],
  ['unless', TOKEN_TYPES.UNLESS],
  ['case', TOKEN_TYPES.CASE],
  ['default', TOKEN_TYPES.DEFAULT],
  ['define', TOKEN_TYPES.DEFINE],
  ['class', TOKEN_TYPES.CLASS],
  ['and', TOKEN_TYPES.AND],
  ['or', TOKEN_TYPES.OR],
  ['not', TOKEN_TYPES.NOT],
  ['in', TOKEN_TYPES.IN],
]);
