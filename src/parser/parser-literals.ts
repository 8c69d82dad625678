/**
 * Parser Extension: Literal Parsing
 * Double-quoted strings with interpolation, arrays and hashes
 */

import { Parser } from './parser.js';
import type {
  ArrayLiteralNode,
  ExpressionNode,
  HashEntryNode,
  HashLiteralNode,
  SourceLocation,
  Token,
  VariableNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  expect,
  makeSpan,
  parseError,
  previousEnd,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseDoubleQuoted(token: Token): ExpressionNode;
    parseArrayLiteral(): ArrayLiteralNode;
    parseHashLiteral(): HashLiteralNode;
    parseHashEntry(): HashEntryNode;
  }
}

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  '\\': '\\',
  '"': '"',
  $: '$',
};

const NAME_CHAR = /[A-Za-z0-9_]/;
const NAME_START = /[A-Za-z_]/;

/** Read `name`, `ns::name` or `::name` starting at index i */
function readInterpolatedName(raw: string, i: number): string {
  let name = '';
  let pos = i;

  for (;;) {
    if (raw.startsWith('::', pos) && NAME_START.test(raw.charAt(pos + 2))) {
      name += '::';
      pos += 2;
    }
    if (!NAME_START.test(raw.charAt(pos))) return name;
    while (pos < raw.length && NAME_CHAR.test(raw.charAt(pos))) {
      name += raw.charAt(pos);
      pos++;
    }
    if (!(raw.startsWith('::', pos) && NAME_START.test(raw.charAt(pos + 2)))) {
      return name;
    }
  }
}

/** Source location of raw[index], counted from the opening quote */
function locate(token: Token, raw: string, index: number): SourceLocation {
  let { line, column, offset } = token.span.start;
  column++;
  offset++;
  for (let i = 0; i < index; i++) {
    if (raw.charAt(i) === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
    offset++;
  }
  return { line, column, offset };
}

// ============================================================
// DOUBLE-QUOTED STRINGS
// ============================================================

/**
 * Resolve escapes and split `$name` / `${name}` references out of the raw
 * string content. A string without references becomes a StringLiteral.
 */
Parser.prototype.parseDoubleQuoted = function (
  this: Parser,
  token: Token
): ExpressionNode {
  const raw = token.value;
  const parts: (string | VariableNode)[] = [];
  let text = '';
  let i = 0;

  while (i < raw.length) {
    const ch = raw.charAt(i);

    if (ch === '\\' && i + 1 < raw.length) {
      const next = raw.charAt(i + 1);
      text += ESCAPES[next] ?? ch + next;
      i += 2;
      continue;
    }

    if (ch === '$') {
      const braced = raw.charAt(i + 1) === '{';
      const nameStart = braced ? i + 2 : i + 1;
      const name = readInterpolatedName(raw, nameStart);

      if (name === '') {
        text += ch;
        i++;
        continue;
      }

      let end = nameStart + name.length;
      if (braced) {
        if (raw.charAt(end) !== '}') {
          throw parseError(
            this.state,
            'MF-P004',
            {
              expected: 'Expected } to close interpolation',
              actual: raw.charAt(end) === '' ? 'end of string' : `'${raw.charAt(end)}'`,
            },
            locate(token, raw, end)
          );
        }
        end++;
      }

      if (text !== '') {
        parts.push(text);
        text = '';
      }
      parts.push({
        type: 'Variable',
        name,
        span: makeSpan(locate(token, raw, i), locate(token, raw, end)),
      });
      i = end;
      continue;
    }

    text += ch;
    i++;
  }

  if (text !== '') parts.push(text);

  if (parts.every((part): part is string => typeof part === 'string')) {
    return { type: 'StringLiteral', value: parts.join(''), span: token.span };
  }

  return { type: 'InterpolatedString', parts, span: token.span };
};

// ============================================================
// COLLECTIONS
// ============================================================

/** [a, b, c] with optional trailing comma */
Parser.prototype.parseArrayLiteral = function (
  this: Parser
): ArrayLiteralNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACKET, 'Expected [').span
    .start;
  const elements: ExpressionNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    elements.push(this.parseExpression());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  expect(this.state, TOKEN_TYPES.RBRACKET, 'Expected ]');
  return {
    type: 'ArrayLiteral',
    elements,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** { key => value, ... } with optional trailing comma */
Parser.prototype.parseHashLiteral = function (this: Parser): HashLiteralNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACE, 'Expected {').span
    .start;
  const entries: HashEntryNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    entries.push(this.parseHashEntry());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  expect(this.state, TOKEN_TYPES.RBRACE, 'Expected }');
  return {
    type: 'HashLiteral',
    entries,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

Parser.prototype.parseHashEntry = function (this: Parser): HashEntryNode {
  const key = this.parseExpression();
  expect(this.state, TOKEN_TYPES.FARROW, 'Expected =>');
  const value = this.parseExpression();

  return {
    type: 'HashEntry',
    key,
    value,
    span: makeSpan(key.span.start, value.span.end),
  };
};
