/**
 * Parser Extension: Manifests and Statements
 * Top-level units, statement dispatch and braced blocks
 */

import { Parser } from './parser.js';
import type { ManifestNode, StatementNode, UnitNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  peek,
  unexpectedToken,
} from './state.js';
import { startsParenlessArgs } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseManifest(): ManifestNode;
    parseUnitBody(): UnitNode;
    parseStatementList(): StatementNode[];
    parseStatement(): StatementNode;
    parseBlock(): StatementNode[];
  }
}

// ============================================================
// COMPILATION UNITS
// ============================================================

Parser.prototype.parseManifest = function (this: Parser): ManifestNode {
  const start = current(this.state).span.start;
  const statements = this.parseStatementList();
  const eof = expect(this.state, TOKEN_TYPES.EOF, 'Expected end of file');

  return {
    type: 'Manifest',
    file: this.state.file ?? null,
    statements,
    span: makeSpan(start, eof.span.end),
  };
};

Parser.prototype.parseUnitBody = function (this: Parser): UnitNode {
  const start = current(this.state).span.start;
  const statements = this.parseStatementList();
  const eof = expect(this.state, TOKEN_TYPES.EOF, 'Expected end of file');

  return {
    type: 'Unit',
    file: this.state.file ?? null,
    statements,
    span: makeSpan(start, eof.span.end),
  };
};

// ============================================================
// STATEMENTS
// ============================================================

/** Statements up to a closing brace or end of input */
Parser.prototype.parseStatementList = function (
  this: Parser
): StatementNode[] {
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state) && !check(this.state, TOKEN_TYPES.RBRACE)) {
    // Stray separators between statements are allowed
    if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
      continue;
    }
    statements.push(this.parseStatement());
  }

  return statements;
};

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.VARIABLE:
      return this.parseAssignment();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.UNLESS:
      return this.parseUnless();
    case TOKEN_TYPES.CASE:
      return this.parseCase();
    case TOKEN_TYPES.DEFINE:
      return this.parseDefine();
    case TOKEN_TYPES.CLASS:
      return this.parseClass();
    case TOKEN_TYPES.IDENTIFIER: {
      const next = peek(this.state, 1).type;
      if (next === TOKEN_TYPES.LBRACE) return this.parseResource();
      if (next === TOKEN_TYPES.LPAREN) return this.parseCall('statement');
      if (startsParenlessArgs(next)) return this.parseParenlessCall();
      throw unexpectedToken(this.state, peek(this.state, 1));
    }
    default:
      throw unexpectedToken(this.state, token);
  }
};

/** { statements } */
Parser.prototype.parseBlock = function (this: Parser): StatementNode[] {
  expect(this.state, TOKEN_TYPES.LBRACE, 'Expected {');
  const body = this.parseStatementList();
  expect(this.state, TOKEN_TYPES.RBRACE, 'Expected }');
  return body;
};
