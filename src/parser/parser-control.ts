/**
 * Parser Extension: Control Flow
 * if/elsif/else, unless/else and case
 */

import { Parser } from './parser.js';
import type {
  CaseClauseNode,
  CaseNode,
  ConditionalBranch,
  ExpressionNode,
  IfNode,
  StatementNode,
  UnlessNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  previousEnd,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseIf(): IfNode;
    parseUnless(): UnlessNode;
    parseCase(): CaseNode;
    parseCaseClause(): CaseClauseNode;
    parseElse(): StatementNode[] | null;
  }
}

Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = expect(this.state, TOKEN_TYPES.IF, 'Expected if').span.start;
  const branches: ConditionalBranch[] = [];

  const condition = this.parseExpression();
  branches.push({ condition, body: this.parseBlock() });

  while (check(this.state, TOKEN_TYPES.ELSIF)) {
    advance(this.state);
    const elsifCondition = this.parseExpression();
    branches.push({ condition: elsifCondition, body: this.parseBlock() });
  }

  const otherwise = this.parseElse();

  return {
    type: 'If',
    branches,
    otherwise,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

Parser.prototype.parseUnless = function (this: Parser): UnlessNode {
  const start = expect(this.state, TOKEN_TYPES.UNLESS, 'Expected unless').span
    .start;
  const condition = this.parseExpression();
  const body = this.parseBlock();
  const otherwise = this.parseElse();

  return {
    type: 'Unless',
    condition,
    body,
    otherwise,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

Parser.prototype.parseElse = function (this: Parser): StatementNode[] | null {
  if (!check(this.state, TOKEN_TYPES.ELSE)) return null;
  advance(this.state);
  return this.parseBlock();
};

// ============================================================
// CASE
// ============================================================

Parser.prototype.parseCase = function (this: Parser): CaseNode {
  const start = expect(this.state, TOKEN_TYPES.CASE, 'Expected case').span
    .start;
  const subject = this.parseExpression();
  expect(this.state, TOKEN_TYPES.LBRACE, 'Expected {');

  const clauses: CaseClauseNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
    clauses.push(this.parseCaseClause());
  }
  expect(this.state, TOKEN_TYPES.RBRACE, 'Expected }');

  return {
    type: 'Case',
    subject,
    clauses,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** 'a', 'b': { ... } or default: { ... } */
Parser.prototype.parseCaseClause = function (this: Parser): CaseClauseNode {
  const start = current(this.state).span.start;
  const matches: ExpressionNode[] = [];
  let isDefault = false;

  if (check(this.state, TOKEN_TYPES.DEFAULT)) {
    advance(this.state);
    isDefault = true;
  } else {
    matches.push(this.parseExpression());
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      matches.push(this.parseExpression());
    }
  }

  expect(this.state, TOKEN_TYPES.COLON, 'Expected :');
  const body = this.parseBlock();

  return {
    type: 'CaseClause',
    matches,
    isDefault,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};
