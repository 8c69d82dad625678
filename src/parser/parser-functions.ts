/**
 * Parser Extension: Function Calls
 * Parenthesized and paren-less calls, checked against the environment
 */

import { Parser } from './parser.js';
import type { CallNode, ExpressionNode, FunctionKind, Token } from '../types.js';
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
    parseCall(kind: FunctionKind): CallNode;
    parseParenlessCall(): CallNode;
    parseArgList(): ExpressionNode[];
    validateCall(nameToken: Token, kind: FunctionKind): void;
  }
}

/** name(arg, ...) */
Parser.prototype.parseCall = function (
  this: Parser,
  kind: FunctionKind
): CallNode {
  const nameToken = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected function name'
  );
  this.validateCall(nameToken, kind);
  const args = this.parseArgList();

  return {
    type: 'Call',
    name: nameToken.value,
    args,
    kind,
    span: makeSpan(nameToken.span.start, previousEnd(this.state)),
  };
};

/** name arg, ... (statement position only) */
Parser.prototype.parseParenlessCall = function (this: Parser): CallNode {
  const nameToken = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected function name'
  );
  this.validateCall(nameToken, 'statement');

  const args: ExpressionNode[] = [this.parseExpression()];
  while (check(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state);
    args.push(this.parseExpression());
  }

  return {
    type: 'Call',
    name: nameToken.value,
    args,
    kind: 'statement',
    span: makeSpan(nameToken.span.start, previousEnd(this.state)),
  };
};

/** ( arg, ... ) with optional trailing comma */
Parser.prototype.parseArgList = function (this: Parser): ExpressionNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, 'Expected (');
  const args: ExpressionNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    args.push(this.parseExpression());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  expect(this.state, TOKEN_TYPES.RPAREN, 'Expected )');
  return args;
};

/**
 * Reject unknown functions and functions used in the wrong position.
 * Skipped when the parser has no environment.
 */
Parser.prototype.validateCall = function (
  this: Parser,
  nameToken: Token,
  kind: FunctionKind
): void {
  const environment = this.state.environment;
  if (!environment) return;

  const fn = environment.functions.get(nameToken.value);
  if (!fn) {
    throw parseError(
      this.state,
      'MF-P002',
      { name: nameToken.value },
      nameToken.span.start
    );
  }

  if (fn.type !== kind) {
    const problem =
      kind === 'statement'
        ? 'must be the value of a statement'
        : 'does not return a value';
    throw parseError(
      this.state,
      'MF-P003',
      { name: nameToken.value, problem },
      nameToken.span.start
    );
  }
};
