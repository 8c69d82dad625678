/**
 * Parser Extension: Expressions
 * Precedence chain, access and primary expressions
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  TokenType,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  peek,
  previousEnd,
  unexpectedToken,
} from './state.js';
import { isAdjacent } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseLogicalOr(): ExpressionNode;
    parseLogicalAnd(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePostfix(): ExpressionNode;
    parsePrimary(): ExpressionNode;
  }
}

const COMPARISON_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GE]: '>=',
  [TOKEN_TYPES.IN]: 'in',
};

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseLogicalOr();
};

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseLogicalOr = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseLogicalAnd();

  while (check(this.state, TOKEN_TYPES.OR)) {
    advance(this.state);
    const right = this.parseLogicalAnd();
    left = {
      type: 'BinaryExpr',
      op: 'or',
      left,
      right,
      span: makeSpan(start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseLogicalAnd = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseComparison();

  while (check(this.state, TOKEN_TYPES.AND)) {
    advance(this.state);
    const right = this.parseComparison();
    left = {
      type: 'BinaryExpr',
      op: 'and',
      left,
      right,
      span: makeSpan(start, right.span.end),
    };
  }

  return left;
};

/** Non-associative: a == b == c is a syntax error */
Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const left = this.parseAdditive();

  const op = COMPARISON_OPS[current(this.state).type];
  if (op === undefined) return left;

  advance(this.state);
  const right = this.parseAdditive();
  if (COMPARISON_OPS[current(this.state).type] !== undefined) {
    throw unexpectedToken(this.state);
  }

  return {
    type: 'BinaryExpr',
    op,
    left,
    right,
    span: makeSpan(start, right.span.end),
  };
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseMultiplicative();

  while (check(this.state, TOKEN_TYPES.PLUS, TOKEN_TYPES.MINUS)) {
    const opToken = advance(this.state);
    const op: BinaryOp = opToken.type === TOKEN_TYPES.PLUS ? '+' : '-';
    const right = this.parseMultiplicative();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseUnary();

  while (
    check(this.state, TOKEN_TYPES.STAR, TOKEN_TYPES.SLASH, TOKEN_TYPES.PERCENT)
  ) {
    const opToken = advance(this.state);
    const op: BinaryOp =
      opToken.type === TOKEN_TYPES.STAR
        ? '*'
        : opToken.type === TOKEN_TYPES.SLASH
          ? '/'
          : '%';
    const right = this.parseUnary();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.MINUS)) {
    const start = advance(this.state).span.start;
    const operand = this.parseUnary();
    return {
      type: 'UnaryExpr',
      op: '-',
      operand,
      span: makeSpan(start, operand.span.end),
    };
  }
  if (check(this.state, TOKEN_TYPES.BANG, TOKEN_TYPES.NOT)) {
    const start = advance(this.state).span.start;
    const operand = this.parseUnary();
    return {
      type: 'UnaryExpr',
      op: '!',
      operand,
      span: makeSpan(start, operand.span.end),
    };
  }
  return this.parsePostfix();
};

// ============================================================
// ACCESS AND PRIMARIES
// ============================================================

/** $a[0]['key'] */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  let target = this.parsePrimary();

  while (
    check(this.state, TOKEN_TYPES.LBRACKET) &&
    isAdjacent(peek(this.state, -1), current(this.state))
  ) {
    advance(this.state); // consume [
    const key = this.parseExpression();
    expect(this.state, TOKEN_TYPES.RBRACKET, 'Expected ]');
    target = {
      type: 'Access',
      target,
      key,
      span: makeSpan(target.span.start, previousEnd(this.state)),
    };
  }

  return target;
};

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };

    case TOKEN_TYPES.DQ_STRING:
      advance(this.state);
      return this.parseDoubleQuoted(token);

    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return {
        type: 'NumberLiteral',
        value: Number(token.value),
        span: token.span,
      };

    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };

    case TOKEN_TYPES.UNDEF:
      advance(this.state);
      return { type: 'UndefLiteral', span: token.span };

    case TOKEN_TYPES.VARIABLE:
      advance(this.state);
      return { type: 'Variable', name: token.value, span: token.span };

    case TOKEN_TYPES.LBRACKET:
      return this.parseArrayLiteral();

    case TOKEN_TYPES.LBRACE:
      return this.parseHashLiteral();

    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const inner = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, 'Expected )');
      return inner;
    }

    case TOKEN_TYPES.IDENTIFIER:
      if (peek(this.state, 1).type === TOKEN_TYPES.LPAREN) {
        return this.parseCall('rvalue');
      }
      advance(this.state);
      return { type: 'BareWord', value: token.value, span: token.span };

    default:
      throw unexpectedToken(this.state, token);
  }
};
