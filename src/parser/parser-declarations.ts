/**
 * Parser Extension: Declarations
 * Assignments, define and class definitions, resource declarations
 */

import { Parser } from './parser.js';
import type {
  AssignmentNode,
  AttributeNode,
  ClassNode,
  DefineNode,
  ExpressionNode,
  ParamNode,
  ResourceBodyNode,
  ResourceNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  describeToken,
  expect,
  makeSpan,
  parseError,
  previousEnd,
} from './state.js';
import { isWordToken } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseAssignment(): AssignmentNode;
    parseDefine(): DefineNode;
    parseClass(): ClassNode;
    parseParamList(reserved?: readonly string[]): ParamNode[];
    parseParam(reserved: readonly string[]): ParamNode;
    parseResource(): ResourceNode;
    parseResourceBody(): ResourceBodyNode;
    parseAttribute(): AttributeNode;
  }
}

/** $name = expression */
Parser.prototype.parseAssignment = function (this: Parser): AssignmentNode {
  const variable = expect(this.state, TOKEN_TYPES.VARIABLE, 'Expected variable');
  expect(this.state, TOKEN_TYPES.ASSIGN, 'Expected =');
  const value = this.parseExpression();

  return {
    type: 'Assignment',
    name: variable.value,
    value,
    span: makeSpan(variable.span.start, value.span.end),
  };
};

// ============================================================
// DEFINITIONS
// ============================================================

/** Bound to the resource title in every defined type instance */
const DEFINE_RESERVED_PARAMS: readonly string[] = ['title', 'name'];

Parser.prototype.parseDefine = function (this: Parser): DefineNode {
  const start = expect(this.state, TOKEN_TYPES.DEFINE, 'Expected define').span
    .start;
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected defined type name'
  ).value;
  const params = this.parseParamList(DEFINE_RESERVED_PARAMS);
  const body = this.parseBlock();

  return {
    type: 'Define',
    name,
    params,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

Parser.prototype.parseClass = function (this: Parser): ClassNode {
  const start = expect(this.state, TOKEN_TYPES.CLASS, 'Expected class').span
    .start;
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected class name'
  ).value;
  const params = this.parseParamList();
  const body = this.parseBlock();

  return {
    type: 'Class',
    name,
    params,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** Optional ($a, $b = default) */
Parser.prototype.parseParamList = function (
  this: Parser,
  reserved: readonly string[] = []
): ParamNode[] {
  const params: ParamNode[] = [];
  if (!check(this.state, TOKEN_TYPES.LPAREN)) return params;
  advance(this.state);

  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    params.push(this.parseParam(reserved));
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  expect(this.state, TOKEN_TYPES.RPAREN, 'Expected )');
  return params;
};

Parser.prototype.parseParam = function (
  this: Parser,
  reserved: readonly string[]
): ParamNode {
  const variable = expect(
    this.state,
    TOKEN_TYPES.VARIABLE,
    'Expected parameter name'
  );
  if (reserved.includes(variable.value)) {
    throw parseError(
      this.state,
      'MF-P005',
      { name: variable.value },
      variable.span.start
    );
  }
  let defaultValue: ExpressionNode | null = null;
  if (check(this.state, TOKEN_TYPES.ASSIGN)) {
    advance(this.state);
    defaultValue = this.parseExpression();
  }

  return {
    type: 'Param',
    name: variable.value,
    defaultValue,
    span: makeSpan(variable.span.start, previousEnd(this.state)),
  };
};

// ============================================================
// RESOURCES
// ============================================================

/** type { title: attr => value, ...; title2: ... } */
Parser.prototype.parseResource = function (this: Parser): ResourceNode {
  const typeToken = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected resource type'
  );
  expect(this.state, TOKEN_TYPES.LBRACE, 'Expected {');

  const bodies: ResourceBodyNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    bodies.push(this.parseResourceBody());
    if (!check(this.state, TOKEN_TYPES.SEMICOLON)) break;
    advance(this.state);
  }
  expect(this.state, TOKEN_TYPES.RBRACE, 'Expected }');

  if (bodies.length === 0) {
    throw parseError(
      this.state,
      'MF-P004',
      { expected: 'Expected resource title', actual: "'}'" },
      previousEnd(this.state)
    );
  }

  return {
    type: 'Resource',
    resourceType: typeToken.value,
    bodies,
    span: makeSpan(typeToken.span.start, previousEnd(this.state)),
  };
};

Parser.prototype.parseResourceBody = function (
  this: Parser
): ResourceBodyNode {
  const start = current(this.state).span.start;
  const title = this.parseExpression();
  expect(this.state, TOKEN_TYPES.COLON, 'Expected :');

  const attributes: AttributeNode[] = [];
  while (isWordToken(current(this.state))) {
    attributes.push(this.parseAttribute());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  return {
    type: 'ResourceBody',
    title,
    attributes,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** name => value */
Parser.prototype.parseAttribute = function (this: Parser): AttributeNode {
  const nameToken = current(this.state);
  if (!isWordToken(nameToken)) {
    throw parseError(
      this.state,
      'MF-P004',
      { expected: 'Expected attribute name', actual: describeToken(nameToken) },
      nameToken.span.start
    );
  }
  advance(this.state);
  expect(this.state, TOKEN_TYPES.FARROW, 'Expected =>');
  const value = this.parseExpression();

  return {
    type: 'Attribute',
    name: nameToken.value,
    value,
    span: makeSpan(nameToken.span.start, value.span.end),
  };
};
