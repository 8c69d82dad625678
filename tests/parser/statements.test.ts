/**
 * Manifold Parser Tests: Statements
 */

import { describe, expect, it } from 'vitest';
import {
  createEnvironment,
  parse,
  ParseError,
  parseUnit,
} from '../../src/index.js';

describe('Manifold Parser: statements', () => {
  describe('compilation units', () => {
    it('parse() returns a Manifest carrying the file', () => {
      const ast = parse('$x = 1', { file: '/site/init.mf' });
      expect(ast.type).toBe('Manifest');
      expect(ast.file).toBe('/site/init.mf');
      expect(ast.statements).toHaveLength(1);
    });

    it('parseUnit() returns a Unit with the same statements', () => {
      const unit = parseUnit("$x = 1\nnotice('a')", { file: '/site/inc.mf' });
      expect(unit.type).toBe('Unit');
      expect(unit.file).toBe('/site/inc.mf');
      expect(unit.statements.map((statement) => statement.type)).toEqual([
        'Assignment',
        'Call',
      ]);
    });

    it('records a null file for string sources', () => {
      expect(parse('').file).toBeNull();
    });

    it('skips stray semicolons between statements', () => {
      expect(parse('$a = 1;; $b = 2;').statements).toHaveLength(2);
    });
  });

  describe('assignments', () => {
    it('parses $name = expression', () => {
      const [statement] = parse("$greeting = 'hi'").statements;
      expect(statement).toMatchObject({
        type: 'Assignment',
        name: 'greeting',
        value: { type: 'StringLiteral', value: 'hi' },
      });
    });
  });

  describe('control flow', () => {
    it('parses if / elsif / else', () => {
      const [statement] = parse(
        "if $a { $x = 1 } elsif $b { $x = 2 } else { $x = 3 }"
      ).statements;
      expect(statement).toMatchObject({
        type: 'If',
        branches: [
          { condition: { type: 'Variable', name: 'a' } },
          { condition: { type: 'Variable', name: 'b' } },
        ],
      });
      if (statement?.type !== 'If') return;
      expect(statement.otherwise).toHaveLength(1);
    });

    it('parses unless without else', () => {
      const [statement] = parse('unless $quiet { $x = 1 }').statements;
      expect(statement).toMatchObject({ type: 'Unless', otherwise: null });
    });

    it('parses case clauses with value lists and default', () => {
      const [statement] = parse(`case $os {
  'debian', 'ubuntu': { $family = 'debian' }
  default: { $family = 'other' }
}`).statements;
      expect(statement?.type).toBe('Case');
      if (statement?.type !== 'Case') return;
      expect(statement.clauses).toHaveLength(2);
      expect(statement.clauses[0]?.matches).toHaveLength(2);
      expect(statement.clauses[0]?.isDefault).toBe(false);
      expect(statement.clauses[1]).toMatchObject({ isDefault: true, matches: [] });
    });
  });

  describe('definitions', () => {
    it('parses define with mandatory and default parameters', () => {
      const [statement] = parse(
        "define web::vhost($docroot, $port = 80) { $x = 1 }"
      ).statements;
      expect(statement).toMatchObject({
        type: 'Define',
        name: 'web::vhost',
        params: [
          { name: 'docroot', defaultValue: null },
          { name: 'port', defaultValue: { type: 'NumberLiteral', value: 80 } },
        ],
      });
    });

    it('rejects $title and $name as defined type parameters', () => {
      try {
        parse('define web::vhost($port, $title) { }', { file: '/site/init.mf' });
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (!(err instanceof ParseError)) return;
        expect(err.errorId).toBe('MF-P005');
        expect(err.message).toBe(
          'Parameter $title is reserved in defined types at /site/init.mf:1:26'
        );
      }
      expect(() => parse('define site($name = 1) { }')).toThrow(
        'Parameter $name is reserved in defined types'
      );
    });

    it('allows $name as a class parameter', () => {
      const [statement] = parse("class base($name = 'x') { }").statements;
      expect(statement).toMatchObject({ type: 'Class', params: [{ name: 'name' }] });
    });

    it('parses class without a parameter list', () => {
      const [statement] = parse('class base { }').statements;
      expect(statement).toMatchObject({
        type: 'Class',
        name: 'base',
        params: [],
        body: [],
      });
    });
  });

  describe('resources', () => {
    it('parses several bodies separated by semicolons', () => {
      const [statement] = parse(`file { '/tmp/a':
  ensure => present,
  mode   => '0644';
'/tmp/b':
  ensure => absent,
}`).statements;
      expect(statement?.type).toBe('Resource');
      if (statement?.type !== 'Resource') return;
      expect(statement.resourceType).toBe('file');
      expect(statement.bodies).toHaveLength(2);
      expect(statement.bodies[0]?.attributes.map((a) => a.name)).toEqual([
        'ensure',
        'mode',
      ]);
      expect(statement.bodies[1]?.span.start.line).toBe(4);
    });

    it('accepts keywords as attribute names', () => {
      const [statement] = parse(
        "exec { 'reload': unless => 'test -f /run/ok' }"
      ).statements;
      expect(statement?.type).toBe('Resource');
      if (statement?.type !== 'Resource') return;
      expect(statement.bodies[0]?.attributes[0]?.name).toBe('unless');
    });

    it('rejects a resource without a title', () => {
      expect(() => parse('file { }')).toThrow(
        "Expected resource title, got '}'"
      );
    });
  });

  describe('calls', () => {
    it('parses paren-less statement calls', () => {
      const [first, second] = parse(
        "include_file '../inc/metavars.mf'\ninclude base, extras"
      ).statements;
      expect(first).toMatchObject({
        type: 'Call',
        name: 'include_file',
        kind: 'statement',
        args: [{ type: 'StringLiteral', value: '../inc/metavars.mf' }],
      });
      expect(second).toMatchObject({
        type: 'Call',
        name: 'include',
        args: [
          { type: 'BareWord', value: 'base' },
          { type: 'BareWord', value: 'extras' },
        ],
      });
    });

    it('marks calls in value position as rvalue', () => {
      const [statement] = parse("$x = join(['a'], ',')").statements;
      expect(statement).toMatchObject({
        value: { type: 'Call', name: 'join', kind: 'rvalue' },
      });
    });

    it('accepts a trailing comma in argument lists', () => {
      const [statement] = parse("notice('a', 'b',)").statements;
      expect(statement?.type).toBe('Call');
      if (statement?.type !== 'Call') return;
      expect(statement.args).toHaveLength(2);
    });

    describe('with an environment', () => {
      const environment = createEnvironment();

      it('rejects unknown functions with MF-P002', () => {
        try {
          parse("frobnicate('x')", { environment, file: '/site/init.mf' });
          expect.fail('Should have thrown');
        } catch (err) {
          expect(err).toBeInstanceOf(ParseError);
          if (!(err instanceof ParseError)) return;
          expect(err.errorId).toBe('MF-P002');
          expect(err.message).toBe(
            'Unknown function frobnicate at /site/init.mf:1:1'
          );
        }
      });

      it('rejects statement functions used as values', () => {
        expect(() => parse("$x = notice('a')", { environment })).toThrow(
          "Function 'notice' does not return a value"
        );
      });

      it('rejects value functions used as statements', () => {
        expect(() => parse("join(['a'])", { environment })).toThrow(
          "Function 'join' must be the value of a statement"
        );
      });
    });
  });

  describe('syntax errors', () => {
    it('reports the offending token with MF-P001', () => {
      try {
        parse("$x = 1\n=> 2", { file: '/site/init.mf' });
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (!(err instanceof ParseError)) return;
        expect(err.errorId).toBe('MF-P001');
        expect(err.reason).toBe("Syntax error at '=>'");
        expect(err.file).toBe('/site/init.mf');
        expect(err.location).toEqual({ line: 2, column: 1, offset: 7 });
      }
    });

    it('reports a missing closing brace at end of file', () => {
      expect(() => parse('if true { $x = 1')).toThrow(
        'Expected }, got end of file'
      );
    });

    it('reports a stray closing brace', () => {
      expect(() => parse('}')).toThrow("Expected end of file, got '}' at 1:1");
    });

    it('rejects a name followed by something that is not a call or resource', () => {
      expect(() => parse('file = 1')).toThrow("Syntax error at '='");
    });
  });
});
