/**
 * Manifold Runtime Tests: Expressions, Variables and Control Flow
 */

import { describe, expect, it } from 'vitest';
import { RuntimeError } from '../../src/index.js';
import { run, valueOf } from '../helpers/manifest.js';

function runtimeError(fn: () => unknown): RuntimeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RuntimeError) return err;
    throw err;
  }
  throw new Error('Expected a RuntimeError');
}

describe('Manifold Runtime: evaluation', () => {
  describe('arithmetic', () => {
    it('follows operator precedence', () => {
      expect(valueOf('$x = 1 + 2 * 3', 'x')).toBe(7);
      expect(valueOf('$x = (1 + 2) * 3', 'x')).toBe(9);
      expect(valueOf('$x = 10 - 4 - 3', 'x')).toBe(3);
    });

    it('divides and takes remainders', () => {
      expect(valueOf('$x = 7 / 2', 'x')).toBe(3.5);
      expect(valueOf('$x = 7 % 3', 'x')).toBe(1);
    });

    it('negates numbers', () => {
      expect(valueOf('$a = 4\n$x = -$a', 'x')).toBe(-4);
    });

    it('throws MF-R008 on division by zero', () => {
      const err = runtimeError(() => run('$x = 1 / 0'));
      expect(err.errorId).toBe('MF-R008');
      expect(err.reason).toBe('Operator / cannot divide by zero');
    });

    it('throws MF-R008 for non-numeric operands', () => {
      const err = runtimeError(() => run("$x = 'a' * 2"));
      expect(err.reason).toBe('Operator * is not applicable to string and number');
      expect(err.location).toEqual({ line: 1, column: 6, offset: 5 });
    });

    it('concatenates arrays and merges hashes with +', () => {
      expect(valueOf('$x = [1, 2] + [3]', 'x')).toEqual([1, 2, 3]);
      expect(
        valueOf("$x = { 'a' => 1, 'b' => 2 } + { 'b' => 3 }", 'x')
      ).toEqual({ a: 1, b: 3 });
    });
  });

  describe('comparison and logic', () => {
    it('compares values structurally with == and !=', () => {
      expect(valueOf("$x = [1, 'a'] == [1, 'a']", 'x')).toBe(true);
      expect(valueOf("$x = 'a' != 'A'", 'x')).toBe(true);
      expect(valueOf("$x = 1 == '1'", 'x')).toBe(false);
    });

    it('orders numbers and strings', () => {
      expect(valueOf('$x = 2 <= 2', 'x')).toBe(true);
      expect(valueOf("$x = 'abc' < 'abd'", 'x')).toBe(true);
    });

    it('refuses to order mixed types', () => {
      const err = runtimeError(() => run("$x = 1 < 'a'"));
      expect(err.reason).toBe('Operator < is not applicable to number and string');
    });

    it('tests membership in arrays, hash keys and strings', () => {
      expect(valueOf("$x = 'b' in ['a', 'b']", 'x')).toBe(true);
      expect(valueOf("$x = 'k' in { 'k' => 1 }", 'x')).toBe(true);
      expect(valueOf("$x = 'ell' in 'hello'", 'x')).toBe(true);
      expect(valueOf("$x = 'z' in ['a']", 'x')).toBe(false);
    });

    it('treats false, undef and the empty string as false', () => {
      expect(valueOf("$x = !''", 'x')).toBe(true);
      expect(valueOf('$x = !undef', 'x')).toBe(true);
      expect(valueOf('$x = !0', 'x')).toBe(false);
      expect(valueOf('$x = ![]', 'x')).toBe(false);
    });

    it('short-circuits and / or', () => {
      expect(valueOf('$x = false and 1 / 0', 'x')).toBe(false);
      expect(valueOf('$x = true or 1 / 0', 'x')).toBe(true);
      expect(valueOf('$x = not true or false', 'x')).toBe(false);
    });
  });

  describe('strings', () => {
    it('interpolates variables', () => {
      const source = "$name = 'world'\n$x = \"hello ${name}, $name\"";
      expect(valueOf(source, 'x')).toBe('hello world, world');
    });

    it('interpolates undef as the empty string', () => {
      expect(valueOf('$x = "[${missing}]"', 'x')).toBe('[]');
    });

    it('formats collections when interpolated', () => {
      const source = "$list = ['a', 1, undef]\n$x = \"$list\"";
      expect(valueOf(source, 'x')).toBe("['a', 1, undef]");
    });
  });

  describe('variables', () => {
    it('evaluates unassigned variables as undef', () => {
      expect(valueOf('$x = $nope', 'x')).toBeNull();
    });

    it('throws MF-R002 for unassigned variables with strictVariables', () => {
      const err = runtimeError(() =>
        run('$x = $nope', { strictVariables: true })
      );
      expect(err.errorId).toBe('MF-R002');
      expect(err.message).toBe('Unknown variable: $nope at /site/init.mf:1:6');
    });

    it('throws MF-R003 on reassignment', () => {
      const err = runtimeError(() => run('$x = 1\n$x = 2'));
      expect(err.errorId).toBe('MF-R003');
      expect(err.reason).toBe('Cannot reassign variable $x');
      expect(err.location?.line).toBe(2);
    });

    it('refuses to assign qualified names', () => {
      const err = runtimeError(() => run('$ns::x = 1'));
      expect(err.errorId).toBe('MF-R003');
    });

    it('reads the top scope through $::name', () => {
      const source = `$env = 'prod'
class app {
  $env = 'local'
  $x = "$env/$::env"
  file { $x: }
}
include app`;
      const { compilation } = run(source);
      expect(compilation.catalog.classes()).toEqual(['main', 'app']);
      expect(compilation.catalog.getResource('file', 'local/prod')).toBeDefined();
      expect(compilation.topScope.lookup('x')).toBeUndefined();
    });
  });

  describe('access', () => {
    it('indexes arrays, counting negative indexes from the end', () => {
      const source = '$a = [10, 20, 30]\n$x = $a[0]\n$y = $a[-1]\n$z = $a[5]';
      const { compilation } = run(source);
      expect(compilation.topScope.lookup('x')).toBe(10);
      expect(compilation.topScope.lookup('y')).toBe(30);
      expect(compilation.topScope.lookup('z')).toBeNull();
    });

    it('looks up hash keys', () => {
      const source = "$h = { 'a' => { 'b' => 'deep' } }\n$x = $h['a']['b']";
      expect(valueOf(source, 'x')).toBe('deep');
    });

    it('does not see object members through hash keys', () => {
      const { compilation } = run(
        "$h = { 'a' => 1 }\n$x = $h['toString']\n$y = $h['constructor']\n$z = 'hasOwnProperty' in $h"
      );
      expect(compilation.topScope.lookup('x')).toBeNull();
      expect(compilation.topScope.lookup('y')).toBeNull();
      expect(compilation.topScope.lookup('z')).toBe(false);
    });

    it('stores __proto__ as an ordinary hash key', () => {
      const { compilation } = run(
        "$h = { '__proto__' => 'p' }\n$x = $h['__proto__']\n$y = '__proto__' in $h"
      );
      const hash = compilation.topScope.lookup('h');
      expect(Object.keys(hash ?? {})).toEqual(['__proto__']);
      expect(compilation.topScope.lookup('x')).toBe('p');
      expect(compilation.topScope.lookup('y')).toBe(true);
    });

    it('stores __proto__ as an ordinary resource attribute', () => {
      const { catalog } = run("file { '/tmp/p': __proto__ => 'p', mode => '0644' }");
      expect(Object.keys(catalog.getResource('file', '/tmp/p')?.parameters ?? {})).toEqual([
        '__proto__',
        'mode',
      ]);
    });

    it('accepts object member names as defined type names', () => {
      const { catalog } = run(
        "define toString { file { $title: } }\ntoString { '/tmp/t': }"
      );
      expect(catalog.toData().resources.map((resource) => resource.ref)).toEqual([
        'ToString[/tmp/t]',
        'File[/tmp/t]',
      ]);
    });

    it('throws MF-R008 for a non-integer array index', () => {
      const err = runtimeError(() => run("$a = [1]\n$x = $a['0']"));
      expect(err.reason).toBe('Operator [] expects an integer index, got string');
    });

    it('throws MF-R008 when indexing a scalar', () => {
      const err = runtimeError(() => run("$s = 'abc'\n$x = $s[0]"));
      expect(err.reason).toBe('Operator [] is not applicable to string');
    });
  });

  describe('control flow', () => {
    it('runs the first true branch of if / elsif / else in the same scope', () => {
      const source = "if false { $r = 'a' } elsif true { $r = 'b' } else { $r = 'c' }";
      expect(valueOf(source, 'r')).toBe('b');
    });

    it('falls through to else', () => {
      expect(valueOf("if '' { $r = 'a' } else { $r = 'c' }", 'r')).toBe('c');
    });

    it('runs unless bodies when the condition is false', () => {
      expect(valueOf("unless undef { $r = 'ran' }", 'r')).toBe('ran');
      expect(valueOf("unless true { $r = 'ran' } else { $r = 'else' }", 'r')).toBe(
        'else'
      );
    });

    it('matches case clauses and uses default only when nothing matched', () => {
      const source = (os: string) => `$os = '${os}'
case $os {
  default: { $family = 'other' }
  'debian', 'ubuntu': { $family = 'debian' }
}`;
      expect(valueOf(source('ubuntu'), 'family')).toBe('debian');
      expect(valueOf(source('plan9'), 'family')).toBe('other');
    });

    it('does nothing when no case clause matches and there is no default', () => {
      expect(valueOf("case 1 { 2: { $r = 'two' } }", 'r')).toBeUndefined();
    });
  });
});
