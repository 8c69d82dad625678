/**
 * Manifold Runtime Tests: Built-in and Host Functions
 */

import { describe, expect, it, vi } from 'vitest';
import {
  createEnvironment,
  createLogger,
  type HostCallEvent,
  type HostFunctionDefinition,
  RuntimeError,
} from '../../src/index.js';
import { run, TEST_FILE, valueOf } from '../helpers/manifest.js';

describe('Manifold Runtime: built-in functions', () => {
  describe('logging functions', () => {
    it('log through the compiler logger prefixed with the scope', () => {
      const logger = createLogger('compiler', 'debug');
      const log = vi.spyOn(logger, 'log');

      run("notice('hello', 42)\nwarning 'careful'", { logger });

      expect(log.mock.calls).toEqual([
        ['info', 'Scope(Class[main]): hello 42', { file: TEST_FILE, line: 1 }],
        ['warn', 'Scope(Class[main]): careful', { file: TEST_FILE, line: 2 }],
      ]);
    });

    it('name the defined type instance they run in', () => {
      const logger = createLogger('compiler', 'debug');
      const log = vi.spyOn(logger, 'log');

      run("define greet { debug(\"hi $title\") }\ngreet { 'bob': }", { logger });

      expect(log).toHaveBeenCalledWith('debug', 'Scope(Greet[bob]): hi bob', {
        file: TEST_FILE,
        line: 1,
      });
    });

    it('map err to the error level', () => {
      const logger = createLogger('compiler');
      const log = vi.spyOn(logger, 'log');
      run("err('broken')", { logger });
      expect(log.mock.calls[0]?.[0]).toBe('error');
    });
  });

  describe('fail', () => {
    it('throws MF-R009 with the joined message at the call site', () => {
      try {
        run("$x = 1\nfail('stopped at', $x)");
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(RuntimeError);
        if (!(err instanceof RuntimeError)) return;
        expect(err.errorId).toBe('MF-R009');
        expect(err.message).toBe('stopped at 1 at /site/init.mf:2:1');
      }
    });
  });

  describe('rvalue functions', () => {
    it('member() tests array membership', () => {
      expect(valueOf("$x = member(['a', 'b'], 'b')", 'x')).toBe(true);
      expect(valueOf("$x = member([[1]], [1])", 'x')).toBe(true);
      expect(valueOf("$x = member([], 'b')", 'x')).toBe(false);
    });

    it('member() validates its argument types', () => {
      expect(() => run("$x = member('ab', 'a')")).toThrow(
        "Function member expects array for 'array', got string"
      );
    });

    it('join() joins with an optional separator', () => {
      expect(valueOf("$x = join(['a', 'b'], '-')", 'x')).toBe('a-b');
      expect(valueOf("$x = join([1, 'x'])", 'x')).toBe('1x');
    });

    it('defined() checks variables, functions, types and classes', () => {
      const source = `$y = 1
class c { }
define d { }
$checks = [
  defined('$y'), defined('$z'), defined('notice'),
  defined('file'), defined('c'), defined('d'), defined('nope'),
]`;
      expect(valueOf(source, 'checks')).toEqual([
        true,
        false,
        true,
        true,
        true,
        true,
        false,
      ]);
    });
  });

  describe('argument validation', () => {
    it('throws MF-R001 for too many arguments', () => {
      expect(() => run("$x = join(['a'], ',', 'extra')")).toThrow(
        'Function join expects 2 arguments, got 3'
      );
    });

    it('throws MF-R001 for a missing argument', () => {
      expect(() => run('$x = defined()')).toThrow(
        "Function defined requires argument 'name'"
      );
    });
  });

  describe('host functions', () => {
    const upcase: HostFunctionDefinition = {
      type: 'rvalue',
      params: [{ name: 'text', type: 'string' }],
      fn: ([text]) => (typeof text === 'string' ? text.toUpperCase() : null),
    };

    it('calls functions registered with the environment', () => {
      const environment = createEnvironment({ functions: { upcase } });
      expect(valueOf("$x = upcase('abc')", 'x', { environment })).toBe('ABC');
    });

    it('passes the caller context', () => {
      const seen = vi.fn();
      const probe: HostFunctionDefinition = {
        type: 'statement',
        params: [],
        fn: (_args, caller) => {
          seen(caller.file, caller.line, caller.scope.label, caller.environment.name);
          return null;
        },
      };
      const environment = createEnvironment({ name: 'staging', functions: { probe } });

      run("class app { probe() }\ninclude app", { environment });

      expect(seen).toHaveBeenCalledWith(TEST_FILE, 1, 'Class[app]', 'staging');
    });

    it('reports calls through onHostCall', () => {
      const onHostCall = vi.fn<(event: HostCallEvent) => void>();
      run("$x = join(['a'])\nnotice($x)", { observability: { onHostCall } });
      expect(onHostCall.mock.calls.map(([event]) => event)).toEqual([
        { name: 'join', file: TEST_FILE, line: 1 },
        { name: 'notice', file: TEST_FILE, line: 2 },
      ]);
    });

    it('can leave out the built-in functions', () => {
      const environment = createEnvironment({ builtins: false });
      expect(() => run("notice('x')", { environment })).toThrow(
        'Unknown function notice'
      );
    });
  });
});
