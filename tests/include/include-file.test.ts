/**
 * include_file Tests
 * Resolution, splicing into the caller's scope, failure modes and tracing
 */

import * as path from 'path';
import winston from 'winston';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import {
  type CallerContext,
  compileFile,
  compileSource,
  createCompilation,
  createEnvironment,
  createFileUnitParser,
  createIncludeFileFunction,
  createLogger,
  EmptyFileError,
  type Environment,
  FileNotFoundError,
  type IncludeEvent,
  includeFile,
  InvalidPathError,
  ParseError,
  parseUnit,
  RuntimeError,
  type UnitParser,
} from '../../src/index.js';
import { compileInto, createTree, removeTree } from '../helpers/manifest.js';

const FILES: Record<string, string> = {
  'site/some/resource.mf': `$before = 'kept'
include_file('../inc/metavars.mf')
file { '/tmp/metavars': content => join($metavars, ',') }
`,
  'site/inc/metavars.mf': "$metavars = ['foo', 'bar', 'baz']\n",
  'site/some/in-define.mf': `define metatest {
  include_file('../inc/metavars.mf')
  file { $title: content => join($metavars, ' ') }
}
metatest { '/tmp/a': }
$leaked = defined('$metavars')
`,
  'vars.mf': '$y = 2\n',
  'vhost.mf': `define site::vhost($port = 80) {
  file { "/etc/vhosts/$title": content => "port $port" }
}
`,
  'empty.mf': '',
  'comments.mf': '# nothing to see\n',
  'broken.mf': '$x = [1, 2',
  'partial.mf': "$a = 1\n$b = $a + 'x'\n$c = 3\n",
  'self.mf': "include_file('self.mf')\n",
  'nested/main.mf': "include_file('lib/a.mf')\n$seen = $from_b\n",
  'nested/lib/a.mf': "include_file 'b.mf'\n",
  'nested/lib/b.mf': "$from_b = 'yes'\n",
  'res.mf': 'file { "/tmp/$title": }\n',
  'sub/x.mf': '$z = 1\n',
};

describe('include_file', () => {
  let root: string;
  let main: string;

  beforeAll(() => {
    root = createTree(FILES);
    main = path.join(root, 'main.mf');
  });

  afterAll(() => {
    removeTree(root);
  });

  /** Compile `source` as <root>/main.mf into a compilation kept for inspection */
  function compileMain(source: string, environment?: Environment) {
    const compilation = createCompilation(environment ? { environment } : {});
    let error: unknown;
    try {
      compileInto(compilation, source, main);
    } catch (err) {
      error = err;
    }
    return { compilation, error };
  }

  describe('splicing', () => {
    it('makes included variables visible in the caller scope', () => {
      const { catalog, compilation } = compileFile(
        path.join(root, 'site/some/resource.mf')
      );
      expect(compilation.topScope.lookup('metavars')).toEqual(['foo', 'bar', 'baz']);
      expect(catalog.getResource('file', '/tmp/metavars')?.parameters).toEqual({
        content: 'foo,bar,baz',
      });
    });

    it('binds the same values as writing the lines inline', () => {
      const included = compileFile(path.join(root, 'site/some/resource.mf'));
      const inline = compileSource(
        `$before = 'kept'
$metavars = ['foo', 'bar', 'baz']`,
        { file: path.join(root, 'site/some/resource.mf') }
      );
      expect([...included.compilation.topScope.ownVariables()]).toEqual([
        ...inline.compilation.topScope.ownVariables(),
      ]);
    });

    it('lands in the scope of the defined type that calls it', () => {
      const { catalog, compilation } = compileFile(
        path.join(root, 'site/some/in-define.mf')
      );
      expect(catalog.getResource('file', '/tmp/a')?.parameters).toEqual({
        content: 'foo bar baz',
      });
      expect(compilation.topScope.lookup('leaked')).toBe(false);
    });

    it('makes included definitions usable after the call', () => {
      const { compilation, error } = compileMain(
        "include_file('vhost.mf')\nsite::vhost { 'a': port => 8080 }"
      );
      expect(error).toBeUndefined();
      expect(compilation.catalog.toData().resources).toEqual([
        {
          ref: 'Site::Vhost[a]',
          file: main,
          line: 2,
          parameters: { port: 8080 },
        },
        {
          ref: 'File[/etc/vhosts/a]',
          file: path.join(root, 'vhost.mf'),
          line: 2,
          parameters: { content: 'port 8080' },
        },
      ]);
    });

    it('accepts the paren-less form', () => {
      const { compilation, error } = compileMain("include_file 'vars.mf'");
      expect(error).toBeUndefined();
      expect(compilation.topScope.lookup('y')).toBe(2);
    });

    it('resolves nested includes against the including file', () => {
      const { compilation } = compileFile(path.join(root, 'nested/main.mf'));
      expect(compilation.topScope.lookup('seen')).toBe('yes');
    });

    it('reads and evaluates the file again on every call', () => {
      const fileParser = createFileUnitParser();
      const parseFile = vi.fn((file: string, environment: Environment) =>
        fileParser.parseFile(file, environment)
      );
      const environment = createEnvironment({
        functions: {
          include_file: createIncludeFileFunction({ unitParser: { parseFile } }),
        },
      });

      const { compilation, error } = compileMain(
        "define wrap { include_file('res.mf') }\nwrap { ['a', 'b']: }",
        environment
      );

      expect(error).toBeUndefined();
      expect(parseFile).toHaveBeenCalledTimes(2);
      expect(compilation.catalog.getResource('file', '/tmp/a')).toBeDefined();
      expect(compilation.catalog.getResource('file', '/tmp/b')).toBeDefined();
    });
  });

  describe('includeFile', () => {
    it('resolves the path and splices the unit into the caller scope', () => {
      const compilation = createCompilation();
      const caller: CallerContext = {
        file: '/site/some/resource.mf',
        line: 4,
        location: { line: 4, column: 1, offset: 30 },
        environment: compilation.environment,
        scope: compilation.topScope,
        compilation,
      };
      const requested: string[] = [];
      const unitParser: UnitParser = {
        parseFile(file, environment) {
          requested.push(file);
          return parseUnit("$metavars = ['foo', 'bar', 'baz']", {
            file,
            environment,
          });
        },
      };

      includeFile('../inc/metavars.mf', caller, { unitParser });

      expect(requested).toEqual(['/site/some/../inc/metavars.mf']);
      expect(caller.scope.lookup('metavars')).toEqual(['foo', 'bar', 'baz']);
    });

    it('works against an in-memory unit parser', () => {
      const files = new Map([['/virtual/common.mf', "$shared = 'yes'"]]);
      const unitParser: UnitParser = {
        parseFile(file, environment) {
          const source = files.get(file);
          if (source === undefined) throw new FileNotFoundError(file, 'ENOENT');
          return parseUnit(source, { file, environment });
        },
      };
      const environment = createEnvironment({
        functions: { include_file: createIncludeFileFunction({ unitParser }) },
      });

      const { compilation } = compileSource("include_file('common.mf')", {
        environment,
        file: '/virtual/init.mf',
      });

      expect(compilation.topScope.lookup('shared')).toBe('yes');
      expect(() =>
        compileSource("include_file('other.mf')", {
          environment,
          file: '/virtual/init.mf',
        })
      ).toThrow(FileNotFoundError);
    });
  });

  describe('failures', () => {
    it('throws FileNotFoundError and leaves the caller scope unmodified', () => {
      const { compilation, error } = compileMain(
        "$before = 1\ninclude_file('missing.mf')\n$after = 2"
      );
      expect(error).toBeInstanceOf(FileNotFoundError);
      if (!(error instanceof FileNotFoundError)) return;
      expect(error.path).toBe(path.join(root, 'missing.mf'));
      expect([...compilation.topScope.ownVariables().keys()]).toEqual(['before']);
    });

    it('throws FileNotFoundError for a directory', () => {
      const { error } = compileMain("include_file('sub')");
      expect(error).toBeInstanceOf(FileNotFoundError);
      if (!(error instanceof FileNotFoundError)) return;
      expect(error.context?.['reason']).toBe('EISDIR');
    });

    it('throws EmptyFileError and leaves the caller scope unmodified', () => {
      for (const name of ['empty.mf', 'comments.mf']) {
        const { compilation, error } = compileMain(
          `$before = 1\ninclude_file('${name}')`
        );
        expect(error).toBeInstanceOf(EmptyFileError);
        expect([...compilation.topScope.ownVariables().keys()]).toEqual([
          'before',
        ]);
      }
    });

    it('throws ParseError identifying the included file', () => {
      const { compilation, error } = compileMain(
        "$before = 'kept'\ninclude_file('broken.mf')"
      );
      expect(error).toBeInstanceOf(ParseError);
      if (!(error instanceof ParseError)) return;
      expect(error.file).toBe(path.join(root, 'broken.mf'));
      expect(error.location?.line).toBe(1);
      expect(compilation.topScope.lookup('before')).toBe('kept');
    });

    it('propagates evaluation errors unwrapped without rollback', () => {
      const { compilation, error } = compileMain("include_file('partial.mf')");
      expect(error).toBeInstanceOf(RuntimeError);
      if (!(error instanceof RuntimeError)) return;
      expect(error.errorId).toBe('MF-R008');
      expect(error.file).toBe(path.join(root, 'partial.mf'));
      expect(error.location?.line).toBe(2);
      expect(compilation.topScope.lookup('a')).toBe(1);
      expect(compilation.topScope.lookup('b')).toBeUndefined();
      expect(compilation.topScope.lookup('c')).toBeUndefined();
    });

    it('throws InvalidPathError at the call site for empty paths', () => {
      const { error } = compileMain("$x = 1\ninclude_file('')");
      expect(error).toBeInstanceOf(InvalidPathError);
      if (!(error instanceof InvalidPathError)) return;
      expect(error.message).toBe(
        `Invalid include path '': path is empty at ${main}:2:1`
      );
    });

    it('throws InvalidPathError for paths that are not strings', () => {
      const { error } = compileMain('include_file(42)');
      expect(error).toBeInstanceOf(InvalidPathError);
      if (!(error instanceof InvalidPathError)) return;
      expect(error.reason).toBe("Invalid include path '42': path must be a string");
    });

    it('requires exactly one argument', () => {
      expect(compileMain('include_file()').error).toEqual(
        expect.objectContaining({
          errorId: 'MF-R001',
          reason: "Function include_file requires argument 'path'",
        })
      );
      expect(compileMain("include_file('a.mf', 'b.mf')").error).toEqual(
        expect.objectContaining({
          reason: 'Function include_file expects 1 argument, got 2',
        })
      );
    });

    it('cannot be used as a value', () => {
      expect(() =>
        compileSource("$x = include_file('vars.mf')", { file: main })
      ).toThrow("Function 'include_file' does not return a value");
    });
  });

  describe('self-inclusion', () => {
    it('is not detected and recurses until maxDepth', () => {
      try {
        compileFile(path.join(root, 'self.mf'), { maxDepth: 5 });
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(RuntimeError);
        if (!(err instanceof RuntimeError)) return;
        expect(err.errorId).toBe('MF-R010');
        expect(err.reason).toBe('Maximum evaluation depth of 5 exceeded');
        expect(err.file).toBe(path.join(root, 'self.mf'));
      }
    });

    it('is stopped by the default depth limit', () => {
      expect(() => compileFile(path.join(root, 'self.mf'))).toThrow(
        'Maximum evaluation depth of 200 exceeded'
      );
    });
  });

  describe('tracing', () => {
    it('emits an IncludeEvent for each phase', () => {
      const onInclude = vi.fn<(event: IncludeEvent) => void>();
      const compilation = createCompilation({ observability: { onInclude } });
      compileInto(compilation, "$x = 1\ninclude_file('vars.mf')", main);

      const common = {
        path: 'vars.mf',
        resolvedPath: path.join(root, 'vars.mf'),
        callerFile: main,
        line: 2,
      };
      expect(onInclude.mock.calls.map(([event]) => event)).toEqual([
        { phase: 'insert', ...common },
        { phase: 'parse', ...common },
        { phase: 'evaluate', ...common },
        { phase: 'done', ...common },
      ]);
    });

    it('stops emitting at the failing phase', () => {
      const onInclude = vi.fn<(event: IncludeEvent) => void>();
      const compilation = createCompilation({ observability: { onInclude } });
      expect(() =>
        compileInto(compilation, "include_file('missing.mf')", main)
      ).toThrow(FileNotFoundError);
      expect(onInclude.mock.calls.map(([event]) => event.phase)).toEqual([
        'insert',
        'parse',
      ]);
    });

    describe('default logger', () => {
      afterEach(() => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
      });

      it('resolves its level per environment like the compiler logger', () => {
        const createLoggerSpy = vi.spyOn(winston, 'createLogger');

        vi.stubEnv('MANIFOLD_LOG_LEVEL', 'error');
        compileMain("include_file('vars.mf')");
        vi.stubEnv('MANIFOLD_LOG_LEVEL', 'debug');
        compileMain("include_file('vars.mf')");

        const includeLevels = createLoggerSpy.mock.results.flatMap((result) =>
          result.type === 'return' && result.value.defaultMeta?.service === 'include'
            ? [result.value.level]
            : []
        );
        expect(includeLevels).toEqual(['error', 'debug']);
      });

      it('creates no logger until include_file is called', () => {
        const createLoggerSpy = vi.spyOn(winston, 'createLogger');
        createIncludeFileFunction();
        expect(createLoggerSpy).not.toHaveBeenCalled();
      });
    });

    it('writes debug trace lines to the include logger', () => {
      const logger = createLogger('include', 'debug');
      const debug = vi.spyOn(logger, 'debug');
      const environment = createEnvironment({
        functions: { include_file: createIncludeFileFunction({ logger }) },
      });

      const { error } = compileMain("$x = 1\ninclude_file('vars.mf')", environment);

      expect(error).toBeUndefined();
      const meta = { file: main, line: 2 };
      expect(debug.mock.calls).toEqual([
        [`inserting 'vars.mf' into '${main}' at line 2`, meta],
        ["parsing 'vars.mf'", meta],
        ["evaluating the ast from 'vars.mf'", meta],
        [`done inserting 'vars.mf' into '${main}' at line 2`, meta],
      ]);
    });
  });
});
