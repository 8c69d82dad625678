/**
 * Test utilities for Manifold compilation tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  type Catalog,
  compile,
  type Compilation,
  type CompilationOptions,
  compileSource,
  type CompileResult,
  type ManifoldValue,
  parse,
} from '../../src/index.js';

/** File name given to manifests compiled by these helpers */
export const TEST_FILE = '/site/init.mf';

/** Compile manifest source as if read from TEST_FILE */
export function run(
  source: string,
  options: CompilationOptions = {}
): CompileResult {
  return compileSource(source, { ...options, file: TEST_FILE });
}

/** Compile and return a top-scope variable */
export function valueOf(
  source: string,
  name: string,
  options: CompilationOptions = {}
): ManifoldValue | undefined {
  return run(source, options).compilation.topScope.lookup(name);
}

/**
 * Compile into an existing compilation, so that its state can be
 * inspected after a failure.
 */
export function compileInto(
  compilation: Compilation,
  source: string,
  file: string = TEST_FILE
): Catalog {
  const manifest = parse(source, { file, environment: compilation.environment });
  return compile(manifest, compilation);
}

/** Create a temp directory holding the given files (relative paths) */
export function createTree(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'manifold-test-'));
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(root, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
  return root;
}

export function removeTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}
