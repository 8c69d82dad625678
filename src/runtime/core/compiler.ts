/**
 * Compiler
 *
 * Parse a manifest from a file or a string and compile it into a catalog.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from '../../parser/index.js';
import type { Catalog } from './catalog.js';
import { createCompilation, type Compilation } from './compilation.js';
import { compile, INLINE_FILE } from './execute.js';
import type { CompilationOptions } from './types.js';

export interface CompileResult {
  readonly catalog: Catalog;
  readonly compilation: Compilation;
}

/**
 * Compile manifest source. Without a file, the manifest is named
 * `<inline>` in the working directory, so relative include_file paths
 * resolve against the working directory.
 */
export function compileSource(
  source: string,
  options: CompilationOptions & { file?: string | undefined } = {}
): CompileResult {
  const compilation = createCompilation(options);
  const file = options.file ?? path.resolve(process.cwd(), INLINE_FILE);
  const manifest = parse(source, {
    file,
    environment: compilation.environment,
  });
  const catalog = compile(manifest, compilation);
  return { catalog, compilation };
}

/** Read and compile a manifest file */
export function compileFile(
  filePath: string,
  options: CompilationOptions = {}
): CompileResult {
  const file = path.resolve(filePath);
  const source = fs.readFileSync(file, 'utf-8');
  return compileSource(source, { ...options, file });
}
