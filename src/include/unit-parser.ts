/**
 * Unit Parser
 *
 * Reads an included file and parses it as a single compilation unit.
 */

import * as fs from 'fs';
import { parseUnit } from '../parser/index.js';
import type { UnitNode } from '../types.js';
import { EmptyFileError, FileNotFoundError } from '../types.js';
import type { Environment } from '../runtime/core/types.js';

/** Turns a file into an unevaluated unit. Hosts may supply their own. */
export interface UnitParser {
  parseFile(absolutePath: string, environment: Environment): UnitNode;
}

/** Error codes that mean "there is no readable file at this path" */
const UNREADABLE_CODES = new Set(['ENOENT', 'EISDIR', 'EACCES', 'ENOTDIR']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function readSource(absolutePath: string): string {
  try {
    return fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    const code = errorCode(error);
    if (code !== undefined && UNREADABLE_CODES.has(code)) {
      throw new FileNotFoundError(absolutePath, code);
    }
    throw error;
  }
}

/**
 * Default unit parser: one synchronous read, then `parseUnit()` with the
 * environment's function registry. Syntax errors carry the file path.
 * The unit is returned unevaluated and never cached.
 *
 * @throws FileNotFoundError when the path is missing, a directory or unreadable
 * @throws EmptyFileError when the file holds no statements
 * @throws ParseError (or LexerError) on invalid syntax
 */
export function createFileUnitParser(): UnitParser {
  return {
    parseFile(absolutePath: string, environment: Environment): UnitNode {
      const source = readSource(absolutePath);
      if (source.trim() === '') {
        throw new EmptyFileError(absolutePath);
      }

      const unit = parseUnit(source, { file: absolutePath, environment });
      if (unit.statements.length === 0) {
        throw new EmptyFileError(absolutePath);
      }
      return unit;
    },
  };
}
