/**
 * Inclusion Statement
 *
 * `include_file(path)`: splice another file's statements into the
 * caller's scope at the point of the call.
 */

import type { Logger } from 'winston';
import { createLogger } from '../logger.js';
import type { HostFunctionDefinition } from '../runtime/core/callable.js';
import type {
  CallerContext,
  IncludeEvent,
  IncludePhase,
} from '../runtime/core/types.js';
import { resolveIncludePath, validateIncludePath } from './resolve.js';
import { spliceAndEvaluate } from './splice.js';
import { createFileUnitParser, type UnitParser } from './unit-parser.js';

export interface IncludeOptions {
  /** Source of parsed units (default: read and parse from disk) */
  unitParser?: UnitParser | undefined;
  /** Receives the debug trace (default: the `include` service logger) */
  logger?: Logger | undefined;
}

/**
 * Include a file at the caller's position.
 *
 * Runs Received → Resolved → Parsed → Evaluated → Done. Nothing is caught:
 * path, file, syntax and evaluation errors reach the caller as raised,
 * and statements evaluated before a failure are not undone.
 *
 * @example
 * ```typescript
 * includeFile('../inc/metavars.mf', caller);
 * ```
 */
export function includeFile(
  includePath: string,
  caller: CallerContext,
  options: IncludeOptions = {}
): void {
  const logger = options.logger ?? createLogger('include');
  const unitParser = options.unitParser ?? createFileUnitParser();
  const { onInclude } = caller.compilation.observability;

  const resolvedPath = resolveIncludePath(includePath, caller.file);
  const trace = (phase: IncludePhase, message: string): void => {
    logger.debug(message, { file: caller.file, line: caller.line });
    const event: IncludeEvent = {
      phase,
      path: includePath,
      resolvedPath,
      callerFile: caller.file,
      line: caller.line,
    };
    onInclude?.(event);
  };

  trace(
    'insert',
    `inserting '${includePath}' into '${caller.file}' at line ${caller.line}`
  );

  trace('parse', `parsing '${includePath}'`);
  const unit = unitParser.parseFile(resolvedPath, caller.environment);

  trace('evaluate', `evaluating the ast from '${includePath}'`);
  spliceAndEvaluate(unit, caller.scope);

  trace(
    'done',
    `done inserting '${includePath}' into '${caller.file}' at line ${caller.line}`
  );
}

/**
 * Host function definition for `include_file`: a statement function
 * taking one string. Options apply to every call made through it.
 * Without a logger, one `include` logger is created on the first call.
 */
export function createIncludeFileFunction(
  options: IncludeOptions = {}
): HostFunctionDefinition {
  let logger = options.logger;
  return {
    type: 'statement',
    params: [{ name: 'path', type: 'any' }],
    description: "Evaluate another file's statements in the calling scope",
    fn: ([path], caller) => {
      const includePath = validateIncludePath(
        path ?? null,
        caller.location,
        caller.file
      );
      logger ??= createLogger('include');
      includeFile(includePath, caller, { ...options, logger });
      return null;
    },
  };
}
