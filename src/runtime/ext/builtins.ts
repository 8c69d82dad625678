/**
 * Built-in Functions
 *
 * Host functions registered with every environment unless disabled.
 */

import { RuntimeError } from '../../types.js';
import { createIncludeFileFunction } from '../../include/include-file.js';
import type { LogLevel } from '../../logger.js';
import type { HostFunctionDefinition } from '../core/callable.js';
import { includeClass } from '../core/execute.js';
import type { CallerContext } from '../core/types.js';
import { formatValue, deepEquals, type ManifoldValue } from '../core/values.js';

/** Message from all arguments, space separated */
function messageOf(args: ManifoldValue[]): string {
  return args.map(formatValue).join(' ');
}

/**
 * Log through the compiler logger, prefixed with the calling scope:
 * `Scope(Class[main]): hello`.
 */
function logFunction(level: LogLevel): HostFunctionDefinition {
  return {
    type: 'statement',
    params: [{ name: 'message', type: 'any' }],
    variadic: true,
    description: `Log a message at ${level} level`,
    fn: (args, caller) => {
      caller.compilation.logger.log(
        level,
        `Scope(${caller.scope.label}): ${messageOf(args)}`,
        { file: caller.file, line: caller.line }
      );
      return null;
    },
  };
}

/** class names from strings or arrays of strings */
function classNames(args: ManifoldValue[], caller: CallerContext): string[] {
  return args.flat().map((arg) => {
    if (typeof arg !== 'string') {
      throw new RuntimeError(
        'MF-R001',
        'Function include expects class names as strings',
        caller.location,
        caller.file,
        { name: 'include', problem: 'expects class names as strings' }
      );
    }
    return arg;
  });
}

/** `$name` asks about a variable; anything else about a function or type */
function isDefined(name: string, caller: CallerContext): boolean {
  if (name.startsWith('$')) {
    return caller.scope.lookup(name.slice(1)) !== undefined;
  }
  return (
    caller.environment.functions.has(name) ||
    caller.environment.resourceTypes.has(name) ||
    caller.scope.lookupDefine(name) !== undefined ||
    caller.scope.lookupClass(name) !== undefined
  );
}

/**
 * Create the built-in function table.
 * Built on demand so that module initialization order never matters.
 */
export function createBuiltinFunctions(): Record<string, HostFunctionDefinition> {
  return {
    include_file: createIncludeFileFunction(),

    include: {
      type: 'statement',
      params: [{ name: 'class', type: 'any' }],
      variadic: true,
      description: 'Evaluate classes once per compilation',
      fn: (args, caller) => {
        for (const name of classNames(args, caller)) {
          includeClass(name, caller);
        }
        return null;
      },
    },

    notice: logFunction('info'),
    info: logFunction('info'),
    debug: logFunction('debug'),
    warning: logFunction('warn'),
    err: logFunction('error'),

    fail: {
      type: 'statement',
      params: [{ name: 'message', type: 'any' }],
      variadic: true,
      description: 'Abort compilation with a message',
      fn: (args, caller) => {
        const message = messageOf(args);
        throw new RuntimeError('MF-R009', message, caller.location, caller.file, {
          message,
        });
      },
    },

    member: {
      type: 'rvalue',
      params: [
        { name: 'array', type: 'array' },
        { name: 'value', type: 'any' },
      ],
      description: 'True when the array contains the value',
      fn: ([array, value]) =>
        Array.isArray(array) &&
        value !== undefined &&
        array.some((item) => deepEquals(item, value)),
    },

    join: {
      type: 'rvalue',
      params: [
        { name: 'array', type: 'array' },
        { name: 'separator', type: 'string', defaultValue: '' },
      ],
      description: 'Join array elements into a string',
      fn: ([array, separator]) =>
        Array.isArray(array) ? array.map(formatValue).join(formatValue(separator ?? '')) : '',
    },

    defined: {
      type: 'rvalue',
      params: [{ name: 'name', type: 'string' }],
      description: 'True when the variable, function, type or class exists',
      fn: ([name], caller) => typeof name === 'string' && isDefined(name, caller),
    },
  };
}
