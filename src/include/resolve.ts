/**
 * Path Resolver
 * Turns an include path into the path of the file to read
 */

import * as path from 'path';
import type { SourceLocation } from '../types.js';
import { InvalidPathError } from '../types.js';
import type { ManifoldValue } from '../runtime/core/values.js';
import { formatValue } from '../runtime/core/values.js';

/**
 * Resolve an include path against the file that contains the call.
 *
 * Absolute paths are returned unchanged. Relative paths are joined to the
 * caller's directory with a single `/`; `.` and `..` segments are kept as
 * written and nothing is checked on disk.
 *
 * @example
 * resolveIncludePath('../inc/metavars.mf', '/site/some/resource.mf')
 * // '/site/some/../inc/metavars.mf'
 */
export function resolveIncludePath(includePath: string, callerFile: string): string {
  if (path.isAbsolute(includePath)) {
    return includePath;
  }
  return `${path.dirname(callerFile)}/${includePath}`;
}

/**
 * Check the include_file argument before resolving it.
 *
 * @throws InvalidPathError for a non-string, an empty or blank string,
 * or a string containing a NUL byte
 */
export function validateIncludePath(
  value: ManifoldValue,
  location?: SourceLocation,
  file?: string
): string {
  if (typeof value !== 'string') {
    throw new InvalidPathError(
      formatValue(value),
      'path must be a string',
      location,
      file
    );
  }
  if (value.trim() === '') {
    throw new InvalidPathError(value, 'path is empty', location, file);
  }
  if (value.includes('\0')) {
    throw new InvalidPathError(
      value.replaceAll('\0', '\\0'),
      'path contains a NUL byte',
      location,
      file
    );
  }
  return value;
}
