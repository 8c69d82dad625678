/**
 * File inclusion: `include_file` and its building blocks
 */

export {
  createIncludeFileFunction,
  includeFile,
  type IncludeOptions,
} from './include-file.js';
export { resolveIncludePath, validateIncludePath } from './resolve.js';
export { spliceAndEvaluate } from './splice.js';
export { createFileUnitParser, type UnitParser } from './unit-parser.js';
