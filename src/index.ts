/**
 * Manifold Module
 * Exports lexer, parser, runtime, include_file and AST types
 */

export { LexerError, tokenize, type TokenizeOptions } from './lexer/index.js';
export {
  parse,
  parseUnit,
  type ParserEnvironment,
  type ParserOptions,
} from './parser/index.js';
export * from './runtime/index.js';
export {
  createFileUnitParser,
  createIncludeFileFunction,
  includeFile,
  type IncludeOptions,
  resolveIncludePath,
  spliceAndEvaluate,
  type UnitParser,
  validateIncludePath,
} from './include/index.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  type ManifoldConfig,
  validateConfig,
} from './config.js';
export {
  createLogger,
  DEFAULT_LOG_LEVEL,
  type LogLevel,
  resolveLogLevel,
  type ServiceName,
} from './logger.js';
export { VERSION } from './version.js';
export * from './types.js';
