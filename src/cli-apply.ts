#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main(), parseArgs() and applyManifest() for the
 * manifold-apply binary: compile a manifest and print its catalog.
 */

import * as path from 'path';
import { loadConfig, loadConfigFile, type ManifoldConfig } from './config.js';
import { createIncludeFileFunction } from './include/index.js';
import { createLogger, resolveLogLevel } from './logger.js';
import { compileFile, createEnvironment } from './runtime/index.js';
import {
  determineExitCode,
  formatCatalog,
  formatError,
  type OutputFormat,
  UsageError,
  VERSION,
} from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'apply';
      file: string;
      format: OutputFormat;
      /** Flags left undefined fall back to the configuration file */
      strictVariables: boolean | undefined;
      maxDepth: number | undefined;
      configPath: string | undefined;
      debug: boolean;
    }
  | { mode: 'help' | 'version' };

export type ApplyArgs = Extract<ParsedArgs, { mode: 'apply' }>;

const USAGE = `Usage:
  manifold-apply <manifest.mf> [options]  Compile a manifest and print its catalog
  manifold-apply --help                   Show this help message
  manifold-apply --version                Show version information

Options:
  --format yaml|json    Output format (default: yaml)
  --strict-variables    Fail on unassigned variables
  --max-depth N         Limit nested calls, defines and classes
  --config PATH         Configuration file (default: manifold.config.yaml
                        beside the manifest)
  --debug               Log at debug level, including include_file traces

Exit codes:
  0  success
  1  compile error
  2  usage or configuration error`;

/** Value following an option, or a UsageError */
function optionValue(argv: string[], index: number, option: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`Missing value for ${option}`);
  }
  return value;
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws UsageError on unknown options, bad values or a missing manifest
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  let format: OutputFormat = 'yaml';
  let strictVariables: boolean | undefined;
  let maxDepth: number | undefined;
  let configPath: string | undefined;
  let debug = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    switch (arg) {
      case '--format': {
        const value = optionValue(argv, i, arg);
        if (value !== 'yaml' && value !== 'json') {
          throw new UsageError(`Invalid format: ${value} (must be yaml or json)`);
        }
        format = value;
        i++;
        break;
      }
      case '--strict-variables':
        strictVariables = true;
        break;
      case '--max-depth': {
        const value = optionValue(argv, i, arg);
        const depth = Number(value);
        if (!Number.isInteger(depth) || depth < 1) {
          throw new UsageError(`Invalid max depth: ${value}`);
        }
        maxDepth = depth;
        i++;
        break;
      }
      case '--config':
        configPath = optionValue(argv, i, arg);
        i++;
        break;
      case '--debug':
        debug = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (file !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        file = arg;
    }
  }

  if (file === undefined) {
    throw new UsageError('Missing manifest argument');
  }

  return { mode: 'apply', file, format, strictVariables, maxDepth, configPath, debug };
}

/** Configuration from --config, or from beside the manifest */
function readConfig(args: ApplyArgs): ManifoldConfig | null {
  if (args.configPath !== undefined) {
    return loadConfigFile(args.configPath);
  }
  return loadConfig(path.dirname(path.resolve(args.file)));
}

/**
 * Compile a manifest with configuration and flags applied.
 * Command-line flags override the configuration file.
 *
 * @returns the formatted catalog
 */
export function applyManifest(args: ApplyArgs): string {
  const config = readConfig(args);
  const level = args.debug ? 'debug' : resolveLogLevel(config?.logLevel);
  const cliLogger = createLogger('cli', level);

  if (config) {
    cliLogger.debug(`loaded configuration for '${args.file}'`, { config });
  }

  const environment = createEnvironment({
    resourceTypes: config?.resourceTypes,
    functions: {
      include_file: createIncludeFileFunction({
        logger: createLogger('include', level),
      }),
    },
  });

  cliLogger.info(`compiling '${args.file}'`);
  const { catalog } = compileFile(args.file, {
    environment,
    strictVariables: args.strictVariables ?? config?.strictVariables,
    maxDepth: args.maxDepth ?? config?.maxDepth,
    logger: createLogger('compiler', level),
  });
  cliLogger.info(`compiled ${catalog.size} resources`);

  return formatCatalog(catalog.toData(), args.format);
}

/**
 * Entry point for the manifold-apply binary
 *
 * Writes the catalog to stdout and errors to stderr, then exits with
 * 0 on success, 1 on compile errors and 2 on usage or configuration errors.
 */
export function main(): void {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(VERSION);
        return;

      case 'apply':
        console.log(applyManifest(parsed));
        return;
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error));
    if (error instanceof UsageError) {
      console.error(USAGE);
    }
    process.exit(determineExitCode(error));
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
