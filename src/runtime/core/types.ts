/**
 * Runtime Types
 *
 * Public types for compilation and host function calls.
 * These types are the primary interface for host applications.
 */

import type { Logger } from 'winston';
import type { SourceLocation } from '../../types.js';
import type { HostFunctionDefinition } from './callable.js';
import type { CatalogResource } from './catalog.js';
import type { Compilation } from './compilation.js';
import type { Scope } from './scope.js';

/**
 * Named registry of host functions and resource types known to a
 * compilation. The parser consults `functions` to reject unknown calls.
 */
export interface Environment {
  readonly name: string;
  readonly functions: Map<string, HostFunctionDefinition>;
  /** Native resource types; defined types live in scopes */
  readonly resourceTypes: Set<string>;
}

/**
 * Everything a host function knows about its call site. Built by the
 * evaluator for each call and passed explicitly.
 */
export interface CallerContext {
  /** Absolute path of the unit containing the call */
  readonly file: string;
  /** 1-based line of the call */
  readonly line: number;
  /** Start of the call expression */
  readonly location: SourceLocation;
  readonly environment: Environment;
  /** Scope the call is evaluated in */
  readonly scope: Scope;
  readonly compilation: Compilation;
}

/** Phases of one include_file invocation */
export type IncludePhase = 'insert' | 'parse' | 'evaluate' | 'done';

/** Event emitted at each include_file phase */
export interface IncludeEvent {
  readonly phase: IncludePhase;
  /** Path as passed to include_file */
  readonly path: string;
  /** Path as resolved against the calling file */
  readonly resolvedPath: string;
  readonly callerFile: string;
  readonly line: number;
}

/** Event emitted when a resource enters the catalog */
export interface ResourceEvent {
  readonly resource: CatalogResource;
}

/** Event emitted before a host function is invoked */
export interface HostCallEvent {
  readonly name: string;
  readonly file: string;
  readonly line: number;
}

/** Observability callbacks for monitoring compilation */
export interface ObservabilityCallbacks {
  /** Called at each phase of include_file */
  onInclude?: (event: IncludeEvent) => void;
  /** Called after a resource is added to the catalog */
  onResource?: (event: ResourceEvent) => void;
  /** Called before a host function is invoked */
  onHostCall?: (event: HostCallEvent) => void;
}

/** Options for creating a compilation */
export interface CompilationOptions {
  environment?: Environment | undefined;
  strictVariables?: boolean | undefined;
  maxDepth?: number | undefined;
  logger?: Logger | undefined;
  observability?: ObservabilityCallbacks | undefined;
}
