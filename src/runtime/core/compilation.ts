/**
 * Compilation
 *
 * State of one compilation run: environment, catalog, top scope, options
 * and the evaluation depth counter.
 */

import type { Logger } from 'winston';
import type { SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import { createLogger } from '../../logger.js';
import { Catalog } from './catalog.js';
import { createEnvironment } from './environment.js';
import { Scope } from './scope.js';
import type {
  CompilationOptions,
  Environment,
  ObservabilityCallbacks,
} from './types.js';

export const DEFAULT_MAX_DEPTH = 200;

export class Compilation {
  readonly environment: Environment;
  readonly catalog = new Catalog();
  readonly topScope: Scope;
  /** Reading an unassigned variable is an error instead of undef */
  readonly strictVariables: boolean;
  /** Limit on nested host calls, define instances and class evaluations */
  readonly maxDepth: number;
  readonly logger: Logger;
  readonly observability: ObservabilityCallbacks;
  private currentDepth = 0;

  constructor(options: CompilationOptions = {}) {
    this.environment = options.environment ?? createEnvironment();
    this.strictVariables = options.strictVariables ?? false;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.logger = options.logger ?? createLogger('compiler');
    this.observability = options.observability ?? {};
    this.topScope = new Scope(this, 'Class[main]');
  }

  get depth(): number {
    return this.currentDepth;
  }

  /**
   * Run `body` one evaluation level deeper.
   * @throws RuntimeError MF-R010 when maxDepth would be exceeded
   */
  nested<T>(body: () => T, location?: SourceLocation, file?: string): T {
    if (this.currentDepth >= this.maxDepth) {
      throw new RuntimeError(
        'MF-R010',
        `Maximum evaluation depth of ${this.maxDepth} exceeded`,
        location,
        file,
        { limit: this.maxDepth }
      );
    }
    this.currentDepth++;
    try {
      return body();
    } finally {
      this.currentDepth--;
    }
  }
}

export function createCompilation(options: CompilationOptions = {}): Compilation {
  return new Compilation(options);
}
