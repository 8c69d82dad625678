/**
 * Environment
 * Registry of host functions and native resource types
 */

import { createBuiltinFunctions } from '../ext/builtins.js';
import type { HostFunctionDefinition } from './callable.js';
import type { Environment } from './types.js';

/** Resource types every environment accepts */
export const NATIVE_RESOURCE_TYPES: readonly string[] = [
  'file',
  'package',
  'service',
  'exec',
  'notify',
  'user',
  'group',
  'cron',
  'host',
];

export interface EnvironmentOptions {
  name?: string | undefined;
  /** Extra host functions; a name already taken by a builtin replaces it */
  functions?: Record<string, HostFunctionDefinition> | undefined;
  /** Resource types added to the native ones */
  resourceTypes?: readonly string[] | undefined;
  /** Register the built-in functions (default true) */
  builtins?: boolean | undefined;
}

/**
 * Create an environment with the built-in functions (include_file among
 * them) and the native resource types.
 *
 * @example
 * ```typescript
 * const environment = createEnvironment({
 *   resourceTypes: ['vhost'],
 *   functions: { upcase: { type: 'rvalue', params: [...], fn } },
 * });
 * ```
 */
export function createEnvironment(options: EnvironmentOptions = {}): Environment {
  const functions = new Map<string, HostFunctionDefinition>();

  if (options.builtins !== false) {
    for (const [name, definition] of Object.entries(createBuiltinFunctions())) {
      functions.set(name, definition);
    }
  }
  for (const [name, definition] of Object.entries(options.functions ?? {})) {
    functions.set(name, definition);
  }

  return {
    name: options.name ?? 'production',
    functions,
    resourceTypes: new Set([
      ...NATIVE_RESOURCE_TYPES,
      ...(options.resourceTypes ?? []),
    ]),
  };
}
