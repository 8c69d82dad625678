/**
 * Host Functions
 *
 * Definitions of functions the host registers with an environment, and
 * the argument validation applied before each call.
 */

import type { FunctionKind, SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import type { CallerContext } from './types.js';
import { inferType, type ManifoldTypeName, type ManifoldValue } from './values.js';

/**
 * Host function implementation. Receives validated arguments and the
 * context of the call site. Statement functions return null (undef).
 */
export type HostFunction = (
  args: ManifoldValue[],
  caller: CallerContext
) => ManifoldValue;

/**
 * Parameter metadata for host-provided functions.
 * Parameters with a defaultValue are optional.
 */
export interface HostFunctionParam {
  readonly name: string;
  /** Expected type; 'any' accepts every value */
  readonly type: ManifoldTypeName | 'any';
  readonly defaultValue?: ManifoldValue;
  readonly description?: string;
}

export interface HostFunctionDefinition {
  /** Statement functions return nothing; rvalue functions produce a value */
  readonly type: FunctionKind;
  readonly params: readonly HostFunctionParam[];
  /** Accept any number of extra arguments after the declared params */
  readonly variadic?: boolean;
  readonly fn: HostFunction;
  readonly description?: string;
}

/**
 * Validate arguments against a host function's parameter declarations.
 * Missing optional arguments are filled in from their defaults.
 *
 * @throws RuntimeError MF-R001 on count or type mismatch
 */
export function validateHostFunctionArgs(
  args: ManifoldValue[],
  definition: HostFunctionDefinition,
  functionName: string,
  location?: SourceLocation,
  file?: string
): ManifoldValue[] {
  const { params } = definition;

  if (!definition.variadic && args.length > params.length) {
    throw new RuntimeError(
      'MF-R001',
      `Function ${functionName} expects ${params.length} argument${params.length === 1 ? '' : 's'}, got ${args.length}`,
      location,
      file,
      { name: functionName, expectedCount: params.length, actualCount: args.length }
    );
  }

  const validated = [...args];

  for (let i = 0; i < params.length; i++) {
    const param = params[i];
    if (param === undefined) continue;

    let arg = validated[i];

    if (arg === undefined) {
      if (param.defaultValue === undefined) {
        throw new RuntimeError(
          'MF-R001',
          `Function ${functionName} requires argument '${param.name}'`,
          location,
          file,
          { name: functionName, paramName: param.name }
        );
      }
      arg = param.defaultValue;
      validated[i] = arg;
    }

    const actualType = inferType(arg);
    if (param.type !== 'any' && actualType !== param.type) {
      throw new RuntimeError(
        'MF-R001',
        `Function ${functionName} expects ${param.type} for '${param.name}', got ${actualType}`,
        location,
        file,
        {
          name: functionName,
          paramName: param.name,
          expectedType: param.type,
          actualType,
        }
      );
    }
  }

  return validated;
}
