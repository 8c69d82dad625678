/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime' | 'include' | 'config';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: MF-{category letter}{3-digit} (e.g., MF-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (MF-L0xx)
  {
    errorId: 'MF-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'A quoted string was opened but never closed before end of file.',
    resolution: 'Add the closing quote.',
  },
  {
    errorId: 'MF-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: "Unexpected character '{char}'",
    cause: 'Character is not part of the manifest syntax.',
    resolution: 'Remove the character or quote it inside a string.',
  },
  {
    errorId: 'MF-L003',
    category: 'lexer',
    description: 'Unterminated block comment',
    messageTemplate: 'Unterminated block comment',
    cause: 'A /* comment was opened but never closed.',
    resolution: 'Close the comment with */.',
  },

  // Parse Errors (MF-P0xx)
  {
    errorId: 'MF-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Syntax error at {token}',
    cause: 'Token cannot start or continue the construct being parsed.',
    resolution: 'Check for a missing brace, comma or quote before this token.',
  },
  {
    errorId: 'MF-P002',
    category: 'parse',
    description: 'Unknown function',
    messageTemplate: 'Unknown function {name}',
    cause: 'Called function is not registered in the environment.',
    resolution: 'Register the function with the environment or fix the name.',
  },
  {
    errorId: 'MF-P003',
    category: 'parse',
    description: 'Function used in the wrong position',
    messageTemplate: "Function '{name}' {problem}",
    cause:
      'Statement functions return nothing; value functions must be used as values.',
    resolution:
      'Call statement functions on their own line and assign value functions.',
  },
  {
    errorId: 'MF-P004',
    category: 'parse',
    description: 'Expected token missing',
    messageTemplate: '{expected}, got {actual}',
    cause: 'A required delimiter or name is missing.',
    resolution: 'Add the expected token.',
  },
  {
    errorId: 'MF-P005',
    category: 'parse',
    description: 'Reserved parameter name',
    messageTemplate: 'Parameter ${name} is reserved in defined types',
    cause: '$title and $name are bound to the resource title in every instance.',
    resolution: 'Rename the parameter.',
  },

  // Runtime Errors (MF-R0xx)
  {
    errorId: 'MF-R001',
    category: 'runtime',
    description: 'Function argument mismatch',
    messageTemplate: 'Function {name} {problem}',
    cause: 'Wrong number or type of arguments passed to a host function.',
    resolution: 'Check the function signature.',
  },
  {
    errorId: 'MF-R002',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: 'Unknown variable: ${name}',
    cause: 'Variable read before assignment with strict variables enabled.',
    resolution: 'Assign the variable first or disable strictVariables.',
  },
  {
    errorId: 'MF-R003',
    category: 'runtime',
    description: 'Variable reassignment',
    messageTemplate: 'Cannot reassign variable {name}',
    cause: 'Variables are single-assignment within a scope.',
    resolution: 'Use a different variable name.',
  },
  {
    errorId: 'MF-R004',
    category: 'runtime',
    description: 'Duplicate resource declaration',
    messageTemplate:
      'Duplicate declaration: {ref} is already declared at {previous}',
    cause: 'The same type and title were declared twice in one catalog.',
    resolution: 'Declare each resource once.',
  },
  {
    errorId: 'MF-R005',
    category: 'runtime',
    description: 'Unknown resource type',
    messageTemplate: 'Invalid resource type {type}',
    cause: 'Resource type is neither native nor defined.',
    resolution: 'Define the type or add it to resourceTypes.',
  },
  {
    errorId: 'MF-R006',
    category: 'runtime',
    description: 'Missing parameter',
    messageTemplate: 'Must pass {param} to {ref}',
    cause: 'Mandatory parameter of a define or class has no value.',
    resolution: 'Pass the parameter or give it a default.',
  },
  {
    errorId: 'MF-R007',
    category: 'runtime',
    description: 'Invalid parameter',
    messageTemplate: 'Invalid parameter {param} on {ref}',
    cause: 'Attribute is not a parameter of the defined type.',
    resolution: 'Remove the attribute or add the parameter.',
  },
  {
    errorId: 'MF-R008',
    category: 'runtime',
    description: 'Operator type mismatch',
    messageTemplate: 'Operator {op} {problem}',
    cause: 'Operands are not of a type the operator accepts.',
    resolution: 'Convert the operands first.',
  },
  {
    errorId: 'MF-R009',
    category: 'runtime',
    description: 'Explicit failure',
    messageTemplate: '{message}',
    cause: 'The manifest called fail().',
  },
  {
    errorId: 'MF-R010',
    category: 'runtime',
    description: 'Evaluation depth exceeded',
    messageTemplate: 'Maximum evaluation depth of {limit} exceeded',
    cause:
      'Nested function calls, defines or classes went deeper than maxDepth, for example a file that includes itself.',
    resolution: 'Break the include or instantiation cycle, or raise maxDepth.',
  },
  {
    errorId: 'MF-R011',
    category: 'runtime',
    description: 'Unknown class',
    messageTemplate: 'Could not find class {name}',
    cause: 'include() named a class that has not been declared.',
    resolution: 'Declare the class before including it.',
  },
  {
    errorId: 'MF-R012',
    category: 'runtime',
    description: 'Duplicate definition',
    messageTemplate: '{kind} {name} is already defined',
    cause: 'A define or class of the same name exists in this scope.',
    resolution: 'Rename one of the definitions.',
  },
  {
    errorId: 'MF-R013',
    category: 'runtime',
    description: 'Invalid resource title',
    messageTemplate: 'Resource title must be a string, got {actual}',
    cause: 'A resource title evaluated to undef, a boolean or a hash.',
    resolution: 'Use a string title, or an array of string titles.',
  },

  // Include Errors (MF-I0xx)
  {
    errorId: 'MF-I001',
    category: 'include',
    description: 'Invalid include path',
    messageTemplate: "Invalid include path '{path}': {reason}",
    cause: 'include_file was given an empty or malformed path.',
    resolution: 'Pass a non-empty path string.',
  },
  {
    errorId: 'MF-I002',
    category: 'include',
    description: 'Included file not found',
    messageTemplate: "Could not read included file '{path}' ({reason})",
    cause: 'Resolved path does not name a readable regular file.',
    resolution:
      'Check the path; relative paths are resolved against the including file.',
  },
  {
    errorId: 'MF-I003',
    category: 'include',
    description: 'Included file is empty',
    messageTemplate: "Included file '{path}' is empty",
    cause: 'The included file has no statements.',
    resolution: 'Add content to the file or remove the include_file call.',
  },

  // Config Errors (MF-C0xx)
  {
    errorId: 'MF-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause: 'manifold.config.yaml has an unknown key or a value of wrong type.',
    resolution: 'Fix the configuration file.',
  },
];

/** Global error registry instance */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template, replacing `{name}` placeholders with values
 * from context. Missing values render as empty strings; `{{` is a literal
 * brace.
 *
 * @example
 * renderMessage('Unknown function {name}', { name: 'foo' })
 * // 'Unknown function foo'
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) === '{') {
      result += '{';
      i += 2;
      continue;
    }

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        // Unclosed brace - return template unchanged
        return template;
      }
      const value = context[template.slice(i + 1, close)];
      result += value === undefined || value === null ? '' : String(value);
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
