/**
 * Scope
 *
 * Variable bindings and define/class definitions. Lookups walk the parent
 * chain; writes only touch the scope itself.
 */

import type { ClassNode, DefineNode, SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import type { ManifoldValue } from './values.js';
import type { Compilation } from './compilation.js';

/** A define or class body together with the file it was declared in */
export interface Definition<T extends DefineNode | ClassNode> {
  readonly node: T;
  readonly file: string;
  /** Scope the definition was declared in */
  readonly scope: Scope;
}

export class Scope {
  private readonly variables = new Map<string, ManifoldValue>();
  private readonly defines = new Map<string, Definition<DefineNode>>();
  private readonly classes = new Map<string, Definition<ClassNode>>();

  constructor(
    readonly compilation: Compilation,
    /** Source description used in log lines: Class[main], Web[site] */
    readonly label: string,
    readonly parent: Scope | undefined = undefined
  ) {}

  /** Outermost scope of the chain */
  get top(): Scope {
    return this.parent === undefined ? this : this.parent.top;
  }

  createChild(label: string): Scope {
    return new Scope(this.compilation, label, this);
  }

  /**
   * Look up a variable. `::name` reads the top scope only.
   * Returns undefined when the variable is not assigned anywhere.
   */
  lookup(name: string): ManifoldValue | undefined {
    if (name.startsWith('::')) {
      return this.top.variables.get(name.slice(2));
    }
    const value = this.variables.get(name);
    if (value !== undefined) return value;
    return this.parent?.lookup(name);
  }

  /**
   * Assign a variable in this scope.
   * @throws RuntimeError MF-R003 when already assigned here
   */
  setVariable(
    name: string,
    value: ManifoldValue,
    location?: SourceLocation,
    file?: string
  ): void {
    if (this.variables.has(name)) {
      throw new RuntimeError(
        'MF-R003',
        `Cannot reassign variable $${name}`,
        location,
        file,
        { name: `$${name}` }
      );
    }
    this.variables.set(name, value);
  }

  /** Variables assigned in this scope, in assignment order */
  ownVariables(): ReadonlyMap<string, ManifoldValue> {
    return this.variables;
  }

  lookupDefine(name: string): Definition<DefineNode> | undefined {
    return this.defines.get(name) ?? this.parent?.lookupDefine(name);
  }

  lookupClass(name: string): Definition<ClassNode> | undefined {
    return this.classes.get(name) ?? this.parent?.lookupClass(name);
  }

  /** @throws RuntimeError MF-R012 when the name is taken in this scope */
  addDefine(definition: Definition<DefineNode>): void {
    const { name } = definition.node;
    if (this.defines.has(name)) {
      throw RuntimeError.fromNode(
        'MF-R012',
        `Defined type ${name} is already defined`,
        definition.node,
        definition.file,
        { kind: 'Defined type', name }
      );
    }
    this.defines.set(name, definition);
  }

  /** @throws RuntimeError MF-R012 when the name is taken in this scope */
  addClass(definition: Definition<ClassNode>): void {
    const { name } = definition.node;
    if (this.classes.has(name)) {
      throw RuntimeError.fromNode(
        'MF-R012',
        `Class ${name} is already defined`,
        definition.node,
        definition.file,
        { kind: 'Class', name }
      );
    }
    this.classes.set(name, definition);
  }
}
