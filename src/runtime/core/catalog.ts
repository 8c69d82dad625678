/**
 * Catalog
 *
 * Ordered collection of declared resources and evaluated classes produced
 * by one compilation.
 */

import type { SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import type { ManifoldHash } from './values.js';

export interface CatalogResource {
  /** Type as written in the manifest: file, ns::thing */
  readonly type: string;
  readonly title: string;
  readonly parameters: ManifoldHash;
  /** File the declaration appeared in */
  readonly file: string;
  readonly line: number;
}

/** Serializable form of a catalog, as printed by the CLI */
export interface CatalogData {
  readonly classes: string[];
  readonly resources: {
    readonly ref: string;
    readonly file: string;
    readonly line: number;
    readonly parameters: ManifoldHash;
  }[];
}

/**
 * Reference string for a resource: each `::` segment of the type is
 * capitalized, `file` + `/tmp/x` gives `File[/tmp/x]`.
 */
export function resourceRef(type: string, title: string): string {
  const name = type
    .split('::')
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join('::');
  return `${name}[${title}]`;
}

export class Catalog {
  private readonly resourcesByRef = new Map<string, CatalogResource>();
  private readonly classNames: string[] = [];

  /**
   * @throws RuntimeError MF-R004 when the type and title are already declared
   */
  addResource(resource: CatalogResource, location?: SourceLocation): void {
    const ref = resourceRef(resource.type, resource.title);
    const previous = this.resourcesByRef.get(ref);
    if (previous) {
      const at = `${previous.file}:${previous.line}`;
      throw new RuntimeError(
        'MF-R004',
        `Duplicate declaration: ${ref} is already declared at ${at}`,
        location,
        resource.file,
        { ref, previous: at }
      );
    }
    this.resourcesByRef.set(ref, resource);
  }

  getResource(type: string, title: string): CatalogResource | undefined {
    return this.resourcesByRef.get(resourceRef(type, title));
  }

  /** Resources in declaration order */
  resources(): CatalogResource[] {
    return [...this.resourcesByRef.values()];
  }

  get size(): number {
    return this.resourcesByRef.size;
  }

  addClass(name: string): void {
    if (!this.classNames.includes(name)) this.classNames.push(name);
  }

  hasClass(name: string): boolean {
    return this.classNames.includes(name);
  }

  /** Evaluated classes in evaluation order */
  classes(): string[] {
    return [...this.classNames];
  }

  toData(): CatalogData {
    return {
      classes: this.classes(),
      resources: this.resources().map((resource) => ({
        ref: resourceRef(resource.type, resource.title),
        file: resource.file,
        line: resource.line,
        parameters: resource.parameters,
      })),
    };
  }
}
