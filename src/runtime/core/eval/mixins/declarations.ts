/**
 * DeclarationsMixin: Definitions and Resources
 *
 * Registers define/class definitions in the current scope, declares
 * resources into the catalog, instantiates defined types and evaluates
 * classes.
 *
 * Error Handling:
 * - Unknown resource type throws MF-R005
 * - Missing mandatory parameter throws MF-R006, unknown attribute MF-R007
 * - Unknown class throws MF-R011
 *
 * @internal
 */

import type {
  ASTNode,
  AttributeNode,
  ClassNode,
  DefineNode,
  ParamNode,
  ResourceBodyNode,
  ResourceNode,
  SourceLocation,
} from '../../../../types.js';
import { resourceRef, type CatalogResource } from '../../catalog.js';
import type { Definition } from '../../scope.js';
import type { ManifoldHash, ManifoldValue } from '../../values.js';
import { hashGet, hashSet, inferType } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

export function DeclarationsMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase>,
>(Base: TBase) {
  return class DeclarationsEvaluator extends Base {
    evaluateDefine(node: DefineNode): void {
      this.scope.addDefine({ node, file: this.file, scope: this.scope });
    }

    evaluateClass(node: ClassNode): void {
      this.scope.addClass({ node, file: this.file, scope: this.scope });
    }

    /**
     * Declare one resource per title of each body. Native types go
     * straight to the catalog; defined types are also instantiated.
     */
    evaluateResource(node: ResourceNode): void {
      const type = node.resourceType;
      const isNative = this.compilation.environment.resourceTypes.has(type);
      const definition = isNative ? undefined : this.scope.lookupDefine(type);

      if (!isNative && !definition) {
        throw this.runtimeError(
          'MF-R005',
          `Invalid resource type ${type}`,
          node,
          { type }
        );
      }

      for (const body of node.bodies) {
        const titles = this.resourceTitles(body);
        const parameters = this.evaluateAttributes(body.attributes);

        for (const title of titles) {
          const resource: CatalogResource = {
            type,
            title,
            parameters: { ...parameters },
            file: this.file,
            line: body.span.start.line,
          };

          if (definition) {
            this.checkParameters(definition, resource, body);
          }
          this.compilation.catalog.addResource(
            resource,
            this.getNodeLocation(body)
          );
          this.compilation.observability.onResource?.({ resource });

          if (definition) {
            this.instantiateDefine(definition, resource, body);
          }
        }
      }
    }

    /** A string title, or every element of an array title */
    protected resourceTitles(body: ResourceBodyNode): string[] {
      const value = this.evaluateExpression(body.title);
      const values = Array.isArray(value) ? value : [value];

      return values.map((title) => {
        if (typeof title === 'string') return title;
        if (typeof title === 'number') return String(title);
        throw this.runtimeError(
          'MF-R013',
          `Resource title must be a string, got ${inferType(title)}`,
          body.title,
          { actual: inferType(title) }
        );
      });
    }

    /** Attributes set to undef are left out */
    protected evaluateAttributes(attributes: AttributeNode[]): ManifoldHash {
      const parameters: ManifoldHash = {};
      for (const attribute of attributes) {
        const value = this.evaluateExpression(attribute.value);
        if (value !== null) {
          hashSet(parameters, attribute.name, value);
        }
      }
      return parameters;
    }

    /** Reject unknown attributes and missing mandatory parameters */
    protected checkParameters(
      definition: Definition<DefineNode>,
      resource: CatalogResource,
      node: ASTNode
    ): void {
      const ref = resourceRef(resource.type, resource.title);
      const params = definition.node.params;

      for (const key of Object.keys(resource.parameters)) {
        if (!params.some((param) => param.name === key)) {
          throw this.runtimeError(
            'MF-R007',
            `Invalid parameter ${key} on ${ref}`,
            node,
            { param: key, ref }
          );
        }
      }

      this.checkMandatory(params, resource.parameters, ref, node);
    }

    protected checkMandatory(
      params: ParamNode[],
      given: ManifoldHash,
      ref: string,
      at: ASTNode | SourceLocation | undefined
    ): void {
      for (const param of params) {
        if (param.defaultValue === null && !Object.hasOwn(given, param.name)) {
          throw this.runtimeError(
            'MF-R006',
            `Must pass ${param.name} to ${ref}`,
            at,
            { param: param.name, ref }
          );
        }
      }
    }

    /**
     * Evaluate a defined type's body in a child of the scope that holds
     * the definition, with $title, $name and the parameters bound.
     */
    protected instantiateDefine(
      definition: Definition<DefineNode>,
      resource: CatalogResource,
      node: ResourceBodyNode
    ): void {
      const ref = resourceRef(resource.type, resource.title);

      this.compilation.nested(
        () => {
          const child = definition.scope.createChild(ref);
          this.withScope(child, definition.file, () => {
            child.setVariable('title', resource.title);
            child.setVariable('name', resource.title);
            this.bindParameters(definition.node.params, resource.parameters);
            this.evaluateStatements(definition.node.body);
          });
        },
        this.getNodeLocation(node),
        this.file
      );
    }

    /**
     * Evaluate a class once per compilation, in a child of the top scope.
     * Later includes of the same class do nothing.
     */
    includeClass(name: string, at?: ASTNode | SourceLocation): void {
      const catalog = this.compilation.catalog;
      if (catalog.hasClass(name)) return;

      const definition = this.scope.lookupClass(name);
      if (!definition) {
        throw this.runtimeError(
          'MF-R011',
          `Could not find class ${name}`,
          at,
          { name }
        );
      }

      const ref = resourceRef('class', name);
      this.checkMandatory(definition.node.params, {}, ref, at);
      catalog.addClass(name);

      this.compilation.nested(
        () => {
          const child = this.compilation.topScope.createChild(ref);
          this.withScope(child, definition.file, () => {
            this.bindParameters(definition.node.params, {});
            this.evaluateStatements(definition.node.body);
          });
        },
        this.getNodeLocation(at),
        this.file
      );
    }

    /** Bind given values, evaluating defaults in the current scope */
    protected bindParameters(params: ParamNode[], given: ManifoldHash): void {
      for (const param of params) {
        let value: ManifoldValue = null;
        const passed = hashGet(given, param.name);
        if (passed !== undefined) {
          value = passed;
        } else if (param.defaultValue) {
          value = this.evaluateExpression(param.defaultValue);
        }
        this.scope.setVariable(
          param.name,
          value,
          this.getNodeLocation(param),
          this.file
        );
      }
    }
  };
}
