/**
 * Evaluator Base Class
 *
 * Foundation for the mixin-composed evaluator. Holds the scope and file
 * being evaluated and the helpers every mixin shares.
 *
 * @internal
 */

import type {
  ASTNode,
  ExpressionNode,
  SourceLocation,
  StatementNode,
} from '../../../types.js';
import { RuntimeError } from '../../../types.js';
import type { Compilation } from '../compilation.js';
import type { Scope } from '../scope.js';
import type { ManifoldValue } from '../values.js';

export class EvaluatorBase {
  constructor(
    protected scope: Scope,
    /** Absolute path of the unit being evaluated */
    protected file: string
  ) {}

  protected get compilation(): Compilation {
    return this.scope.compilation;
  }

  /** Start of a node, or a location passed through as is */
  protected getNodeLocation(
    at?: ASTNode | SourceLocation
  ): SourceLocation | undefined {
    if (at === undefined) return undefined;
    return 'span' in at ? at.span.start : at;
  }

  /** RuntimeError located at a node of the current file */
  protected runtimeError(
    errorId: string,
    message: string,
    at?: ASTNode | SourceLocation,
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(
      errorId,
      message,
      this.getNodeLocation(at),
      this.file,
      context
    );
  }

  /**
   * Evaluate `body` with another scope and file current, restoring both
   * afterwards. Used for define and class bodies.
   */
  protected withScope<T>(scope: Scope, file: string, body: () => T): T {
    const savedScope = this.scope;
    const savedFile = this.file;
    this.scope = scope;
    this.file = file;
    try {
      return body();
    } finally {
      this.scope = savedScope;
      this.file = savedFile;
    }
  }

  /** Evaluate statements in order in the current scope */
  evaluateStatements(statements: readonly StatementNode[]): void {
    for (const statement of statements) {
      this.evaluateStatement(statement);
    }
  }

  /**
   * Statement dispatch.
   * NOTE: Stub implementation - provided by CoreMixin.
   */
  evaluateStatement(_node: StatementNode): void {
    throw new Error('evaluateStatement requires full Evaluator composition');
  }

  /**
   * Expression dispatch.
   * NOTE: Stub implementation - provided by CoreMixin.
   */
  evaluateExpression(_node: ExpressionNode): ManifoldValue {
    throw new Error('evaluateExpression requires full Evaluator composition');
  }
}
