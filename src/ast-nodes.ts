import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// COMPILATION UNITS
// ============================================================

/**
 * Whole program, produced by `parse()`.
 * The compiler evaluates it as the body of the implicit `main` class.
 */
export interface ManifestNode extends BaseNode {
  readonly type: 'Manifest';
  readonly file: string | null;
  readonly statements: StatementNode[];
}

/**
 * Single compilation unit, produced by `parseUnit()`.
 * Carries no top-level semantics: it is spliced into an existing scope.
 */
export interface UnitNode extends BaseNode {
  readonly type: 'Unit';
  readonly file: string | null;
  readonly statements: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | AssignmentNode
  | CallNode
  | IfNode
  | UnlessNode
  | CaseNode
  | DefineNode
  | ClassNode
  | ResourceNode;

/** $name = value */
export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  readonly name: string;
  readonly value: ExpressionNode;
}

export interface ConditionalBranch {
  readonly condition: ExpressionNode;
  readonly body: StatementNode[];
}

/** if cond { } elsif cond { } else { } */
export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly branches: ConditionalBranch[];
  readonly otherwise: StatementNode[] | null;
}

/** unless cond { } else { } */
export interface UnlessNode extends BaseNode {
  readonly type: 'Unless';
  readonly condition: ExpressionNode;
  readonly body: StatementNode[];
  readonly otherwise: StatementNode[] | null;
}

export interface CaseClauseNode extends BaseNode {
  readonly type: 'CaseClause';
  /** Empty for the `default` clause */
  readonly matches: ExpressionNode[];
  readonly isDefault: boolean;
  readonly body: StatementNode[];
}

/** case subject { 'a', 'b': { } default: { } } */
export interface CaseNode extends BaseNode {
  readonly type: 'Case';
  readonly subject: ExpressionNode;
  readonly clauses: CaseClauseNode[];
}

export interface ParamNode extends BaseNode {
  readonly type: 'Param';
  readonly name: string;
  /** null = mandatory parameter */
  readonly defaultValue: ExpressionNode | null;
}

/** define name($p, $q = 1) { body } */
export interface DefineNode extends BaseNode {
  readonly type: 'Define';
  readonly name: string;
  readonly params: ParamNode[];
  readonly body: StatementNode[];
}

/** class name($p = 1) { body } */
export interface ClassNode extends BaseNode {
  readonly type: 'Class';
  readonly name: string;
  readonly params: ParamNode[];
  readonly body: StatementNode[];
}

export interface AttributeNode extends BaseNode {
  readonly type: 'Attribute';
  readonly name: string;
  readonly value: ExpressionNode;
}

export interface ResourceBodyNode extends BaseNode {
  readonly type: 'ResourceBody';
  /** A string title, or an array of titles declaring one resource each */
  readonly title: ExpressionNode;
  readonly attributes: AttributeNode[];
}

/** type { 'title': attr => value; 'other': attr => value } */
export interface ResourceNode extends BaseNode {
  readonly type: 'Resource';
  readonly resourceType: string;
  readonly bodies: ResourceBodyNode[];
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | StringLiteralNode
  | InterpolatedStringNode
  | NumberLiteralNode
  | BoolLiteralNode
  | UndefLiteralNode
  | BareWordNode
  | ArrayLiteralNode
  | HashLiteralNode
  | VariableNode
  | AccessNode
  | CallNode
  | UnaryExprNode
  | BinaryExprNode;

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

/** "text $var ${other}" */
export interface InterpolatedStringNode extends BaseNode {
  readonly type: 'InterpolatedString';
  readonly parts: (string | VariableNode)[];
}

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface UndefLiteralNode extends BaseNode {
  readonly type: 'UndefLiteral';
}

/** Unquoted word in value position: `ensure => present` */
export interface BareWordNode extends BaseNode {
  readonly type: 'BareWord';
  readonly value: string;
}

export interface ArrayLiteralNode extends BaseNode {
  readonly type: 'ArrayLiteral';
  readonly elements: ExpressionNode[];
}

export interface HashEntryNode extends BaseNode {
  readonly type: 'HashEntry';
  readonly key: ExpressionNode;
  readonly value: ExpressionNode;
}

export interface HashLiteralNode extends BaseNode {
  readonly type: 'HashLiteral';
  readonly entries: HashEntryNode[];
}

/** $name, or $::name for a top-scope lookup */
export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly name: string;
}

/** target[key] */
export interface AccessNode extends BaseNode {
  readonly type: 'Access';
  readonly target: ExpressionNode;
  readonly key: ExpressionNode;
}

/**
 * Function call. `kind` records where the call appeared:
 * statement position, or as a value inside an expression.
 */
export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly name: string;
  readonly args: ExpressionNode[];
  readonly kind: FunctionKind;
}

export type FunctionKind = 'statement' | 'rvalue';

export type UnaryOp = '-' | '!';

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export type BinaryOp =
  | 'or'
  | 'and'
  | '=='
  | '!='
  | '<'
  | '>'
  | '<='
  | '>='
  | 'in'
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export type ASTNode =
  | ManifestNode
  | UnitNode
  | StatementNode
  | ExpressionNode
  | CaseClauseNode
  | ParamNode
  | AttributeNode
  | ResourceBodyNode
  | HashEntryNode;

export type NodeType = ASTNode['type'];
