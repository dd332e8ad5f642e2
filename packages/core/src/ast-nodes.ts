import type { SourceSpan } from './source-location.js';
import type { Token } from './token-types.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: readonly StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | ExpressionStmtNode
  | PrintStmtNode
  | VarStmtNode
  | BlockStmtNode
  | IfStmtNode
  | WhileStmtNode
  | FunctionStmtNode
  | ReturnStmtNode
  | ClassStmtNode;

/** Expression evaluated for its side effects: `expr;` */
export interface ExpressionStmtNode extends BaseNode {
  readonly type: 'ExpressionStmt';
  readonly expression: ExpressionNode;
}

export interface PrintStmtNode extends BaseNode {
  readonly type: 'PrintStmt';
  readonly expression: ExpressionNode;
}

/** `var name = initializer;` (initializer optional) */
export interface VarStmtNode extends BaseNode {
  readonly type: 'VarStmt';
  readonly name: Token;
  readonly initializer: ExpressionNode | null;
}

export interface BlockStmtNode extends BaseNode {
  readonly type: 'BlockStmt';
  readonly statements: readonly StatementNode[];
}

export interface IfStmtNode extends BaseNode {
  readonly type: 'IfStmt';
  readonly condition: ExpressionNode;
  readonly thenBranch: StatementNode;
  readonly elseBranch: StatementNode | null;
}

/**
 * While loop. `for` loops have no node of their own: the parser desugars
 * them into a block holding the initializer and a while loop.
 */
export interface WhileStmtNode extends BaseNode {
  readonly type: 'WhileStmt';
  readonly condition: ExpressionNode;
  readonly body: StatementNode;
}

/** Function declaration, also used for class methods */
export interface FunctionStmtNode extends BaseNode {
  readonly type: 'FunctionStmt';
  readonly name: Token;
  readonly params: readonly Token[];
  readonly body: readonly StatementNode[];
}

export interface ReturnStmtNode extends BaseNode {
  readonly type: 'ReturnStmt';
  /** The `return` keyword, kept for error reporting */
  readonly keyword: Token;
  readonly value: ExpressionNode | null;
}

/** `class Name < Superclass { methods }` */
export interface ClassStmtNode extends BaseNode {
  readonly type: 'ClassStmt';
  readonly name: Token;
  readonly superclass: VariableNode | null;
  readonly methods: readonly FunctionStmtNode[];
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | LiteralNode
  | GroupingNode
  | UnaryNode
  | BinaryNode
  | LogicalNode
  | VariableNode
  | AssignNode
  | CallNode
  | GetNode
  | SetNode
  | ThisNode
  | SuperNode;

/** `nil` is represented as null */
export type LiteralValue = number | string | boolean | null;

export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly value: LiteralValue;
}

export interface GroupingNode extends BaseNode {
  readonly type: 'Grouping';
  readonly expression: ExpressionNode;
}

export interface UnaryNode extends BaseNode {
  readonly type: 'Unary';
  readonly operator: Token;
  readonly right: ExpressionNode;
}

export interface BinaryNode extends BaseNode {
  readonly type: 'Binary';
  readonly left: ExpressionNode;
  readonly operator: Token;
  readonly right: ExpressionNode;
}

/** `and` / `or`; kept apart from Binary because they short-circuit */
export interface LogicalNode extends BaseNode {
  readonly type: 'Logical';
  readonly left: ExpressionNode;
  readonly operator: Token;
  readonly right: ExpressionNode;
}

export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly name: Token;
}

export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly name: Token;
  readonly value: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  /** Closing parenthesis, the location reported for call errors */
  readonly paren: Token;
  readonly args: readonly ExpressionNode[];
}

/** Property access: `object.name` */
export interface GetNode extends BaseNode {
  readonly type: 'Get';
  readonly object: ExpressionNode;
  readonly name: Token;
}

/** Property assignment: `object.name = value` */
export interface SetNode extends BaseNode {
  readonly type: 'Set';
  readonly object: ExpressionNode;
  readonly name: Token;
  readonly value: ExpressionNode;
}

export interface ThisNode extends BaseNode {
  readonly type: 'This';
  readonly keyword: Token;
}

/** `super.method` */
export interface SuperNode extends BaseNode {
  readonly type: 'Super';
  readonly keyword: Token;
  readonly method: Token;
}

// ============================================================
// UNION
// ============================================================

export type ASTNode = ProgramNode | StatementNode | ExpressionNode;
