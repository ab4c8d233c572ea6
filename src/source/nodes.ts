import type { SourceLocation } from 'estree';

/**
 * Real (parsed) AST of the analysed language.
 *
 * This is the boundary the synthesis engine consumes: every node carries a
 * `type` discriminant and a non-optional `loc`. Location values reuse the
 * ESTree `SourceLocation` shape (1-based lines, 0-based columns).
 *
 * The nodes are plain immutable data. Parent links, child slots, scopes and
 * variable bindings are derived by {@link SourceTree}.
 */
export type { SourceLocation };

type NodeBase = {
  readonly loc: SourceLocation;
};

/** Binary and compound-assignment operator spellings. */
export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '**'
  | '<<'
  | '>>'
  | '&'
  | '|'
  | '^'
  | '&&'
  | '||';

export type Toplevel = NodeBase & {
  readonly type: 'Toplevel';
  readonly body: readonly Statement[];
};

export type ClassDef = NodeBase & {
  readonly type: 'ClassDef';
  readonly name: string;
  readonly body: readonly Statement[];
};

export type MethodDef = NodeBase & {
  readonly type: 'MethodDef';
  readonly name: string;
  readonly params: readonly SimpleParameter[];
  readonly body: readonly Statement[];
};

/** A `{ |x| ... }` or `do |x| ... end` block attached to a call. */
export type Block = NodeBase & {
  readonly type: 'Block';
  readonly params: readonly SimpleParameter[];
  readonly body: readonly Statement[];
};

export type SimpleParameter = NodeBase & {
  readonly type: 'SimpleParameter';
  readonly name: string;
};

export type StmtSequence = NodeBase & {
  readonly type: 'StmtSequence';
  readonly statements: readonly Statement[];
};

/**
 * A method call.
 *
 * - `receiver` absent: `foo(1)` or a bare identifier call `foo`.
 * - `qualified`: the call was written with a scope-resolution prefix
 *   (`::foo()`), so it has no implicit receiver.
 * - Element reference `a[i]` is a call named `[]`.
 */
export type MethodCall = NodeBase & {
  readonly type: 'MethodCall';
  readonly receiver?: Expression;
  readonly name: string;
  readonly args: readonly Expression[];
  readonly block?: Block;
  readonly qualified?: boolean;
};

export type AssignExpr = NodeBase & {
  readonly type: 'AssignExpr';
  readonly left: AssignTarget;
  readonly right: Expression;
};

/** `x += 1`, `a.b ||= c`, `a[i] <<= 2`. */
export type AssignOperation = NodeBase & {
  readonly type: 'AssignOperation';
  readonly operator: BinaryOperator;
  readonly left: VariableAccess | MethodCall;
  readonly right: Expression;
};

export type BinaryOperation = NodeBase & {
  readonly type: 'BinaryOperation';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
};

export type LocalVariableAccess = NodeBase & {
  readonly type: 'LocalVariableAccess';
  readonly name: string;
};

/** `@name`; `name` excludes the sigil. */
export type InstanceVariableAccess = NodeBase & {
  readonly type: 'InstanceVariableAccess';
  readonly name: string;
};

/** `@@name`; `name` excludes the sigil. */
export type ClassVariableAccess = NodeBase & {
  readonly type: 'ClassVariableAccess';
  readonly name: string;
};

/** `$name`; `name` excludes the sigil. */
export type GlobalVariableAccess = NodeBase & {
  readonly type: 'GlobalVariableAccess';
  readonly name: string;
};

export type SelfAccess = NodeBase & {
  readonly type: 'SelfAccess';
};

export type IntegerLiteral = NodeBase & {
  readonly type: 'IntegerLiteral';
  readonly value: number;
};

export type StringLiteral = NodeBase & {
  readonly type: 'StringLiteral';
  readonly value: string;
};

export type ArrayLiteral = NodeBase & {
  readonly type: 'ArrayLiteral';
  readonly elements: readonly Expression[];
};

export type RangeLiteral = NodeBase & {
  readonly type: 'RangeLiteral';
  readonly begin: Expression;
  readonly end: Expression;
  readonly inclusive: boolean;
};

export type SplatExpr = NodeBase & {
  readonly type: 'SplatExpr';
  readonly operand: Expression;
};

/** `Foo` or `Outer::Inner` (with `scope` = `Outer`). */
export type ConstantReadAccess = NodeBase & {
  readonly type: 'ConstantReadAccess';
  readonly name: string;
  readonly scope?: Expression;
};

/**
 * Destructuring left-hand side: `a, *b, (c, d)`.
 *
 * `elements` are the assignment targets with the splat already removed;
 * `restIndex` marks the one element that captures the remaining values.
 */
export type TuplePattern = NodeBase & {
  readonly type: 'TuplePattern';
  readonly elements: readonly AssignTarget[];
  readonly restIndex?: number;
};

export type ForExpr = NodeBase & {
  readonly type: 'ForExpr';
  readonly pattern: VariableAccess | TuplePattern;
  readonly value: Expression;
  readonly body: StmtSequence;
};

export type VariableAccess =
  | LocalVariableAccess
  | InstanceVariableAccess
  | ClassVariableAccess
  | GlobalVariableAccess;

export type AssignTarget = VariableAccess | MethodCall | TuplePattern;

export type Expression =
  | MethodCall
  | AssignExpr
  | AssignOperation
  | BinaryOperation
  | VariableAccess
  | SelfAccess
  | IntegerLiteral
  | StringLiteral
  | ArrayLiteral
  | RangeLiteral
  | SplatExpr
  | ConstantReadAccess
  | ForExpr
  | StmtSequence;

export type Statement = Expression | ClassDef | MethodDef;

export type SourceNode =
  | Toplevel
  | Statement
  | Block
  | SimpleParameter
  | TuplePattern;

export type SourceNodeType = SourceNode['type'];

/** Narrows {@link SourceNode} by its `type` tag. */
export type SourceNodeOf<T extends SourceNodeType> = Extract<
  SourceNode,
  { type: T }
>;

/** Nodes that open a lexical variable scope. */
export type ScopeNode = Toplevel | ClassDef | MethodDef | Block;

/** Nodes that determine what `self` refers to. */
export type SelfScopeNode = Toplevel | ClassDef | MethodDef;
