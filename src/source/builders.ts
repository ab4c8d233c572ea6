import type {
  ArrayLiteral,
  AssignExpr,
  AssignOperation,
  AssignTarget,
  BinaryOperation,
  BinaryOperator,
  Block,
  ClassDef,
  ClassVariableAccess,
  ConstantReadAccess,
  Expression,
  ForExpr,
  GlobalVariableAccess,
  InstanceVariableAccess,
  IntegerLiteral,
  LocalVariableAccess,
  MethodCall,
  MethodDef,
  RangeLiteral,
  SelfAccess,
  SimpleParameter,
  SourceLocation,
  SplatExpr,
  Statement,
  StmtSequence,
  StringLiteral,
  Toplevel,
  TuplePattern,
  VariableAccess
} from './nodes';

/**
 * Location given to nodes built without one.
 */
export const UNKNOWN_LOCATION: SourceLocation = {
  start: { line: 1, column: 0 },
  end: { line: 1, column: 0 }
};

/**
 * Creates a location on one line (or spanning to `endLine`).
 *
 * @example span(3, 2, 9) // line 3, columns 2..9
 */
export function span(
  line: number,
  column: number,
  endColumn: number,
  endLine: number = line
): SourceLocation {
  return {
    start: { line, column },
    end: { line: endLine, column: endColumn }
  };
}

export type CallOptions = {
  block?: Block;
  qualified?: boolean;
  loc?: SourceLocation;
};

function param(name: string, loc: SourceLocation): SimpleParameter {
  return { type: 'SimpleParameter', name, loc };
}

function seq(statements: Statement[], loc: SourceLocation): StmtSequence {
  return { type: 'StmtSequence', statements, loc };
}

function call(
  receiver: Expression | undefined,
  name: string,
  args: Expression[],
  options: CallOptions
): MethodCall {
  return {
    type: 'MethodCall',
    name,
    args,
    loc: options.loc ?? UNKNOWN_LOCATION,
    ...(receiver ? { receiver } : {}),
    ...(options.block ? { block: options.block } : {}),
    ...(options.qualified ? { qualified: true } : {})
  };
}

/**
 * Constructors for real AST nodes.
 *
 * Each call creates a fresh node object; a node must not be shared between
 * two parents of the same tree.
 */
export const ast = {
  toplevel(body: Statement[], loc = UNKNOWN_LOCATION): Toplevel {
    return { type: 'Toplevel', body, loc };
  },

  classDef(name: string, body: Statement[], loc = UNKNOWN_LOCATION): ClassDef {
    return { type: 'ClassDef', name, body, loc };
  },

  methodDef(
    name: string,
    params: string[],
    body: Statement[],
    loc = UNKNOWN_LOCATION
  ): MethodDef {
    return {
      type: 'MethodDef',
      name,
      params: params.map(p => param(p, loc)),
      body,
      loc
    };
  },

  block(params: string[], body: Statement[], loc = UNKNOWN_LOCATION): Block {
    return {
      type: 'Block',
      params: params.map(p => param(p, loc)),
      body,
      loc
    };
  },

  param(name: string, loc = UNKNOWN_LOCATION): SimpleParameter {
    return param(name, loc);
  },

  seq(statements: Statement[], loc = UNKNOWN_LOCATION): StmtSequence {
    return seq(statements, loc);
  },

  call(
    receiver: Expression | undefined,
    name: string,
    args: Expression[] = [],
    options: CallOptions = {}
  ): MethodCall {
    return call(receiver, name, args, options);
  },

  /** Element reference `receiver[args...]`. */
  index(
    receiver: Expression,
    args: Expression[],
    loc = UNKNOWN_LOCATION
  ): MethodCall {
    return call(receiver, '[]', args, { loc });
  },

  assign(
    left: AssignTarget,
    right: Expression,
    loc = UNKNOWN_LOCATION
  ): AssignExpr {
    return { type: 'AssignExpr', left, right, loc };
  },

  assignOp(
    left: VariableAccess | MethodCall,
    operator: BinaryOperator,
    right: Expression,
    loc = UNKNOWN_LOCATION
  ): AssignOperation {
    return { type: 'AssignOperation', operator, left, right, loc };
  },

  binary(
    left: Expression,
    operator: BinaryOperator,
    right: Expression,
    loc = UNKNOWN_LOCATION
  ): BinaryOperation {
    return { type: 'BinaryOperation', operator, left, right, loc };
  },

  local(name: string, loc = UNKNOWN_LOCATION): LocalVariableAccess {
    return { type: 'LocalVariableAccess', name, loc };
  },

  ivar(name: string, loc = UNKNOWN_LOCATION): InstanceVariableAccess {
    return { type: 'InstanceVariableAccess', name, loc };
  },

  cvar(name: string, loc = UNKNOWN_LOCATION): ClassVariableAccess {
    return { type: 'ClassVariableAccess', name, loc };
  },

  gvar(name: string, loc = UNKNOWN_LOCATION): GlobalVariableAccess {
    return { type: 'GlobalVariableAccess', name, loc };
  },

  self(loc = UNKNOWN_LOCATION): SelfAccess {
    return { type: 'SelfAccess', loc };
  },

  int(value: number, loc = UNKNOWN_LOCATION): IntegerLiteral {
    return { type: 'IntegerLiteral', value, loc };
  },

  str(value: string, loc = UNKNOWN_LOCATION): StringLiteral {
    return { type: 'StringLiteral', value, loc };
  },

  array(elements: Expression[], loc = UNKNOWN_LOCATION): ArrayLiteral {
    return { type: 'ArrayLiteral', elements, loc };
  },

  range(
    begin: Expression,
    end: Expression,
    inclusive = true,
    loc = UNKNOWN_LOCATION
  ): RangeLiteral {
    return { type: 'RangeLiteral', begin, end, inclusive, loc };
  },

  splat(operand: Expression, loc = UNKNOWN_LOCATION): SplatExpr {
    return { type: 'SplatExpr', operand, loc };
  },

  constant(
    name: string,
    scope?: Expression,
    loc = UNKNOWN_LOCATION
  ): ConstantReadAccess {
    return {
      type: 'ConstantReadAccess',
      name,
      loc,
      ...(scope ? { scope } : {})
    };
  },

  tuple(
    elements: AssignTarget[],
    restIndex?: number,
    loc = UNKNOWN_LOCATION
  ): TuplePattern {
    return {
      type: 'TuplePattern',
      elements,
      loc,
      ...(restIndex !== undefined ? { restIndex } : {})
    };
  },

  forIn(
    pattern: VariableAccess | TuplePattern,
    value: Expression,
    body: Statement[],
    loc = UNKNOWN_LOCATION
  ): ForExpr {
    return { type: 'ForExpr', pattern, value, body: seq(body, loc), loc };
  }
};
