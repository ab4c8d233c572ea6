import type {
  BinaryOperator,
  MethodCall,
  TuplePattern
} from '../source/nodes';
import type { SourceTree } from '../source/tree';
import type { AstNode, OperatorKindTag, SynthesisContext } from '../types';

import { isSourceNodeOf, isSyntheticOf } from '../guards';

/** Operator kind synthesized for each compound-assignment operator. */
export const OPERATOR_KINDS: { readonly [Op in BinaryOperator]: OperatorKindTag } =
  Object.freeze({
    '+': 'AddExpr',
    '-': 'SubExpr',
    '*': 'MulExpr',
    '/': 'DivExpr',
    '%': 'ModuloExpr',
    '**': 'ExponentExpr',
    '<<': 'LShiftExpr',
    '>>': 'RShiftExpr',
    '&': 'BitwiseAndExpr',
    '|': 'BitwiseOrExpr',
    '^': 'BitwiseXorExpr',
    '&&': 'LogicalAndExpr',
    '||': 'LogicalOrExpr'
  });

/** `attr` -> `attr=`, `[]` -> `[]=`. */
export function setterName(name: string): string {
  return `${name}=`;
}

/**
 * An assignment of either tier, seen through its two operands.
 *
 * Real assignments expose their fields; synthetic ones are read through
 * resolved child slots `0` (target) and `1` (value).
 */
export type AssignmentView = {
  readonly node: AstNode;
  readonly target: AstNode | undefined;
  readonly value: AstNode | undefined;
};

export function assignmentOf(
  node: AstNode,
  ctx: SynthesisContext
): AssignmentView | undefined {
  if (node.type === 'AssignExpr') {
    return { node, target: node.left, value: node.right };
  }
  if (isSyntheticOf(node, 'AssignExpr')) {
    return {
      node,
      target: ctx.childOf(node, 0),
      value: ctx.childOf(node, 1)
    };
  }
  return undefined;
}

/** Assignment whose target is a real tuple pattern. */
export function destructuringOf(
  node: AstNode,
  ctx: SynthesisContext
): (AssignmentView & { readonly target: TuplePattern }) | undefined {
  const assignment = assignmentOf(node, ctx);
  if (!assignment || !isSourceNodeOf(assignment.target, 'TuplePattern')) {
    return undefined;
  }
  return { ...assignment, target: assignment.target };
}

/** Assignment whose target is a real method call (`a.b = c`, `a[i] = c`). */
export function setterAssignmentOf(
  node: AstNode,
  ctx: SynthesisContext
): (AssignmentView & { readonly target: MethodCall }) | undefined {
  const assignment = assignmentOf(node, ctx);
  if (!assignment || !isSourceNodeOf(assignment.target, 'MethodCall')) {
    return undefined;
  }
  return { ...assignment, target: assignment.target };
}

/**
 * Whether a real call is written in assignment-target position: the left
 * side of `=` or an element of a destructuring pattern.
 */
export function isAssignedCall(call: MethodCall, source: SourceTree): boolean {
  const parent = source.parent(call);
  if (!parent) return false;
  if (parent.type === 'AssignExpr') return parent.left === call;
  return parent.type === 'TuplePattern';
}

/** Calls written as assignment targets, anywhere in the tree. */
export function assignedCalls(source: SourceTree): MethodCall[] {
  return source
    .nodesOfType('MethodCall')
    .filter(call => isAssignedCall(call, source));
}

/** Compound assignments whose target is a call. */
export function callOperations(source: SourceTree): MethodCall[] {
  return source
    .nodesOfType('AssignOperation')
    .map(operation => operation.left)
    .filter((left): left is MethodCall => left.type === 'MethodCall');
}
