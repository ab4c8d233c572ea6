import type { SourceNode } from './nodes';

/** A child slot of a real node: `[index, child]`. */
export type SourceSlot = readonly [index: number, child: SourceNode];

function sequential(
  nodes: readonly SourceNode[],
  offset = 0
): SourceSlot[] {
  return nodes.map((node, i) => [offset + i, node] as const);
}

/**
 * Lists the semantic child slots of a real node in ascending index order.
 *
 * Index conventions (shared with synthesized nodes of the same shape):
 * - Method call: receiver `0`, arguments `1..n`, block `n + 1`.
 *   A call without receiver leaves slot `0` empty.
 * - Method definition and block: parameters first, then body statements.
 * - Assignment, compound assignment, binary operation: left `0`, right `1`.
 * - For loop: pattern `0`, iterable `1`, body `2`.
 */
export function sourceSlots(node: SourceNode): SourceSlot[] {
  switch (node.type) {
    case 'Toplevel':
    case 'ClassDef':
      return sequential(node.body);

    case 'MethodDef':
    case 'Block':
      return [
        ...sequential(node.params),
        ...sequential(node.body, node.params.length)
      ];

    case 'StmtSequence':
      return sequential(node.statements);

    case 'MethodCall': {
      const slots: SourceSlot[] = [];
      if (node.receiver) slots.push([0, node.receiver]);
      slots.push(...sequential(node.args, 1));
      if (node.block) slots.push([node.args.length + 1, node.block]);
      return slots;
    }

    case 'AssignExpr':
    case 'AssignOperation':
    case 'BinaryOperation':
      return [
        [0, node.left],
        [1, node.right]
      ];

    case 'ArrayLiteral':
      return sequential(node.elements);

    case 'TuplePattern':
      return sequential(node.elements);

    case 'RangeLiteral':
      return [
        [0, node.begin],
        [1, node.end]
      ];

    case 'SplatExpr':
      return [[0, node.operand]];

    case 'ConstantReadAccess':
      return node.scope ? [[0, node.scope]] : [];

    case 'ForExpr':
      return [
        [0, node.pattern],
        [1, node.value],
        [2, node.body]
      ];

    case 'SimpleParameter':
    case 'LocalVariableAccess':
    case 'InstanceVariableAccess':
    case 'ClassVariableAccess':
    case 'GlobalVariableAccess':
    case 'SelfAccess':
    case 'IntegerLiteral':
    case 'StringLiteral':
      return [];
  }
}
