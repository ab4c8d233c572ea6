import type { AstNode } from '../types';

import { DESUGARED_INDEX, defineRule } from '../types';
import { isVariableAccess } from '../source/guards';
import { OPERATOR_KINDS, callOperations, setterName } from './helpers';

/**
 * `x op= y` → `x = x op y`
 *
 * Both synthesized accesses use the storage kind of `x` (local, instance,
 * class or global) and the location of `x`.
 */
export const variableAssignOperationRule = defineRule({
  name: 'assign-operation-variable',

  synthesize(node, out, { source, kinds }) {
    if (node.type !== 'AssignOperation' || !isVariableAccess(node.left)) {
      return;
    }

    const target = node.left;
    const access = kinds.variableAccess(source.variableOf(target));

    const assign = out.synth(node, DESUGARED_INDEX, kinds.simple('AssignExpr'));
    out.location(out.synth(assign, 0, access), target.loc);

    const operation = out.synth(
      assign,
      1,
      kinds.simple(OPERATOR_KINDS[node.operator])
    );
    out.location(out.synth(operation, 0, access), target.loc);
    out.ref(operation, 1, node.right);
  }
});

/**
 * `recv.m(a1, ..., an) op= y`
 *
 * ```
 * -1: StmtSequence
 *       0:     t0 = recv
 *       j:     tj = aj                      (1 <= j <= n)
 *       n + 1: t(n+1) = t0.m(t1..tn) op y
 *       n + 2: t0.m=(t1..tn, t(n+1))
 *       n + 3: t(n+1)
 * ```
 *
 * Receiver and arguments are evaluated exactly once, left to right. Each
 * capture takes the location of the expression it captures; both calls take
 * the location of the original call, which is excluded from control flow.
 */
export const callAssignOperationRule = defineRule({
  name: 'assign-operation-call',

  synthesize(node, out, ctx) {
    if (node.type !== 'AssignOperation' || node.left.type !== 'MethodCall') {
      return;
    }

    const { kinds } = ctx;
    const call = node.left;
    const n = call.args.length;
    const result = n + 1;

    for (let slot = 0; slot <= result; slot++) out.localVariable(node, slot);
    const temp = (slot: number) =>
      kinds.variableAccess(ctx.variable(node, slot));

    const sequence = out.synth(
      node,
      DESUGARED_INDEX,
      kinds.simple('StmtSequence')
    );

    const capture = (slot: number, value: AstNode | undefined): void => {
      const assign = out.synth(sequence, slot, kinds.simple('AssignExpr'));
      out.synth(assign, 0, temp(slot));
      const captured = out.ref(assign, 1, value);
      out.location(assign, ctx.locationOf(captured));
    };

    capture(0, ctx.childOf(call, 0));
    call.args.forEach((arg, j) => capture(j + 1, arg));

    const update = out.synth(sequence, result, kinds.simple('AssignExpr'));
    out.synth(update, 0, temp(result));
    const operation = out.synth(
      update,
      1,
      kinds.simple(OPERATOR_KINDS[node.operator])
    );
    const read = out.synth(
      operation,
      0,
      kinds.methodCall(call.name, false, n)
    );
    out.location(read, call.loc);
    for (let slot = 0; slot <= n; slot++) out.synth(read, slot, temp(slot));
    out.ref(operation, 1, node.right);

    const write = out.synth(
      sequence,
      n + 2,
      kinds.methodCall(setterName(call.name), true, n + 1)
    );
    out.location(write, call.loc);
    for (let slot = 0; slot <= result; slot++) {
      out.synth(write, slot, temp(slot));
    }

    out.synth(sequence, n + 3, temp(result));
  },

  excludeFromControlFlow(node, { source }) {
    if (node.type !== 'MethodCall') return false;
    const parent = source.parent(node);
    return parent?.type === 'AssignOperation' && parent.left === node;
  },

  requiresMethodCall(name, setter, arity, { source }) {
    return callOperations(source).some(call =>
      setter
        ? setterName(call.name) === name && call.args.length + 1 === arity
        : call.name === name && call.args.length === arity
    );
  }
});
