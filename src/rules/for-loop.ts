import { DESUGARED_INDEX, defineRule, realChildRef } from '../types';

/**
 * `for p in xs; body; end` → `xs.each { |__synth__0| p = __synth__0; body }`
 *
 * The block parameter is declared at the synthetic block and scoped to it.
 * The pattern is referenced, not copied, so its variables stay bound in the
 * scope enclosing the loop. The loop body sequence is reached only through
 * the block and is excluded from control flow.
 */
export const forLoopRule = defineRule({
  name: 'for-loop',

  synthesize(node, out, { kinds }) {
    if (node.type !== 'ForExpr') return;

    const each = out.synth(
      node,
      DESUGARED_INDEX,
      kinds.methodCall('each', false, 0)
    );
    out.ref(each, 0, node.value);

    const block = out.synth(each, 1, kinds.simple('BraceBlock'));
    const param = kinds.variableAccess(out.localVariable(block, 0));

    const parameter = out.synth(block, 0, kinds.simple('SimpleParameter'));
    out.synth(parameter, 0, param);

    const bind = out.synth(block, 1, kinds.simple('AssignExpr'));
    out.location(bind, node.pattern.loc);
    out.ref(bind, 0, node.pattern);
    out.synth(bind, 1, param);

    node.body.statements.forEach((statement, j) =>
      out.child(block, j + 2, realChildRef(statement))
    );
  },

  excludeFromControlFlow(node, { source }) {
    if (node.type !== 'StmtSequence') return false;
    const parent = source.parent(node);
    return parent?.type === 'ForExpr' && parent.body === node;
  },

  requiresMethodCall(name, setter, arity, { source }) {
    return (
      name === 'each' &&
      !setter &&
      arity === 0 &&
      source.nodesOfType('ForExpr').length > 0
    );
  }
});
