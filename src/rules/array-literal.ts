import { DESUGARED_INDEX, defineRule, realChildRef } from '../types';

/** Constant every array literal is constructed through. */
export const ARRAY_CONSTANT = '::Array';

/**
 * `[e1, ..., en]` → `::Array.[](e1, ..., en)`
 *
 * The call kind counts the constant slot: `[a, b, c]` has arity 4 and `[]`
 * has arity 1.
 */
export const arrayLiteralRule = defineRule({
  name: 'array-literal',

  synthesize(node, out, { kinds }) {
    if (node.type !== 'ArrayLiteral') return;

    const call = out.synth(
      node,
      DESUGARED_INDEX,
      kinds.methodCall('[]', false, node.elements.length + 1)
    );
    out.synth(call, 0, kinds.constantRead(ARRAY_CONSTANT));
    node.elements.forEach((element, j) =>
      out.child(call, j + 1, realChildRef(element))
    );
  },

  requiresMethodCall(name, setter, arity, { source }) {
    return (
      name === '[]' &&
      !setter &&
      source
        .nodesOfType('ArrayLiteral')
        .some(literal => literal.elements.length + 1 === arity)
    );
  },

  requiresConstant(name, { source }) {
    return (
      name === ARRAY_CONSTANT && source.nodesOfType('ArrayLiteral').length > 0
    );
  }
});
