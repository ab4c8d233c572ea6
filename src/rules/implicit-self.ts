import { defineRule, synthChild } from '../types';

/**
 * `foo(1)` → `self.foo(1)`
 *
 * A call without receiver gets a synthetic `self` at slot `0`, bound to the
 * call's self scope. A `::`-qualified call has no implicit receiver.
 */
export const implicitSelfRule = defineRule({
  name: 'implicit-self',

  synthesize(node, out, { source, kinds }) {
    if (node.type !== 'MethodCall' || node.receiver || node.qualified) return;

    const self = source.selfVariable(source.selfScope(node));
    out.child(node, 0, synthChild(kinds.self(self)));
  }
});
