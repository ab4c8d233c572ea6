import { DESUGARED_INDEX, defineRule } from '../types';
import {
  assignedCalls,
  isAssignedCall,
  setterAssignmentOf,
  setterName
} from './helpers';

/**
 * `recv.attr(args) = value`
 *
 * ```
 * -1: StmtSequence
 *       0: recv.attr=(args..., __synth__0 = value)
 *       1: __synth__0
 * ```
 *
 * The sequence evaluates to `value`, not to the setter's return value.
 * Applies to synthetic assignments too, so a call inside a destructuring
 * pattern (`a.x, b = pair`) is rewritten the same way.
 */
export const setterAssignmentRule = defineRule({
  name: 'setter-assignment',

  synthesize(node, out, ctx) {
    const assignment = setterAssignmentOf(node, ctx);
    if (!assignment) return;

    const { kinds } = ctx;
    const call = assignment.target;
    const arity = call.args.length + 1;
    const tmp = kinds.variableAccess(out.localVariable(node, 0));

    const sequence = out.synth(
      node,
      DESUGARED_INDEX,
      kinds.simple('StmtSequence')
    );

    const setter = out.synth(
      sequence,
      0,
      kinds.methodCall(setterName(call.name), true, arity)
    );
    out.location(setter, call.loc);
    out.ref(setter, 0, ctx.childOf(call, 0));
    call.args.forEach((arg, j) => out.ref(setter, j + 1, arg));

    const capture = out.synth(setter, arity, kinds.simple('AssignExpr'));
    out.synth(capture, 0, tmp);
    out.ref(capture, 1, assignment.value);

    out.synth(sequence, 1, tmp);
  },

  excludeFromControlFlow(node, { source }) {
    return node.type === 'MethodCall' && isAssignedCall(node, source);
  },

  requiresMethodCall(name, setter, arity, { source }) {
    return (
      setter &&
      assignedCalls(source).some(
        call => setterName(call.name) === name && call.args.length + 1 === arity
      )
    );
  }
});
