import { DESUGARED_INDEX, defineRule } from '../types';
import { destructuringOf } from './helpers';

/**
 * `e0, ..., *er, ..., e(k-1) = w`
 *
 * ```
 * -1: StmtSequence
 *       0:     __synth__0 = *w
 *       j + 1: ej = __synth__0[index(j)]
 * ```
 *
 * with `index(j)` = `j` before the rest element, `r..(r - k)` for the rest
 * element and `j - k` after it (`r = k` without a rest element).
 *
 * Applies to synthetic assignments as well, which is how nested patterns
 * and `for` loops over patterns are destructured.
 */
export const destructuredAssignmentRule = defineRule({
  name: 'destructured-assignment',

  synthesize(node, out, ctx) {
    const assignment = destructuringOf(node, ctx);
    if (!assignment) return;

    const { kinds } = ctx;
    const { elements, restIndex } = assignment.target;
    const k = elements.length;
    const r = restIndex ?? k;
    const tmp = kinds.variableAccess(out.localVariable(node, 0));

    const sequence = out.synth(
      node,
      DESUGARED_INDEX,
      kinds.simple('StmtSequence')
    );

    const capture = out.synth(sequence, 0, kinds.simple('AssignExpr'));
    out.synth(capture, 0, tmp);
    const splat = out.synth(capture, 1, kinds.simple('SplatExpr'));
    out.ref(splat, 0, assignment.value);

    elements.forEach((element, j) => {
      const assign = out.synth(sequence, j + 1, kinds.simple('AssignExpr'));
      out.location(assign, element.loc);
      out.ref(assign, 0, element);

      const read = out.synth(assign, 1, kinds.methodCall('[]', false, 1));
      out.location(read, element.loc);
      out.synth(read, 0, tmp);

      if (j < r) {
        out.synth(read, 1, kinds.integerLiteral(j));
      } else if (j === r) {
        const range = out.synth(read, 1, kinds.rangeLiteral(true));
        out.synth(range, 0, kinds.integerLiteral(r));
        out.synth(range, 1, kinds.integerLiteral(r - k));
      } else {
        out.synth(read, 1, kinds.integerLiteral(j - k));
      }
    });
  },

  requiresMethodCall(name, setter, arity, { source }) {
    return (
      name === '[]' &&
      !setter &&
      arity === 1 &&
      source.nodesOfType('TuplePattern').length > 0
    );
  }
});
