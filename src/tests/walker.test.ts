import { describe, expect, test } from 'vitest';

import { ast } from '../source/builders';
import { createSynthesisEngine } from '../engine';
import { printNode } from '../printer';
import { collectNodes, controlFlowOrder, walkAst } from '../walker';

function setterProgram() {
  const call = ast.call(ast.local('a'), 'b');
  const assign = ast.assign(call, ast.local('c'));
  return { root: ast.toplevel([assign]), assign, call };
}

describe('Traversal', () => {
  describe('walkAst', () => {
    test('[Pre-order] desugared forms come first, every node once', () => {
      const { root } = setterProgram();
      const engine = createSynthesisEngine(root);

      const indices: (number | undefined)[] = [];
      walkAst(engine, root, (_node, _parent, index) => indices.push(index));

      expect(indices).toEqual([undefined, 0, -1, 0, 0, 1, 0, 1, 1, 0]);
    });

    test('[Collect] nodes are unique by structural key', () => {
      const { root, call } = setterProgram();
      const engine = createSynthesisEngine(root);

      const nodes = collectNodes(engine, root);
      expect(nodes).toHaveLength(10);
      expect(new Set(nodes.map(node => engine.keyOf(node))).size).toBe(10);
      expect(nodes.at(-1)).toBe(call);
    });
  });

  describe('controlFlowOrder', () => {
    test('[Setter] operands run before the setter call; the target call never runs', () => {
      const { root, call } = setterProgram();
      const engine = createSynthesisEngine(root);

      const order = controlFlowOrder(engine, root);
      const form = '(a.b=(__synth__0 = c); __synth__0)';
      expect(order.map(node => printNode(engine, node))).toEqual([
        'a',
        '__synth__0',
        'c',
        '__synth__0 = c',
        'a.b=(__synth__0 = c)',
        '__synth__0',
        form,
        form
      ]);
      expect(order).not.toContain(call);
    });

    test('[For Loop] the body runs inside the block; the real body sequence is skipped', () => {
      const body = ast.call(undefined, 'foo', [ast.local('x')]);
      const loop = ast.forIn(ast.local('x'), ast.local('xs'), [body]);
      const root = ast.toplevel([loop]);
      const engine = createSynthesisEngine(root);

      const order = controlFlowOrder(engine, root);
      const block = '{ |__synth__0| x = __synth__0; self.foo(x) }';
      const each = `xs.each() ${block}`;
      expect(order.map(node => printNode(engine, node))).toEqual([
        'xs',
        '__synth__0',
        '__synth__0',
        'x',
        '__synth__0',
        'x = __synth__0',
        'self',
        'x',
        'self.foo(x)',
        block,
        each,
        each
      ]);
      expect(order).toContain(body);
      expect(order).not.toContain(loop.body);
      expect(order).not.toContain(loop);
    });
  });
});
