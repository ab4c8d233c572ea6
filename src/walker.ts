import type { SynthesisEngine } from './engine';
import type { AstNode } from './types';

import { DESUGARED_INDEX } from './types';

export type WalkVisitor = (
  node: AstNode,
  parent: AstNode | undefined,
  index: number | undefined
) => void;

/**
 * Structural pre-order walk over real and synthetic nodes.
 *
 * A node's desugared form is visited before its children, under index `-1`.
 * Every node is visited once, under the first parent that reaches it: a real
 * node referenced from a desugared form is not visited again under its real
 * parent.
 */
export function walkAst(
  engine: SynthesisEngine,
  root: AstNode,
  visit: WalkVisitor
): void {
  const seen = new Set<string>();

  const walk = (
    node: AstNode,
    parent: AstNode | undefined,
    index: number | undefined
  ): void => {
    const key = engine.keyOf(node);
    if (seen.has(key)) return;
    seen.add(key);

    visit(node, parent, index);

    const desugared = engine.desugaredForm(node);
    if (desugared) walk(desugared, node, DESUGARED_INDEX);

    for (const [childIndex, child] of engine.children(node)) {
      walk(child, node, childIndex);
    }
  };

  walk(root, engine.parent(root), engine.indexInParent(root));
}

/** All nodes reachable from `root`, in {@link walkAst} order. */
export function collectNodes(
  engine: SynthesisEngine,
  root: AstNode
): AstNode[] {
  const nodes: AstNode[] = [];
  walkAst(engine, root, node => nodes.push(node));
  return nodes;
}

/**
 * Evaluation order as a control-flow consumer sees it (post-order).
 *
 * 1. A node with a desugared form is replaced by that form.
 * 2. Nodes excluded from control flow are skipped with their subtrees;
 *    whatever the desugared form still needs it references on its own.
 * 3. Children are evaluated in ascending index order, blocks in place.
 */
export function controlFlowOrder(
  engine: SynthesisEngine,
  root: AstNode
): AstNode[] {
  const order: AstNode[] = [];

  const emit = (node: AstNode): void => {
    if (engine.isExcludedFromControlFlow(node)) return;

    const desugared = engine.desugaredForm(node);
    if (desugared) {
      emit(desugared);
      return;
    }

    for (const [, child] of engine.children(node)) emit(child);
    order.push(node);
  };

  emit(root);
  return order;
}
