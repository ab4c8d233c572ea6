import type { Statement } from '../source/nodes';
import type { AstNode, AstVariable, EngineOptions } from '../types';

import { ast } from '../source/builders';
import { createSynthesisEngine, type SynthesisEngine } from '../engine';
import { isSyntheticOf } from '../guards';
import { printNode } from '../printer';

/**
 * Builds a one-statement program and an engine over it.
 */
export function desugar(
  statement: Statement,
  options: EngineOptions = {}
): { engine: SynthesisEngine; statement: Statement } {
  const engine = createSynthesisEngine(ast.toplevel([statement]), options);
  return { engine, statement };
}

/** Prints the desugared view of a freshly built statement. */
export function printDesugared(statement: Statement): string {
  const { engine } = desugar(statement);
  return printNode(engine, statement);
}

/** Resolves a path of child indices, failing the test on a missing step. */
export function childAt(
  engine: SynthesisEngine,
  node: AstNode,
  ...path: number[]
): AstNode {
  let current = node;
  for (const index of path) {
    const next = engine.child(current, index);
    if (!next) {
      throw new Error(
        `No child ${index} under ${engine.describe(current)} (path ${path.join('/')}).`
      );
    }
    current = next;
  }
  return current;
}

/** The variable a synthetic access node reads, if it is one. */
export function accessedVariable(node: AstNode): AstVariable | undefined {
  if (
    isSyntheticOf(node, 'LocalVariableAccessReal') ||
    isSyntheticOf(node, 'LocalVariableAccessSynth') ||
    isSyntheticOf(node, 'InstanceVariableAccess') ||
    isSyntheticOf(node, 'ClassVariableAccess') ||
    isSyntheticOf(node, 'GlobalVariableAccess') ||
    isSyntheticOf(node, 'Self')
  ) {
    return node.kind.variable;
  }
  return undefined;
}
