import type { SourceVariable } from '../source/variables';
import type { AstNode } from './nodes';

/**
 * A fresh local introduced by a desugaring (`__synth__0`, ...).
 *
 * Identity is `(owner, slot)`: the node that introduces the variable and the
 * slot number distinguishing several temporaries of one node.
 */
export type SynthLocalVariable = {
  readonly type: 'SynthLocalVariable';
  readonly key: string;
  readonly name: string;
  readonly owner: AstNode;
  readonly slot: number;
};

export type AstVariable = SourceVariable | SynthLocalVariable;
