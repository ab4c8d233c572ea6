import type { SourceNode } from '../source/nodes';
import type { SynthKind } from './kinds';
import type { AstNode, SyntheticNode } from './nodes';
import type { TwoTierReferences } from '../architecture';

/**
 * Synthesize a fresh node of `kind` in this slot.
 *
 * See {@link TwoTierReferences}.
 */
export type SynthChild = {
  readonly type: 'SynthChild';
  readonly kind: SynthKind;
};

/**
 * The slot is filled by an existing real node. Resolution is immediate and
 * never re-enters rule evaluation.
 */
export type RealChildRef = {
  readonly type: 'RealChildRef';
  readonly node: SourceNode;
};

/**
 * The slot is filled by an existing synthetic node, shared with the slot it
 * was created in. Its facts are never re-derived for this slot.
 */
export type SynthChildRef = {
  readonly type: 'SynthChildRef';
  readonly node: SyntheticNode;
};

export type Child = SynthChild | RealChildRef | SynthChildRef;

export function synthChild(kind: SynthKind): SynthChild {
  return { type: 'SynthChild', kind };
}

export function realChildRef(node: SourceNode): RealChildRef {
  return { type: 'RealChildRef', node };
}

export function synthChildRef(node: SyntheticNode): SynthChildRef {
  return { type: 'SynthChildRef', node };
}

/**
 * Reference to an existing node of either tier.
 */
export function childRef(node: AstNode): RealChildRef | SynthChildRef {
  return node.type === 'Synthetic' ? synthChildRef(node) : realChildRef(node);
}
