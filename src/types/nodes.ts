import type { ScopeNode, SourceNode } from '../source/nodes';
import type { SynthKind } from './kinds';
import type { NodeAddress } from '../node-address';
import type { ScopeProjection } from '../architecture';

/**
 * Index marking a desugared root: the child at `-1` of `parent` is the
 * rewritten form of `parent` itself.
 */
export const DESUGARED_INDEX = -1;

/**
 * A virtual node produced by a synthesis rule.
 *
 * Synthetic nodes are interned by `key`, the canonical encoding of their
 * structural `address` (parent address, child index, kind). Asking twice for
 * the same address yields the same object.
 */
export type SyntheticNode = {
  readonly type: 'Synthetic';
  readonly key: string;
  readonly address: NodeAddress;
  readonly kind: SynthKind;

  /** Structural parent (the sugared node, for a desugared root). */
  readonly parent: AstNode;

  /** Index within `parent`; {@link DESUGARED_INDEX} for a desugared root. */
  readonly index: number;

  /** Node whose rule evaluation created this node. */
  readonly trigger: AstNode;
};

/** Real and synthetic nodes, as seen by downstream consumers. */
export type AstNode = SourceNode | SyntheticNode;

/**
 * Nodes that open a variable scope: real scopes and synthetic brace blocks.
 * See {@link ScopeProjection}.
 */
export type AstScope = ScopeNode | SyntheticNode;
