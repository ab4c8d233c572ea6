import type { SourceNode, SourceNodeOf, SourceNodeType } from './source/nodes';
import type {
  AstNode,
  SynthKindOf,
  SynthKindTag,
  SyntheticNode
} from './types';

/** A synthetic node whose kind is narrowed to one tag. */
export type SyntheticOf<T extends SynthKindTag> = SyntheticNode & {
  readonly kind: SynthKindOf<T>;
};

export function isSyntheticNode(
  node: AstNode | null | undefined
): node is SyntheticNode {
  return !!node && node.type === 'Synthetic';
}

export function isSourceNode(
  node: AstNode | null | undefined
): node is SourceNode {
  return !!node && node.type !== 'Synthetic';
}

/**
 * Checks whether a node is synthetic and of the given kind.
 *
 * @example
 * if (isSyntheticOf(node, 'MethodCall')) node.kind.name; // string
 */
export function isSyntheticOf<T extends SynthKindTag>(
  node: AstNode | null | undefined,
  tag: T
): node is SyntheticOf<T> {
  return isSyntheticNode(node) && node.kind.tag === tag;
}

/** Checks whether a node is real and of the given type. */
export function isSourceNodeOf<T extends SourceNodeType>(
  node: AstNode | null | undefined,
  type: T
): node is SourceNodeOf<T> {
  return isSourceNode(node) && node.type === type;
}
