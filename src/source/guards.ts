import type {
  ScopeNode,
  SelfScopeNode,
  SourceNode,
  VariableAccess
} from './nodes';

export function isScopeNode(node: SourceNode): node is ScopeNode {
  return (
    node.type === 'Toplevel' ||
    node.type === 'ClassDef' ||
    node.type === 'MethodDef' ||
    node.type === 'Block'
  );
}

export function isSelfScopeNode(node: SourceNode): node is SelfScopeNode {
  return (
    node.type === 'Toplevel' ||
    node.type === 'ClassDef' ||
    node.type === 'MethodDef'
  );
}

/**
 * Storage accesses that a compound assignment can read and write back
 * (`x`, `@x`, `@@x`, `$x`). `self` is not assignable and is excluded.
 */
export function isVariableAccess(node: SourceNode): node is VariableAccess {
  return (
    node.type === 'LocalVariableAccess' ||
    node.type === 'InstanceVariableAccess' ||
    node.type === 'ClassVariableAccess' ||
    node.type === 'GlobalVariableAccess'
  );
}
