import type { SynthKind } from './types/kinds';
import type { StructuralIdentity } from './architecture';

/**
 * Structural address of a node.
 *
 * - Real node: `[id]`, the node's preorder id in its {@link SourceTree}.
 * - Synthetic node: the parent's address followed by `index, kindKey`.
 *
 * See {@link StructuralIdentity}.
 *
 * Example: the setter call inside the desugared form of real node `#4`
 *   `[4, -1, "StmtSequence[]", 0, "MethodCall[\"b=\",true,1]"]`
 */
export type NodeAddress = readonly (string | number)[];

/**
 * Canonical key of a kind: its tag followed by the JSON encoding of its
 * parameters. Variables contribute their own canonical `key`.
 *
 * Examples:
 * - `AddExpr[]`
 * - `IntegerLiteral[-1]`
 * - `MethodCall["[]=",true,2]`
 * - `LocalVariableAccessReal["local:0:x"]`
 */
export function kindKey(kind: SynthKind): string {
  return `${kind.tag}${JSON.stringify(kindParameters(kind))}`;
}

function kindParameters(kind: SynthKind): (string | number | boolean)[] {
  switch (kind.tag) {
    case 'LocalVariableAccessReal':
    case 'LocalVariableAccessSynth':
    case 'InstanceVariableAccess':
    case 'ClassVariableAccess':
    case 'GlobalVariableAccess':
    case 'Self':
      return [kind.variable.key];
    case 'IntegerLiteral':
      return [kind.value];
    case 'RangeLiteral':
      return [kind.inclusive];
    case 'MethodCall':
      return [kind.name, kind.setter, kind.arity];
    case 'ConstantReadAccess':
      return [kind.name];
    default:
      return [];
  }
}

export function realNodeAddress(id: number): NodeAddress {
  return [id];
}

export function childNodeAddress(
  parent: NodeAddress,
  index: number,
  kind: SynthKind
): NodeAddress {
  return [...parent, index, kindKey(kind)];
}

/**
 * Produces the canonical key used for Map/Set lookups.
 *
 * JSON encoding keeps the key injective: segment boundaries survive any
 * characters a method or constant name may contain.
 */
export function stringifyNodeAddress(address: NodeAddress): string {
  return JSON.stringify(address);
}

/**
 * Formats an address for diagnostics.
 *
 * @example
 * formatNodeAddress([4, -1, 'StmtSequence[]', 0, 'MethodCall["b=",true,1]'])
 * // '#4 > -1:StmtSequence[] > 0:MethodCall["b=",true,1]'
 */
export function formatNodeAddress(address: NodeAddress): string {
  const [root, ...rest] = address;
  const parts = [`#${String(root)}`];
  for (let i = 0; i + 1 < rest.length; i += 2) {
    parts.push(`${String(rest[i])}:${String(rest[i + 1])}`);
  }
  return parts.join(' > ');
}
