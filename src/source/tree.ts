import type {
  AssignTarget,
  ScopeNode,
  SelfScopeNode,
  SimpleParameter,
  SourceNode,
  SourceNodeOf,
  SourceNodeType,
  Toplevel,
  TuplePattern,
  VariableAccess
} from './nodes';
import type {
  ClassVariable,
  GlobalVariable,
  InstanceVariable,
  LocalVariable,
  SelfVariable,
  StorageVariable
} from './variables';

import { isScopeNode, isSelfScopeNode } from './guards';
import { type SourceSlot, sourceSlots } from './slots';

/**
 * Read-only index over a real AST.
 *
 * Provides the query primitives the synthesis engine relies on and treats
 * as given:
 * - identity: stable preorder ids (`id`),
 * - structure: `parent`, `children`, `childAt`, `nodesOfType`,
 * - scoping: `enclosingScope`, `selfScope`,
 * - binding: `variableOf`, `parameterVariable`, `selfVariable`.
 *
 * Local variable binding
 * ----------------------
 * - Method and class bodies are hard boundaries: nothing leaks in or out.
 * - A block sees the locals of its enclosing scopes. A name assigned inside a
 *   block binds to the outermost visible scope that also assigns it, otherwise
 *   to the block itself.
 * - Block and method parameters shadow outer locals of the same name.
 * - `for` loops do not open a scope: their pattern binds in the enclosing one.
 */
export class SourceTree {
  readonly root: Toplevel;

  readonly #ids = new Map<SourceNode, number>();
  readonly #parents = new Map<SourceNode, SourceNode>();
  readonly #slots = new Map<SourceNode, SourceSlot[]>();
  readonly #byType = new Map<SourceNodeType, SourceNode[]>();
  readonly #assigned = new Map<ScopeNode, Set<string>>();

  readonly #locals = new Map<string, LocalVariable>();
  readonly #instanceVariables = new Map<string, InstanceVariable>();
  readonly #classVariables = new Map<string, ClassVariable>();
  readonly #globals = new Map<string, GlobalVariable>();
  readonly #selves = new Map<SelfScopeNode, SelfVariable>();

  constructor(root: Toplevel) {
    this.root = root;
    this.#index(root, undefined);

    for (const node of this.#ids.keys()) {
      this.#collectAssignments(node);
    }
  }

  #index(node: SourceNode, parent: SourceNode | undefined): void {
    if (this.#ids.has(node)) {
      throw new Error(
        `[source] A "${node.type}" node occurs more than once in the tree. ` +
          'Real nodes must be distinct objects.'
      );
    }

    if (node.type === 'TuplePattern') assertRestIndex(node);

    this.#ids.set(node, this.#ids.size);
    if (parent) this.#parents.set(node, parent);

    const bucket = this.#byType.get(node.type);
    if (bucket) bucket.push(node);
    else this.#byType.set(node.type, [node]);

    const slots = sourceSlots(node);
    this.#slots.set(node, slots);

    for (const [, child] of slots) {
      this.#index(child, node);
    }
  }

  #collectAssignments(node: SourceNode): void {
    switch (node.type) {
      case 'AssignExpr':
        this.#collectTarget(node.left);
        return;
      case 'AssignOperation':
        this.#collectTarget(node.left);
        return;
      case 'ForExpr':
        this.#collectTarget(node.pattern);
        return;
      default:
        return;
    }
  }

  #collectTarget(target: AssignTarget): void {
    if (target.type === 'TuplePattern') {
      for (const element of target.elements) this.#collectTarget(element);
      return;
    }

    if (target.type !== 'LocalVariableAccess') return;

    const scope = this.enclosingScope(target) ?? this.root;
    const names = this.#assigned.get(scope);
    if (names) names.add(target.name);
    else this.#assigned.set(scope, new Set([target.name]));
  }

  /**
   * Preorder id of a node; throws for nodes that are not part of this tree.
   */
  id(node: SourceNode): number {
    const id = this.#ids.get(node);
    if (id === undefined) {
      throw new Error(
        `[source] The "${node.type}" node does not belong to this tree.`
      );
    }
    return id;
  }

  has(node: SourceNode): boolean {
    return this.#ids.has(node);
  }

  /** Number of real nodes. */
  get size(): number {
    return this.#ids.size;
  }

  parent(node: SourceNode): SourceNode | undefined {
    return this.#parents.get(node);
  }

  /** Syntactic child slots in ascending index order. */
  children(node: SourceNode): readonly SourceSlot[] {
    return this.#slots.get(node) ?? [];
  }

  childAt(node: SourceNode, index: number): SourceNode | undefined {
    const slot = this.children(node).find(([i]) => i === index);
    return slot?.[1];
  }

  /** Index of `node` within its parent's slots (`undefined` for the root). */
  indexInParent(node: SourceNode): number | undefined {
    const parent = this.parent(node);
    if (!parent) return undefined;
    const slot = this.children(parent).find(([, child]) => child === node);
    return slot?.[0];
  }

  nodesOfType<T extends SourceNodeType>(type: T): readonly SourceNodeOf<T>[] {
    const bucket = this.#byType.get(type) ?? [];
    return bucket.filter((node): node is SourceNodeOf<T> => node.type === type);
  }

  /** Nearest strict ancestor that opens a variable scope. */
  enclosingScope(node: SourceNode): ScopeNode | undefined {
    for (let p = this.parent(node); p; p = this.parent(p)) {
      if (isScopeNode(p)) return p;
    }
    return undefined;
  }

  /** Nearest strict ancestor that determines `self` (the root for itself). */
  selfScope(node: SourceNode): SelfScopeNode {
    for (let p = this.parent(node); p; p = this.parent(p)) {
      if (isSelfScopeNode(p)) return p;
    }
    return this.root;
  }

  selfVariable(scope: SelfScopeNode): SelfVariable {
    const existing = this.#selves.get(scope);
    if (existing) return existing;

    const variable: SelfVariable = {
      type: 'SelfVariable',
      key: `self:${this.id(scope)}`,
      scope
    };
    this.#selves.set(scope, variable);
    return variable;
  }

  localVariable(scope: ScopeNode, name: string): LocalVariable {
    const key = `local:${this.id(scope)}:${name}`;
    const existing = this.#locals.get(key);
    if (existing) return existing;

    const variable: LocalVariable = { type: 'LocalVariable', key, name, scope };
    this.#locals.set(key, variable);
    return variable;
  }

  /** The local variable a method or block parameter declares. */
  parameterVariable(param: SimpleParameter): LocalVariable {
    const owner = this.parent(param);
    if (!owner || (owner.type !== 'MethodDef' && owner.type !== 'Block')) {
      throw new Error(
        `[source] Parameter "${param.name}" is not attached to a method or block.`
      );
    }
    return this.localVariable(owner, param.name);
  }

  /** Resolves the variable a storage access reads or writes. */
  variableOf(access: VariableAccess): StorageVariable {
    switch (access.type) {
      case 'LocalVariableAccess':
        return this.#resolveLocal(access);

      case 'InstanceVariableAccess': {
        const owner = this.#instanceOwner(access);
        const key = `ivar:${this.id(owner)}:${access.name}`;
        const existing = this.#instanceVariables.get(key);
        if (existing) return existing;
        const variable: InstanceVariable = {
          type: 'InstanceVariable',
          key,
          name: access.name,
          owner
        };
        this.#instanceVariables.set(key, variable);
        return variable;
      }

      case 'ClassVariableAccess': {
        const owner = this.#instanceOwner(access);
        const key = `cvar:${this.id(owner)}:${access.name}`;
        const existing = this.#classVariables.get(key);
        if (existing) return existing;
        const variable: ClassVariable = {
          type: 'ClassVariable',
          key,
          name: access.name,
          owner
        };
        this.#classVariables.set(key, variable);
        return variable;
      }

      case 'GlobalVariableAccess': {
        const key = `global:${access.name}`;
        const existing = this.#globals.get(key);
        if (existing) return existing;
        const variable: GlobalVariable = {
          type: 'GlobalVariable',
          key,
          name: access.name
        };
        this.#globals.set(key, variable);
        return variable;
      }
    }
  }

  #instanceOwner(node: SourceNode): SelfScopeNode {
    for (let p = this.parent(node); p; p = this.parent(p)) {
      if (p.type === 'ClassDef') return p;
    }
    return this.root;
  }

  #resolveLocal(access: VariableAccess): LocalVariable {
    const innermost = this.enclosingScope(access) ?? this.root;

    let bound: ScopeNode | undefined;
    for (const scope of this.#visibleScopes(innermost)) {
      if (this.#declaresParameter(scope, access.name)) {
        return this.localVariable(scope, access.name);
      }
      if (this.#assigned.get(scope)?.has(access.name)) bound = scope;
    }

    return this.localVariable(bound ?? innermost, access.name);
  }

  /** `scope` followed by the scopes whose locals a block can see. */
  #visibleScopes(scope: ScopeNode): ScopeNode[] {
    const chain: ScopeNode[] = [scope];
    let current: ScopeNode = scope;
    while (current.type === 'Block') {
      const outer = this.enclosingScope(current);
      if (!outer) break;
      chain.push(outer);
      current = outer;
    }
    return chain;
  }

  #declaresParameter(scope: ScopeNode, name: string): boolean {
    if (scope.type !== 'MethodDef' && scope.type !== 'Block') return false;
    return scope.params.some(param => param.name === name);
  }
}

function assertRestIndex({ restIndex, elements }: TuplePattern): void {
  if (restIndex === undefined) return;
  if (
    Number.isInteger(restIndex) &&
    restIndex >= 0 &&
    restIndex < elements.length
  ) {
    return;
  }
  throw new Error(
    `[source] Tuple pattern rest index ${restIndex} must be an integer in [0, ${elements.length}).`
  );
}
