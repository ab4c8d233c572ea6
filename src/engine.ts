import type { SourceLocation, SourceNode, Toplevel } from './source/nodes';
import type {
  AstNode,
  AstScope,
  AstVariable,
  Child,
  DemandContext,
  DiagnosticCode,
  EngineOptions,
  FactSink,
  SynthKind,
  SynthLocalVariable,
  SynthesisContext,
  SynthesisDiagnostic,
  SynthesisRule,
  SyntheticNode
} from './types';
import type { NodeAddress } from './node-address';
import type {
  ConflictPolicy,
  ExpansionOwnershipPolicy,
  LazyExpansion
} from './architecture';

import { DEFAULT_RULES } from './rules';
import { createFactStore, type ChildFact } from './fact-store';
import { createKindRegistry, type KindRegistry } from './kind-registry';
import { SourceTree } from './source/tree';
import { isScopeNode } from './source/guards';
import { validateRuleSet } from './rule-validator';
import {
  DEFAULT_INTEGER_LITERAL_RANGE,
  DESUGARED_INDEX,
  SynthesisError
} from './types';
import {
  childNodeAddress,
  formatNodeAddress,
  realNodeAddress,
  stringifyNodeAddress
} from './node-address';

/** One resolved child: its index and the node filling it. */
export type ChildSlot = readonly [index: number, node: AstNode];

/**
 * Folds the facts of a rule list over a source tree and answers the
 * uniform node contract for real and synthetic nodes alike.
 *
 * Evaluation model
 * ----------------
 * 1. Lazy:
 *    Rules run against a node the first time a query needs its facts.
 *    A synthetic node's facts come from the expansion that created it (its
 *    `trigger`) plus the rules run against the node itself.
 * 2. Memoized:
 *    Every node is expanded at most once; synthetic nodes are interned by
 *    structural key. Repeated queries return the same objects.
 * 3. Re-entrant:
 *    A rule may query the node it is expanding (through the context); the
 *    query sees the facts declared so far instead of expanding again.
 *
 * Facts are accepted under the {@link ExpansionOwnershipPolicy} and resolved
 * under the {@link ConflictPolicy}; see {@link LazyExpansion} for the order
 * in which expansions run.
 */
export class SynthesisEngine {
  readonly source: SourceTree;
  readonly kinds: KindRegistry;
  readonly rules: readonly SynthesisRule[];

  readonly #strict: boolean;
  readonly #onDiagnostic: ((diagnostic: SynthesisDiagnostic) => void) | undefined;

  readonly #facts = createFactStore();
  readonly #arena = new Map<string, SyntheticNode>();
  readonly #variables = new Map<string, SynthLocalVariable>();
  readonly #expanded = new Set<string>();
  /** Errors thrown while expanding a node, rethrown on every later query. */
  readonly #failures = new Map<string, unknown>();
  readonly #excluded = new Map<SourceNode, boolean>();
  readonly #diagnostics: SynthesisDiagnostic[] = [];

  readonly #demand: DemandContext;
  readonly #context: SynthesisContext;

  constructor(source: SourceTree, options: EngineOptions = {}) {
    this.source = source;
    this.rules = validateRuleSet(options.rules ?? DEFAULT_RULES);
    this.#strict = options.strict ?? false;
    this.#onDiagnostic = options.onDiagnostic;

    this.#demand = { source };
    this.kinds = createKindRegistry(
      this.rules,
      this.#demand,
      options.integerLiteralRange ?? DEFAULT_INTEGER_LITERAL_RANGE
    );
    this.#context = {
      source,
      kinds: this.kinds,
      childOf: (node, index) => this.child(node, index),
      locationOf: node => this.location(node),
      variable: (owner, slot) => this.variable(owner, slot)
    };
  }

  // -------------------------------------------------------------------------
  // Identity
  // -------------------------------------------------------------------------

  addressOf(node: AstNode): NodeAddress {
    return node.type === 'Synthetic'
      ? node.address
      : realNodeAddress(this.source.id(node));
  }

  keyOf(node: AstNode): string {
    return node.type === 'Synthetic'
      ? node.key
      : stringifyNodeAddress(this.addressOf(node));
  }

  /** Formatted address plus node label, for messages. */
  describe(node: AstNode): string {
    const label = node.type === 'Synthetic' ? node.kind.tag : node.type;
    return `${formatNodeAddress(this.addressOf(node))} (${label})`;
  }

  /** The interned synthetic local `(owner, slot)`. */
  variable(owner: AstNode, slot: number): SynthLocalVariable {
    const key = `synth:${this.keyOf(owner)}:${slot}`;
    const existing = this.#variables.get(key);
    if (existing) return existing;

    const variable: SynthLocalVariable = {
      type: 'SynthLocalVariable',
      key,
      name: `__synth__${slot}`,
      owner,
      slot
    };
    this.#variables.set(key, variable);
    return variable;
  }

  // -------------------------------------------------------------------------
  // Structure
  // -------------------------------------------------------------------------

  /**
   * Resolved child at `index`. A real syntactic child always wins over
   * synthesized facts for the same slot.
   */
  child(node: AstNode, index: number): AstNode | undefined {
    if (node.type !== 'Synthetic') {
      const real = this.source.childAt(node, index);
      if (real) return real;
    }

    this.#expandAround(node);
    return this.#facts.childFacts(this.keyOf(node), index)[0]?.node;
  }

  /**
   * Ordered children, real and synthetic. The desugared form (index `-1`)
   * is not a child; see {@link desugaredForm}.
   */
  children(node: AstNode): readonly ChildSlot[] {
    this.#expandAround(node);

    const slots = new Map<number, AstNode>();
    if (node.type !== 'Synthetic') {
      for (const [index, child] of this.source.children(node)) {
        slots.set(index, child);
      }
    }

    const key = this.keyOf(node);
    for (const index of this.#facts.childIndices(key)) {
      if (index === DESUGARED_INDEX || slots.has(index)) continue;
      const fact = this.#facts.childFacts(key, index)[0];
      if (fact) slots.set(index, fact.node);
    }

    return [...slots.entries()].sort(([a], [b]) => a - b);
  }

  /** Raw facts declared for one slot, including conflicting ones. */
  childFacts(node: AstNode, index: number): readonly ChildFact[] {
    this.#expandAround(node);
    return this.#facts.childFacts(this.keyOf(node), index);
  }

  desugaredForm(node: AstNode): AstNode | undefined {
    return this.child(node, DESUGARED_INDEX);
  }

  parent(node: AstNode): AstNode | undefined {
    return node.type === 'Synthetic' ? node.parent : this.source.parent(node);
  }

  /** Index within the structural parent (`-1` for a desugared root). */
  indexInParent(node: AstNode): number | undefined {
    return node.type === 'Synthetic'
      ? node.index
      : this.source.indexInParent(node);
  }

  /** Number of desugared roots on the structural path from `node` upwards. */
  desugarLevel(node: AstNode): number {
    let level = 0;
    for (
      let current: AstNode = node;
      current.type === 'Synthetic';
      current = current.parent
    ) {
      if (current.index === DESUGARED_INDEX) level++;
    }
    return level;
  }

  // -------------------------------------------------------------------------
  // Location, scope, variables
  // -------------------------------------------------------------------------

  /**
   * Explicit location fact, else the structural parent's location. The
   * chain ends at a real node because every synthetic address extends its
   * parent's.
   */
  location(node: AstNode): SourceLocation {
    let current: AstNode = node;
    while (current.type === 'Synthetic') {
      const explicit = this.explicitLocation(current);
      if (explicit) return explicit;
      current = current.parent;
    }
    return current.loc;
  }

  explicitLocation(node: SyntheticNode): SourceLocation | undefined {
    this.#expand(node.trigger);
    return this.#facts.locationFacts(node.key)[0]?.loc;
  }

  isScope(node: AstNode): node is AstScope {
    return node.type === 'Synthetic'
      ? node.kind.tag === 'BraceBlock'
      : isScopeNode(node);
  }

  /**
   * Nearest strict ancestor opening a scope. Synthetic brace blocks count;
   * real nodes keep the scope of their real position.
   */
  enclosingScope(node: AstNode): AstScope | undefined {
    if (node.type !== 'Synthetic') return this.source.enclosingScope(node);

    let current: AstNode = node.parent;
    while (current.type === 'Synthetic') {
      if (current.kind.tag === 'BraceBlock') return current;
      current = current.parent;
    }
    return isScopeNode(current) ? current : this.source.enclosingScope(current);
  }

  variableScope(variable: AstVariable): AstScope | undefined {
    switch (variable.type) {
      case 'SynthLocalVariable':
        return this.isScope(variable.owner)
          ? variable.owner
          : this.enclosingScope(variable.owner);
      case 'LocalVariable':
      case 'SelfVariable':
        return variable.scope;
      case 'InstanceVariable':
      case 'ClassVariable':
        return variable.owner;
      case 'GlobalVariable':
        return this.source.root;
    }
  }

  declaredVariables(node: AstNode): readonly SynthLocalVariable[] {
    this.#expandAround(node);
    return this.#facts.variables(this.keyOf(node));
  }

  declaresVariable(node: AstNode, slot: number): boolean {
    return this.declaredVariables(node).some(variable => variable.slot === slot);
  }

  // -------------------------------------------------------------------------
  // Control flow
  // -------------------------------------------------------------------------

  isExcludedFromControlFlow(node: AstNode): boolean {
    if (node.type === 'Synthetic') return false;

    const memo = this.#excluded.get(node);
    if (memo !== undefined) return memo;

    const excluded = this.rules.some(rule =>
      rule.excludeFromControlFlow
        ? rule.excludeFromControlFlow(node, this.#demand)
        : false
    );
    this.#excluded.set(node, excluded);
    return excluded;
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Diagnostics recorded so far, in discovery order. */
  diagnostics(): readonly SynthesisDiagnostic[] {
    return [...this.#diagnostics];
  }

  // -------------------------------------------------------------------------
  // Expansion
  // -------------------------------------------------------------------------

  #expandAround(node: AstNode): void {
    if (node.type === 'Synthetic') this.#expand(node.trigger);
    this.#expand(node);
  }

  #expand(node: AstNode): void {
    const key = this.keyOf(node);
    if (this.#failures.has(key)) throw this.#failures.get(key);
    if (this.#expanded.has(key)) return;
    this.#expanded.add(key);

    try {
      for (const rule of this.rules) {
        if (!rule.synthesize) continue;
        rule.synthesize(node, this.#createSink(node, rule), this.#context);
      }
    } catch (error) {
      // The node keeps its partial facts; queries must not read them.
      this.#failures.set(key, error);
      throw error;
    }
  }

  #createSink(trigger: AstNode, rule: SynthesisRule): FactSink {
    const assertOwned = (node: AstNode, what: string): void => {
      const owned =
        node === trigger ||
        (node.type === 'Synthetic' && node.trigger === trigger);
      if (owned) return;
      throw new Error(
        `[synthesis] Rule "${rule.name}" declared ${what} of ${this.describe(node)} ` +
          `while expanding ${this.describe(trigger)}. A rule may only extend ` +
          'the node it expands and the nodes that expansion created.'
      );
    };

    const synth = (
      parent: AstNode,
      index: number,
      kind: SynthKind
    ): SyntheticNode => {
      assertOwned(parent, `child ${index}`);
      const node = this.#intern(parent, index, kind, trigger);
      this.#recordChild(parent, index, node, rule);
      return node;
    };

    const ref = (
      parent: AstNode,
      index: number,
      node: AstNode | undefined
    ): AstNode => {
      assertOwned(parent, `child ${index}`);
      const target = this.#checkReference(parent, index, node, rule);
      this.#recordChild(parent, index, target, rule);
      return target;
    };

    return {
      synth,
      ref,
      child: (parent: AstNode, index: number, child: Child): AstNode =>
        child.type === 'SynthChild'
          ? synth(parent, index, child.kind)
          : ref(parent, index, child.node),
      location: (node, loc) => {
        if (node.trigger !== trigger) {
          throw new Error(
            `[synthesis] Rule "${rule.name}" declared the location of ${this.describe(node)} ` +
              `while expanding ${this.describe(trigger)}. Only the expansion ` +
              'that created a node declares its location.'
          );
        }
        const outcome = this.#facts.addLocation(node.key, {
          loc,
          rule: rule.name
        });
        if (outcome === 'conflict') {
          this.#report(this.#locationConflict(node));
        }
      },
      localVariable: (owner, slot) => {
        assertOwned(owner, `variable slot ${slot}`);
        const variable = this.variable(owner, slot);
        this.#facts.declareVariable(this.keyOf(owner), variable);
        return variable;
      }
    };
  }

  #intern(
    parent: AstNode,
    index: number,
    kind: SynthKind,
    trigger: AstNode
  ): SyntheticNode {
    const address = childNodeAddress(this.addressOf(parent), index, kind);
    const key = stringifyNodeAddress(address);

    const existing = this.#arena.get(key);
    if (existing) return existing;

    const node: SyntheticNode = {
      type: 'Synthetic',
      key,
      address,
      kind,
      parent,
      index,
      trigger
    };
    this.#arena.set(key, node);
    return node;
  }

  /**
   * Two-tier reference check: a real target must belong to the source
   * tree, a synthetic target must already be interned. Neither re-enters
   * rule evaluation.
   */
  #checkReference(
    parent: AstNode,
    index: number,
    node: AstNode | undefined,
    rule: SynthesisRule
  ): AstNode {
    const exists =
      node !== undefined &&
      (node.type === 'Synthetic'
        ? this.#arena.get(node.key) === node
        : this.source.has(node));
    if (node && exists) return node;

    const subject = `${formatNodeAddress(this.addressOf(parent))} [${index}]`;
    const diagnostic = this.#diagnostic(
      'dangling-reference',
      `Rule "${rule.name}" references a node that does not exist at ${subject}.`,
      subject,
      [`rule "${rule.name}" -> ${node ? this.#label(node) : 'nothing'}`]
    );
    this.#record(diagnostic);
    throw new SynthesisError(diagnostic);
  }

  #recordChild(
    parent: AstNode,
    index: number,
    node: AstNode,
    rule: SynthesisRule
  ): void {
    if (parent.type !== 'Synthetic') {
      const real = this.source.childAt(parent, index);
      if (real === node) return;
      if (real) {
        const subject = `${formatNodeAddress(this.addressOf(parent))} [${index}]`;
        this.#report(
          this.#diagnostic(
            'child-conflict',
            `Rule "${rule.name}" declares a child at ${subject}, which is a syntactic slot.`,
            subject,
            [
              `syntax -> ${this.describe(real)}`,
              `rule "${rule.name}" -> ${this.#label(node)}`
            ]
          )
        );
        return;
      }
    }

    const outcome = this.#facts.addChild(this.keyOf(parent), index, {
      node,
      rule: rule.name
    });
    if (outcome === 'conflict') {
      this.#report(this.#childConflict(parent, index));
    }
  }

  /** Describes a node that may not belong to this engine (dangling references). */
  #label(node: AstNode): string {
    if (node.type === 'Synthetic' || this.source.has(node)) {
      return this.describe(node);
    }
    return `foreign ${node.type}`;
  }

  #childConflict(parent: AstNode, index: number): SynthesisDiagnostic {
    const subject = `${formatNodeAddress(this.addressOf(parent))} [${index}]`;
    const facts = this.#facts.childFacts(this.keyOf(parent), index);
    return this.#diagnostic(
      'child-conflict',
      `Rules declare different children at ${subject}.`,
      subject,
      facts.map(fact => `rule "${fact.rule}" -> ${this.describe(fact.node)}`)
    );
  }

  #locationConflict(node: SyntheticNode): SynthesisDiagnostic {
    const subject = this.describe(node);
    return this.#diagnostic(
      'location-conflict',
      `Rules declare different locations for ${subject}.`,
      subject,
      this.#facts
        .locationFacts(node.key)
        .map(fact => `rule "${fact.rule}" -> ${formatLocation(fact.loc)}`)
    );
  }

  #diagnostic(
    code: DiagnosticCode,
    message: string,
    subject: string,
    facts: readonly string[]
  ): SynthesisDiagnostic {
    return { code, message: `[synthesis] ${message}`, subject, facts };
  }

  #record(diagnostic: SynthesisDiagnostic): void {
    this.#diagnostics.push(diagnostic);
    this.#onDiagnostic?.(diagnostic);
  }

  #report(diagnostic: SynthesisDiagnostic): void {
    this.#record(diagnostic);
    if (this.#strict) throw new SynthesisError(diagnostic);
  }
}

export function formatLocation(loc: SourceLocation): string {
  return `${loc.start.line}:${loc.start.column}-${loc.end.line}:${loc.end.column}`;
}

/**
 * Creates an engine over a source tree, indexing a bare `Toplevel` first.
 */
export function createSynthesisEngine(
  input: SourceTree | Toplevel,
  options: EngineOptions = {}
): SynthesisEngine {
  const source = input instanceof SourceTree ? input : new SourceTree(input);
  return new SynthesisEngine(source, options);
}
