import type { RequireAtLeastOne } from './types-helper';
import type { SourceLocation, SourceNode } from '../source/nodes';
import type { SourceTree } from '../source/tree';
import type { KindRegistry } from '../kind-registry';
import type { Child } from './child';
import type { SynthKind } from './kinds';
import type { AstNode, SyntheticNode } from './nodes';
import type { SynthLocalVariable } from './variables';

/**
 * Receives the facts a rule declares while expanding one trigger node.
 *
 * Ownership:
 * A sink is bound to a single trigger. It accepts edges whose parent is the
 * trigger itself or a synthetic node created while expanding that trigger.
 * Anything else is a rule-authoring defect and throws.
 */
export type FactSink = {
  /**
   * Declares a fresh synthetic child of `kind` at `parent[index]` and
   * returns the interned node, so nested children can be attached to it.
   */
  synth(parent: AstNode, index: number, kind: SynthKind): SyntheticNode;

  /**
   * Declares `parent[index]` as a reference to an existing node.
   *
   * `node` is usually the result of a structural lookup, so `undefined` is
   * accepted and reported as a dangling reference.
   */
  ref(parent: AstNode, index: number, node: AstNode | undefined): AstNode;

  /** Low-level form of {@link synth} / {@link ref}. */
  child(parent: AstNode, index: number, child: Child): AstNode;

  /** Explicit location of a synthetic node created by this expansion. */
  location(node: SyntheticNode, loc: SourceLocation): void;

  /**
   * Registers a fresh local introduced by `owner` at `slot`, and returns it.
   */
  localVariable(owner: AstNode, slot: number): SynthLocalVariable;
};

/**
 * Read access to everything a rule may consult while producing facts.
 */
export type SynthesisContext = {
  readonly source: SourceTree;
  readonly kinds: KindRegistry;

  /**
   * Resolved child of any node. Real slots resolve immediately; synthetic
   * slots re-enter rule evaluation for the node's trigger.
   */
  childOf(node: AstNode, index: number): AstNode | undefined;

  /** Resolved location of any node. */
  locationOf(node: AstNode): SourceLocation;

  /** The synthetic local `(owner, slot)`, without declaring it. */
  variable(owner: AstNode, slot: number): SynthLocalVariable;
};

/**
 * Context of the real-AST predicates (`excludeFromControlFlow` and the
 * demand predicates). These never observe synthetic nodes.
 */
export type DemandContext = {
  readonly source: SourceTree;
};

/**
 * Capabilities a rule may implement. All are optional; a rule must
 * implement at least one (see {@link SynthesisRule}).
 */
export type SynthesisRuleFeatures = {
  /**
   * Declares the facts contributed for `node`: child edges (index `-1` for
   * the desugared form), explicit locations and variable declarations.
   *
   * Called at most once per node and rule.
   */
  synthesize?: (node: AstNode, out: FactSink, ctx: SynthesisContext) => void;

  /**
   * Marks a real node as superseded by a desugared form: control-flow
   * construction must not visit it on its own.
   */
  excludeFromControlFlow?: (node: SourceNode, ctx: DemandContext) => boolean;

  /**
   * Demand for the method-call kind `(name, setter, arity)`.
   */
  requiresMethodCall?: (
    name: string,
    setter: boolean,
    arity: number,
    ctx: DemandContext
  ) => boolean;

  /** Demand for the constant-read kind `name`. */
  requiresConstant?: (name: string, ctx: DemandContext) => boolean;
};

/**
 * A named, stateless fact producer. {@link RequireAtLeastOne} keeps a rule
 * without any feature from type-checking.
 */
export type SynthesisRule = { readonly name: string } & RequireAtLeastOne<
  SynthesisRuleFeatures
>;

/**
 * Defines a rule. Identity at runtime; pins the object literal to the
 * {@link SynthesisRule} contract so callbacks are contextually typed.
 */
export function defineRule(rule: SynthesisRule): SynthesisRule {
  return rule;
}

/**
 * Assembles an explicit rule list. Order matters: when two rules disagree
 * on a fact, the earlier rule wins in lenient mode.
 */
export function defineRuleSet(
  rules: readonly SynthesisRule[]
): readonly SynthesisRule[] {
  return Object.freeze([...rules]);
}
