/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * RATIONALE
 * 1. Desugaring as Facts (No Tree Rewriting)
 *
 * DEFINITION
 * 2. Structural Identity of Synthetic Nodes
 * 3. Two-Tier Child References
 *
 * POLICY
 * 4. Expansion Ownership
 * 5. Conflict Policy
 *
 * LIFECYCLE
 * 6. Lazy Expansion
 *
 * CONCEPT
 * 7. Scope Projection
 *
 * STRATEGY
 * 8. Demand-Driven Kind Enumeration
 *
 * Recommended reading flow:
 * RATIONALE -> DEFINITION -> LIFECYCLE -> POLICY -> CONCEPT -> STRATEGY
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - STRATEGY:
 *   Chosen implementation approach used to satisfy policies.
 *
 * - DEFINITION:
 *   Formal meaning and scope of a term or boundary.
 *
 * - RATIONALE:
 *   Why a policy or strategy exists.
 *
 * - CONCEPT:
 *   Mental model framing the problem space.
 *
 * - LIFECYCLE:
 *   Step-by-step process flow across phases.
 */

/**
 * ARCHITECTURAL RATIONALE (1)
 * Desugaring as Facts (No Tree Rewriting)
 *
 * ---
 *
 * Control-flow and data-flow consumers must see `a.b = c`, `x += 1` or
 * `for x in xs` as the primitive operations they stand for, without a
 * special case per construct. The real tree is never rewritten:
 *
 *   real AST  ->  rules  ->  synthetic graph  ->  consumers
 *
 * 1. Rules are stateless
 *    A rule is a function from a node to a set of facts: child edges,
 *    explicit locations, variable declarations. It reads the source tree
 *    and the facts of other nodes, and mutates nothing.
 *
 * 2. The desugaring is a union
 *    The facts of all rules are folded into one view. A construct is
 *    desugared by declaring its rewritten form as the child at index `-1`;
 *    consumers ask `desugaredForm(node)` and follow it instead of `node`.
 *
 * 3. Sharing, not copying
 *    Rewritten forms reference the real operands they reuse (the receiver,
 *    the arguments, the loop body). Nothing is duplicated, so every real
 *    node keeps its identity, location and variable binding.
 */
type DesugaringAsFacts = never;

/**
 * ARCHITECTURAL DEFINITION (2)
 * Structural Identity of Synthetic Nodes
 *
 * ---
 *
 * A synthetic node is identified by how it is reached, not by when it was
 * allocated:
 *
 *   address(real)       = [id]
 *   address(synthetic)  = [...address(parent), index, kindKey(kind)]
 *
 * - `kindKey` encodes the tag and the parameters (`MethodCall["b=",true,1]`),
 *   variables contributing their canonical key.
 * - The JSON encoding of the address is the node's `key`. The engine interns
 *   nodes by key, so asking twice for "child 0 of the desugared form of #4"
 *   yields the same object.
 * - Synthetic locals are identified the same way: `(owner, slot)`.
 *
 * Consequence:
 * Memoization is an optimization only. Dropping every cache and asking again
 * produces equal keys, hence logically identical answers.
 */
export type StructuralIdentity = never;

/**
 * ARCHITECTURAL DEFINITION (3)
 * Two-Tier Child References
 *
 * ---
 *
 * A child slot is filled by one of:
 *
 * - `SynthChild(kind)`: a fresh node, interned at this address. Its own
 *   facts are derived lazily, when a consumer first asks for them.
 * - `RealChildRef(node)`: an existing real node. Resolution is immediate.
 * - `SynthChildRef(node)`: an existing synthetic node created elsewhere
 *   (e.g. the implicit `self` of a call reused as a setter's receiver).
 *   Its facts are never derived a second time for the new slot.
 *
 * Keeping the two reference cases apart means a deeply nested rewrite (an
 * operator assignment whose target destructures) never re-expands shared
 * subtrees.
 */
export type TwoTierReferences = never;

/**
 * ARCHITECTURAL POLICY (4)
 * Expansion Ownership
 *
 * ---
 *
 * Each expansion runs against one trigger node. During it, a rule:
 *
 * - MAY declare children of the trigger itself and of synthetic nodes the
 *   same expansion created,
 * - MAY declare locations of synthetic nodes the same expansion created,
 * - MUST NOT declare facts about any other node.
 *
 * Violations throw immediately. The policy is what makes laziness sound:
 * the facts of a node are complete once its trigger and the node itself
 * have been expanded.
 */
export type ExpansionOwnershipPolicy = never;

/**
 * ARCHITECTURAL POLICY (5)
 * Conflict Policy
 *
 * ---
 *
 * Two different children at one slot, or two different locations for one
 * node, are rule-authoring defects.
 *
 * - Lenient (default): the first fact in rule-list order wins; the conflict
 *   is recorded as a diagnostic so a test suite can fail on it.
 * - Strict: the conflict throws from the query that uncovered it.
 * - Syntax wins: a fact for a slot the real node already fills is a
 *   conflict, and the syntactic child stays.
 *
 * Dangling references are thrown in both modes. The production path never
 * retries.
 */
export type ConflictPolicy = never;

/**
 * ARCHITECTURAL LIFECYCLE (6)
 * Lazy Expansion
 *
 * ---
 *
 * 1. A query (`children`, `child`, `desugaredForm`, `declaredVariables`)
 *    reaches node N.
 * 2. The engine expands N's trigger (for a synthetic N) and N itself, each
 *    at most once. Expansion runs every rule's `synthesize` in list order.
 * 3. `synth` interns new nodes; they stay unexpanded until a query reaches
 *    them.
 * 4. A rule may query the node being expanded; it sees the facts declared
 *    so far rather than triggering a second expansion.
 * 5. If a rule throws, N stays failed: every later query that reaches N
 *    rethrows the same error instead of reading its partial facts.
 *
 * `child(N, i)` on a real N with a syntactic child at `i` returns that child
 * without expanding anything.
 *
 * Termination: each rule recurses only into strictly smaller real
 * fragments (an operand, a pattern element, a loop body).
 */
export type LazyExpansion = never;

/**
 * ARCHITECTURAL CONCEPT (7)
 * Scope Projection
 *
 * ---
 *
 * - Real nodes keep the scope of their real position, also when a rewritten
 *   form references them. The pattern of a `for` loop therefore stays bound
 *   in the scope enclosing the loop.
 * - A synthetic node's scope is its nearest synthetic brace-block ancestor,
 *   else the scope of the real node its address starts from.
 * - A synthetic local belongs to the node that introduces it when that node
 *   opens a scope (the block parameter of a rewritten loop), else to that
 *   node's enclosing scope.
 */
export type ScopeProjection = never;

/**
 * ARCHITECTURAL STRATEGY (8)
 * Demand-Driven Kind Enumeration
 *
 * ---
 *
 * Method-call and constant-read kinds are not enumerated up front. A kind
 * exists when at least one rule demands it for the tree at hand; asking for
 * an undemanded kind throws.
 *
 * - `MethodCall["[]",false,1]` is demanded both by destructuring and by the
 *   empty array literal. The registry interns one value for both.
 * - Integer literals are bounded (default `[-1000, 1000]`): they only encode
 *   structural offsets, and a value outside the range is a defect, not a
 *   reason to widen silently.
 */
export type DemandDrivenKinds = never;

export type { DesugaringAsFacts };
