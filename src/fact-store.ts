import type { SourceLocation } from './source/nodes';
import type { AstNode, SynthLocalVariable } from './types';

/** One declared edge, with the rule that declared it. */
export type ChildFact = {
  readonly node: AstNode;
  readonly rule: string;
};

export type LocationFact = {
  readonly loc: SourceLocation;
  readonly rule: string;
};

/**
 * Outcome of recording a fact.
 *
 * - `added`: first fact for the subject.
 * - `duplicate`: an equal fact already exists; nothing is stored.
 * - `conflict`: a different fact already exists; the new one is stored
 *   behind it so validation can report both.
 */
export type RecordOutcome = 'added' | 'duplicate' | 'conflict';

/**
 * Backing store of every fact discovered so far, keyed by canonical node
 * keys. Writes are idempotent: recording the same fact twice is a no-op.
 */
export type FactStore = {
  addChild(parentKey: string, index: number, fact: ChildFact): RecordOutcome;
  /** All facts for one slot; the first is authoritative. */
  childFacts(parentKey: string, index: number): readonly ChildFact[];
  /** Indices with at least one fact, ascending. */
  childIndices(parentKey: string): number[];
  addLocation(nodeKey: string, fact: LocationFact): RecordOutcome;
  locationFacts(nodeKey: string): readonly LocationFact[];
  declareVariable(ownerKey: string, variable: SynthLocalVariable): void;
  /** Variables declared at an owner, ordered by slot. */
  variables(ownerKey: string): SynthLocalVariable[];
};

/**
 * Appends `fact` to the list for a subject unless an equal one is there.
 * A different earlier fact keeps its place in front.
 */
function appendFact<F>(
  facts: F[] | undefined,
  fact: F,
  same: (a: F, b: F) => boolean
): RecordOutcome {
  if (!facts) return 'added';
  if (facts.some(existing => same(existing, fact))) return 'duplicate';
  facts.push(fact);
  return 'conflict';
}

function slotsOf<V>(
  table: Map<string, Map<number, V>>,
  key: string
): Map<number, V> {
  let slots = table.get(key);
  if (!slots) {
    slots = new Map();
    table.set(key, slots);
  }
  return slots;
}

export function createFactStore(): FactStore {
  const children = new Map<string, Map<number, ChildFact[]>>();
  const locations = new Map<string, LocationFact[]>();
  const variables = new Map<string, Map<number, SynthLocalVariable>>();

  return {
    addChild(parentKey, index, fact) {
      const slots = slotsOf(children, parentKey);
      const facts = slots.get(index);
      const outcome = appendFact(facts, fact, (a, b) => a.node === b.node);
      if (outcome === 'added') slots.set(index, [fact]);
      return outcome;
    },

    childFacts(parentKey, index) {
      return children.get(parentKey)?.get(index) ?? [];
    },

    childIndices(parentKey) {
      const slots = children.get(parentKey);
      if (!slots) return [];
      return [...slots.keys()].sort((a, b) => a - b);
    },

    addLocation(nodeKey, fact) {
      const facts = locations.get(nodeKey);
      const outcome = appendFact(facts, fact, (a, b) =>
        isSameLocation(a.loc, b.loc)
      );
      if (outcome === 'added') locations.set(nodeKey, [fact]);
      return outcome;
    },

    locationFacts(nodeKey) {
      return locations.get(nodeKey) ?? [];
    },

    declareVariable(ownerKey, variable) {
      slotsOf(variables, ownerKey).set(variable.slot, variable);
    },

    variables(ownerKey) {
      const slots = variables.get(ownerKey);
      if (!slots) return [];
      return [...slots.values()].sort((a, b) => a.slot - b.slot);
    }
  };
}

export function isSameLocation(a: SourceLocation, b: SourceLocation): boolean {
  return (
    a.start.line === b.start.line &&
    a.start.column === b.start.column &&
    a.end.line === b.end.line &&
    a.end.column === b.end.column &&
    (a.source ?? null) === (b.source ?? null)
  );
}
