/**
 * Defect classes a fact set can exhibit.
 *
 * - `child-conflict`: two facts assign different nodes to one slot.
 * - `location-conflict`: two rules give one node different locations.
 * - `dangling-reference`: a rule references a node that does not exist.
 * - `unresolvable-location`: a location chain does not end at a real node
 *   of the source tree.
 * - `missing-scope`: a node declares a variable but has no enclosing scope.
 */
export type DiagnosticCode =
  | 'child-conflict'
  | 'location-conflict'
  | 'dangling-reference'
  | 'unresolvable-location'
  | 'missing-scope';

export type SynthesisDiagnostic = {
  readonly code: DiagnosticCode;
  readonly message: string;

  /** Formatted address of the node or slot the defect concerns. */
  readonly subject: string;

  /** One line per fact involved, in rule-list order. */
  readonly facts: readonly string[];
};

/**
 * Thrown for defects the engine cannot answer around: dangling references
 * always, conflicts in strict mode.
 */
export class SynthesisError extends Error {
  readonly diagnostic: SynthesisDiagnostic;

  constructor(diagnostic: SynthesisDiagnostic) {
    super(diagnostic.message);
    this.name = 'SynthesisError';
    this.diagnostic = diagnostic;
  }
}
