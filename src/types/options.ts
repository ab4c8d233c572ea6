import type { SynthesisDiagnostic } from './diagnostics';
import type { SynthesisRule } from './rules';

export type IntegerRange = {
  readonly min: number;
  readonly max: number;
};

/**
 * Construction-time configuration of a {@link SynthesisEngine}.
 */
export type EngineOptions = {
  /**
   * The complete rule list, folded in order.
   * @default DEFAULT_RULES
   */
  rules?: readonly SynthesisRule[];

  /**
   * Conflict policy.
   *
   * - `false`: the first fact (rule-list order) wins, the conflict is
   *   recorded and reported through {@link onDiagnostic}.
   * - `true`: the conflict throws a `SynthesisError` from the query that
   *   uncovered it.
   *
   * @default false
   */
  strict?: boolean;

  /**
   * Bounds of synthesizable integer-literal kinds. Requests outside the
   * range throw.
   * @default { min: -1000, max: 1000 }
   */
  integerLiteralRange?: IntegerRange;

  /** Receives every diagnostic as it is recorded. */
  onDiagnostic?: (diagnostic: SynthesisDiagnostic) => void;
};

export const DEFAULT_INTEGER_LITERAL_RANGE: IntegerRange = Object.freeze({
  min: -1000,
  max: 1000
});
