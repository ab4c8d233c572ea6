import type { SynthesisRule } from './types';

/**
 * Validates the runtime integrity of a `SynthesisRule`.
 *
 * The type system already rejects empty rules written in TypeScript; this
 * check covers rule lists assembled from untyped sources.
 *
 * @param rule - The rule object from the rule list.
 * @param position - Index of the rule within its list, for error reporting.
 * @returns The validated rule object.
 * @throws Error if the rule is not an object, is unnamed, or declares no
 *   capability.
 */
export function validateRule(
  rule: SynthesisRule | undefined | null,
  position: number
): SynthesisRule {
  // 1. Validate object structure
  if (!rule || typeof rule !== 'object') {
    throw new Error(
      `[synthesis] Invalid rule at position ${position}: Expected a rule object, got ${typeof rule}.`
    );
  }

  // 2. Validate identity
  if (typeof rule.name !== 'string' || rule.name.length === 0) {
    throw new Error(
      `[synthesis] Invalid rule at position ${position}: A rule needs a non-empty 'name'.`
    );
  }

  // 3. Validate functional requirements
  const isEffective =
    rule.synthesize != null ||
    rule.excludeFromControlFlow != null ||
    rule.requiresMethodCall != null ||
    rule.requiresConstant != null;

  if (!isEffective) {
    throw new Error(
      `[synthesis] Invalid rule "${rule.name}": The rule is empty. ` +
        `It must define at least one of: 'synthesize', 'excludeFromControlFlow', ` +
        `'requiresMethodCall', or 'requiresConstant'.`
    );
  }

  return rule;
}

/**
 * Validates every rule of a list and rejects duplicate names, which would
 * make conflict reports ambiguous.
 */
export function validateRuleSet(
  rules: readonly (SynthesisRule | undefined | null)[]
): SynthesisRule[] {
  const seen = new Set<string>();

  return rules.map((candidate, position) => {
    const rule = validateRule(candidate, position);
    if (seen.has(rule.name)) {
      throw new Error(
        `[synthesis] Duplicate rule name "${rule.name}" at position ${position}.`
      );
    }
    seen.add(rule.name);
    return rule;
  });
}
