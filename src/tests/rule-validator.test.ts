import { describe, expect, expectTypeOf, test } from 'vitest';

import type { SynthesisRule } from '../types';

import { DEFAULT_RULES, forLoopRule, implicitSelfRule } from '../rules';
import { validateRule, validateRuleSet } from '../rule-validator';

describe('Rule validation', () => {
  test('[Defaults] the default rule set is valid and frozen', () => {
    expect(validateRuleSet(DEFAULT_RULES).map(rule => rule.name)).toEqual([
      'implicit-self',
      'setter-assignment',
      'assign-operation-variable',
      'assign-operation-call',
      'destructured-assignment',
      'array-literal',
      'for-loop'
    ]);
    expect(Object.isFrozen(DEFAULT_RULES)).toBe(true);
  });

  test('[Missing] a missing rule is rejected with its position', () => {
    expect(() => validateRule(undefined, 3)).toThrow(
      '[synthesis] Invalid rule at position 3: Expected a rule object, got undefined.'
    );
    expect(() => validateRuleSet([forLoopRule, null])).toThrow(
      '[synthesis] Invalid rule at position 1: Expected a rule object, got object.'
    );
  });

  test('[Empty] a rule needs at least one feature', () => {
    expectTypeOf<{ name: string }>().not.toMatchTypeOf<SynthesisRule>();
    expectTypeOf<{
      name: string;
      requiresConstant: () => boolean;
    }>().toMatchTypeOf<SynthesisRule>();

    const untyped: SynthesisRule = JSON.parse('{ "name": "idle" }');
    expect(() => validateRule(untyped, 0)).toThrow(
      '[synthesis] Invalid rule "idle": The rule is empty. ' +
        "It must define at least one of: 'synthesize', 'excludeFromControlFlow', " +
        "'requiresMethodCall', or 'requiresConstant'."
    );
  });

  test('[Duplicates] rule names are unique within a set', () => {
    expect(() => validateRuleSet([implicitSelfRule, forLoopRule, implicitSelfRule])).toThrow(
      '[synthesis] Duplicate rule name "implicit-self" at position 2.'
    );
  });
});
