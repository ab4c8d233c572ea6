import { describe, expect, test } from 'vitest';

import { ast } from '../source/builders';
import { createSynthesisEngine } from '../engine';
import { assertValidFacts, validateFacts } from '../fact-validator';
import { arrayLiteralRule } from '../rules';
import { defineRule } from '../types';

const shadowArrayRule = defineRule({
  name: 'shadow-array',
  synthesize(node, out, { kinds }) {
    if (node.type === 'ArrayLiteral') {
      out.synth(node, -1, kinds.simple('StmtSequence'));
    }
  }
});

const conflictingEngine = (strict = false) =>
  createSynthesisEngine(ast.toplevel([ast.array([])]), {
    rules: [arrayLiteralRule, shadowArrayRule],
    strict
  });

describe('Fact validation', () => {
  test('[Clean] the default rules produce a consistent fact set', () => {
    const engine = createSynthesisEngine(
      ast.toplevel([
        ast.assignOp(ast.index(ast.local('a'), [ast.int(0)]), '+', ast.int(1)),
        ast.assign(
          ast.tuple([ast.local('b'), ast.call(ast.self(), 'c')], 0),
          ast.array([ast.int(1), ast.int(2)])
        ),
        ast.forIn(ast.tuple([ast.local('k'), ast.local('v')]), ast.local('h'), [
          ast.assignOp(ast.gvar('total'), '+', ast.local('v'))
        ])
      ])
    );

    expect(validateFacts(engine)).toEqual([]);
    expect(() => assertValidFacts(engine)).not.toThrow();
  });

  test('[Conflict] a conflict is reported once', () => {
    const diagnostics = validateFacts(conflictingEngine());

    expect(diagnostics.map(d => [d.code, d.subject])).toEqual([
      ['child-conflict', '#1 [-1]']
    ]);
  });

  test('[Strict] a conflict that stops the walk is still reported', () => {
    const diagnostics = validateFacts(conflictingEngine(true));

    expect(diagnostics.map(d => d.code)).toEqual(['child-conflict']);
  });

  test('[Dangling] a dangling reference ends the walk and is reported', () => {
    const engine = createSynthesisEngine(ast.toplevel([ast.call(undefined, 'foo')]), {
      rules: [
        defineRule({
          name: 'broken',
          synthesize(node, out) {
            if (node.type === 'MethodCall') out.ref(node, 2, node.args[1]);
          }
        })
      ]
    });

    expect(validateFacts(engine).map(d => [d.code, d.subject])).toEqual([
      ['dangling-reference', '#1 [2]']
    ]);
  });

  test('[Assert] the first defect, its facts and a summary are thrown', () => {
    expect(() =>
      assertValidFacts(conflictingEngine(), undefined, { context: 'demo.rb' })
    ).toThrow(
      [
        '[synthesis] Invalid fact set for demo.rb.',
        'First defect (child-conflict): [synthesis] Rules declare different children at #1 [-1].',
        '  - rule "array-literal" -> #1 > -1:MethodCall["[]",false,1] (MethodCall)',
        '  - rule "shadow-array" -> #1 > -1:StmtSequence[] (StmtSequence)',
        'Hint: remove the overlapping fact from one of the rules, or run the engine with `strict: true` to stop at the query that uncovers it.',
        'Summary: diagnostics=1 (child-conflict=1); preview: "#1 [-1]" (child-conflict)'
      ].join('\n')
    );
  });
});
