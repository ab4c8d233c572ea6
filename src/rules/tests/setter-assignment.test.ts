import { describe, expect, test } from 'vitest';

import type { Statement } from '../../source/nodes';
import type { TestScenario } from '../../tests/types';

import { ast, span } from '../../source/builders';
import { createSynthesisEngine } from '../../engine';
import { accessedVariable, childAt, printDesugared } from '../../tests/helpers';

function attributeAssignment() {
  const receiver = ast.local('a', span(1, 0, 1));
  const call = ast.call(receiver, 'b', [], { loc: span(1, 0, 3) });
  const value = ast.local('c', span(1, 6, 7));
  const assign = ast.assign(call, value, span(1, 0, 7));
  const root = ast.toplevel([assign]);
  return { root, assign, call, receiver, value };
}

/**
 * Setter assignment.
 * Focus: `recv.m(args) = v` evaluates to `v` through a captured temporary.
 */
describe('Setter assignment: call targets', () => {
  describe('Desugared view', () => {
    const scenarios: Array<TestScenario<() => Statement, string>> = [
      {
        id: 'Attribute',
        description: 'An attribute write calls the setter and yields the value.',
        input: () => ast.assign(ast.call(ast.local('a'), 'b'), ast.local('c')),
        expected: '(a.b=(__synth__0 = c); __synth__0)'
      },
      {
        id: 'Element',
        description: 'Index arguments precede the captured value.',
        input: () =>
          ast.assign(ast.index(ast.local('a'), [ast.local('i')]), ast.local('v')),
        expected: '(a.[]=(i, __synth__0 = v); __synth__0)'
      },
      {
        id: 'Multiple Indices',
        description: 'Every index argument is passed in order.',
        input: () =>
          ast.assign(ast.index(ast.local('m'), [ast.int(1), ast.int(2)]), ast.int(3)),
        expected: '(m.[]=(1, 2, __synth__0 = 3); __synth__0)'
      },
      {
        id: 'Implicit Receiver',
        description: 'A receiverless target writes through self.',
        input: () => ast.assign(ast.call(undefined, 'name'), ast.int(1)),
        expected: '(self.name=(__synth__0 = 1); __synth__0)'
      },
      {
        id: 'Chained',
        description: 'A setter assignment as the value is desugared in place.',
        input: () =>
          ast.assign(
            ast.call(ast.local('a'), 'b'),
            ast.assign(ast.call(ast.local('c'), 'd'), ast.local('e'))
          ),
        expected:
          '(a.b=(__synth__0 = (c.d=(__synth__0 = e); __synth__0)); __synth__0)'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(printDesugared(input())).toBe(expected);
    });
  });

  describe('Structure', () => {
    test('[Kind] the setter call is named `m=` and counts the value as an argument', () => {
      const { root, assign } = attributeAssignment();
      const engine = createSynthesisEngine(root);

      expect(engine.describe(childAt(engine, assign, -1, 0))).toBe(
        '#1 > -1:StmtSequence[] > 0:MethodCall["b=",true,1] (MethodCall)'
      );
    });

    test('[Sharing] the real receiver and value are referenced, not copied', () => {
      const { root, assign, receiver, value } = attributeAssignment();
      const engine = createSynthesisEngine(root);

      expect(childAt(engine, assign, -1, 0, 0)).toBe(receiver);
      expect(childAt(engine, assign, -1, 0, 1, 1)).toBe(value);
    });

    test('[Implicit Receiver] the setter reuses the implicit self of the target', () => {
      const call = ast.call(undefined, 'name');
      const assign = ast.assign(call, ast.int(1));
      const engine = createSynthesisEngine(ast.toplevel([assign]));

      expect(childAt(engine, assign, -1, 0, 0)).toBe(childAt(engine, call, 0));
    });

    test('[Locations] setter takes the call location, the rest the assignment', () => {
      const { root, assign } = attributeAssignment();
      const engine = createSynthesisEngine(root);

      expect(engine.location(childAt(engine, assign, -1))).toEqual(span(1, 0, 7));
      expect(engine.location(childAt(engine, assign, -1, 0))).toEqual(span(1, 0, 3));
      expect(engine.location(childAt(engine, assign, -1, 0, 1))).toEqual(span(1, 0, 3));
      expect(engine.location(childAt(engine, assign, -1, 1))).toEqual(span(1, 0, 7));
    });

    test('[Temporary] one temporary is declared and read in both places', () => {
      const { root, assign } = attributeAssignment();
      const engine = createSynthesisEngine(root);

      const [tmp, ...others] = engine.declaredVariables(assign);
      expect(others).toEqual([]);
      expect(tmp?.name).toBe('__synth__0');
      expect(tmp?.owner).toBe(assign);
      expect(engine.declaresVariable(assign, 0)).toBe(true);
      expect(accessedVariable(childAt(engine, assign, -1, 0, 1, 0))).toBe(tmp);
      expect(accessedVariable(childAt(engine, assign, -1, 1))).toBe(tmp);
      expect(tmp && engine.variableScope(tmp)).toBe(root);
    });

    test('[Temporary] is scoped to the enclosing method', () => {
      const assign = ast.assign(ast.call(ast.local('a'), 'b'), ast.int(1));
      const method = ast.methodDef('m', ['a'], [assign]);
      const engine = createSynthesisEngine(ast.toplevel([method]));

      const [tmp] = engine.declaredVariables(assign);
      expect(tmp && engine.variableScope(tmp)).toBe(method);
    });
  });

  describe('Control flow and demand', () => {
    test('[Exclusion] the target call is replaced by the setter call', () => {
      const { root, assign, call, receiver } = attributeAssignment();
      const engine = createSynthesisEngine(root);

      expect(engine.isExcludedFromControlFlow(call)).toBe(true);
      expect(engine.isExcludedFromControlFlow(receiver)).toBe(false);
      expect(engine.isExcludedFromControlFlow(assign)).toBe(false);
    });

    test('[Demand] only setter kinds of assigned calls exist', () => {
      const { root } = attributeAssignment();
      const engine = createSynthesisEngine(root);

      expect(engine.kinds.isMethodCallDemanded('b=', true, 1)).toBe(true);
      expect(engine.kinds.isMethodCallDemanded('b=', true, 2)).toBe(false);
      expect(engine.kinds.isMethodCallDemanded('b', false, 0)).toBe(false);
      expect(() => engine.kinds.methodCall('c=', true, 1)).toThrow(
        '[synthesis] Method-call kind MethodCall["c=",true,1] is not demanded by any rule.'
      );
    });
  });
});
