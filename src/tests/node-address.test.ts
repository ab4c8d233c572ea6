import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import type { SynthKind } from '../types';

import {
  childNodeAddress,
  formatNodeAddress,
  kindKey,
  stringifyNodeAddress
} from '../node-address';

describe('Node addresses', () => {
  describe('kindKey', () => {
    const scenarios: Array<TestScenario<SynthKind, string>> = [
      {
        id: 'Parameterless',
        description: 'Operator kinds encode an empty parameter list.',
        input: { tag: 'AddExpr' },
        expected: 'AddExpr[]'
      },
      {
        id: 'Integer',
        description: 'Integer literals encode their value.',
        input: { tag: 'IntegerLiteral', value: -1 },
        expected: 'IntegerLiteral[-1]'
      },
      {
        id: 'Range',
        description: 'Range literals encode inclusiveness.',
        input: { tag: 'RangeLiteral', inclusive: false },
        expected: 'RangeLiteral[false]'
      },
      {
        id: 'Method Call',
        description: 'Method calls encode name, setter flag and arity.',
        input: { tag: 'MethodCall', name: '[]=', setter: true, arity: 2 },
        expected: 'MethodCall["[]=",true,2]'
      },
      {
        id: 'Constant',
        description: 'Constant reads encode the qualified name.',
        input: { tag: 'ConstantReadAccess', name: '::Array' },
        expected: 'ConstantReadAccess["::Array"]'
      },
      {
        id: 'Variable Access',
        description: 'Variable accesses encode the variable key.',
        input: {
          tag: 'GlobalVariableAccess',
          variable: { type: 'GlobalVariable', key: 'global:g', name: 'g' }
        },
        expected: 'GlobalVariableAccess["global:g"]'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(kindKey(input)).toBe(expected);
    });
  });

  describe('Addresses', () => {
    test('[Child] extends the parent address by index and kind key', () => {
      const sequence = childNodeAddress([4], -1, { tag: 'StmtSequence' });
      const setter = childNodeAddress(sequence, 0, {
        tag: 'MethodCall',
        name: 'b=',
        setter: true,
        arity: 1
      });

      expect(sequence).toEqual([4, -1, 'StmtSequence[]']);
      expect(formatNodeAddress(setter)).toBe(
        '#4 > -1:StmtSequence[] > 0:MethodCall["b=",true,1]'
      );
      expect(formatNodeAddress([7])).toBe('#7');
    });

    test('[Key] segment boundaries survive in the key', () => {
      expect(stringifyNodeAddress([1, 0, 'a b'])).not.toBe(
        stringifyNodeAddress([1, 0, 'a', 'b'])
      );
      expect(stringifyNodeAddress([1, -1, 'AddExpr[]'])).toBe('[1,-1,"AddExpr[]"]');
    });
  });
});
