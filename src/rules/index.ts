import { defineRuleSet } from '../types';
import { arrayLiteralRule } from './array-literal';
import {
  callAssignOperationRule,
  variableAssignOperationRule
} from './assign-operation';
import { destructuredAssignmentRule } from './destructured-assignment';
import { forLoopRule } from './for-loop';
import { implicitSelfRule } from './implicit-self';
import { setterAssignmentRule } from './setter-assignment';

export { ARRAY_CONSTANT, arrayLiteralRule } from './array-literal';
export {
  callAssignOperationRule,
  variableAssignOperationRule
} from './assign-operation';
export { destructuredAssignmentRule } from './destructured-assignment';
export { forLoopRule } from './for-loop';
export { implicitSelfRule } from './implicit-self';
export { setterAssignmentRule } from './setter-assignment';
export { OPERATOR_KINDS, setterName } from './helpers';

/**
 * The built-in desugarings. The rules never declare facts for the same
 * slot, so their order only matters for rules appended after them.
 */
export const DEFAULT_RULES = defineRuleSet([
  implicitSelfRule,
  setterAssignmentRule,
  variableAssignOperationRule,
  callAssignOperationRule,
  destructuredAssignmentRule,
  arrayLiteralRule,
  forLoopRule
]);
