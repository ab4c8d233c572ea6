export type * from './kinds';
export type * from './nodes';
export type * from './variables';
export type * from './child';
export type * from './rules';
export type * from './options';
export type * from './diagnostics';
export type * from './types-helper';

export { DESUGARED_INDEX } from './nodes';
export {
  childRef,
  realChildRef,
  synthChild,
  synthChildRef
} from './child';
export { defineRule, defineRuleSet } from './rules';
export { DEFAULT_INTEGER_LITERAL_RANGE } from './options';
export { SynthesisError } from './diagnostics';
