export type * from './types';
export type * from './source/nodes';
export type * from './source/variables';
export type { SourceSlot } from './source/slots';
export type { NodeAddress } from './node-address';
export type {
  ChildFact,
  FactStore,
  LocationFact,
  RecordOutcome
} from './fact-store';
export { createFactStore, isSameLocation } from './fact-store';
export type { ChildSlot } from './engine';
export type { DiagnosticReportOptions } from './report';
export type { SyntheticOf } from './guards';
export type { WalkVisitor } from './walker';

export {
  DESUGARED_INDEX,
  DEFAULT_INTEGER_LITERAL_RANGE,
  SynthesisError,
  childRef,
  defineRule,
  defineRuleSet,
  realChildRef,
  synthChild,
  synthChildRef
} from './types';
export { SourceTree } from './source/tree';
export { UNKNOWN_LOCATION, ast, span } from './source/builders';
export { SynthesisEngine, createSynthesisEngine } from './engine';
export { createKindRegistry } from './kind-registry';
export type { AccessibleVariable, KindRegistry } from './kind-registry';
export { kindKey, formatNodeAddress } from './node-address';
export { validateRule, validateRuleSet } from './rule-validator';
export { formatDiagnostics, reportDiagnostics } from './report';
export { assertValidFacts, validateFacts } from './fact-validator';
export { collectNodes, controlFlowOrder, walkAst } from './walker';
export { printNode } from './printer';
export {
  isSourceNode,
  isSourceNodeOf,
  isSyntheticNode,
  isSyntheticOf
} from './guards';
export * from './rules';
