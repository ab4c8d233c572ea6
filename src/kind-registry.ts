import type {
  ClassVariable,
  GlobalVariable,
  InstanceVariable,
  LocalVariable,
  SelfVariable
} from './source/variables';
import type {
  DemandContext,
  IntegerRange,
  SimpleKindTag,
  SynthKindOf,
  SynthLocalVariable,
  SynthesisRule,
  VariableAccessKind
} from './types';

import type { DemandDrivenKinds } from './architecture';

import { kindKey } from './node-address';

/** Variables a synthesized access can read or write. */
export type AccessibleVariable =
  | LocalVariable
  | InstanceVariable
  | ClassVariable
  | GlobalVariable
  | SynthLocalVariable;

type MethodCallKind = SynthKindOf<'MethodCall'>;
type ConstantReadKind = SynthKindOf<'ConstantReadAccess'>;
type IntegerLiteralKind = SynthKindOf<'IntegerLiteral'>;
type RangeLiteralKind = SynthKindOf<'RangeLiteral'>;
type SelfKind = SynthKindOf<'Self'>;

const SIMPLE_KINDS: { readonly [T in SimpleKindTag]: SynthKindOf<T> } =
  Object.freeze({
    AddExpr: { tag: 'AddExpr' },
    SubExpr: { tag: 'SubExpr' },
    MulExpr: { tag: 'MulExpr' },
    DivExpr: { tag: 'DivExpr' },
    ModuloExpr: { tag: 'ModuloExpr' },
    ExponentExpr: { tag: 'ExponentExpr' },
    LShiftExpr: { tag: 'LShiftExpr' },
    RShiftExpr: { tag: 'RShiftExpr' },
    BitwiseAndExpr: { tag: 'BitwiseAndExpr' },
    BitwiseOrExpr: { tag: 'BitwiseOrExpr' },
    BitwiseXorExpr: { tag: 'BitwiseXorExpr' },
    LogicalAndExpr: { tag: 'LogicalAndExpr' },
    LogicalOrExpr: { tag: 'LogicalOrExpr' },
    AssignExpr: { tag: 'AssignExpr' },
    BraceBlock: { tag: 'BraceBlock' },
    StmtSequence: { tag: 'StmtSequence' },
    SimpleParameter: { tag: 'SimpleParameter' },
    SplatExpr: { tag: 'SplatExpr' }
  });

const RANGE_KINDS: { readonly [K in 'inclusive' | 'exclusive']: RangeLiteralKind } =
  Object.freeze({
    inclusive: { tag: 'RangeLiteral', inclusive: true },
    exclusive: { tag: 'RangeLiteral', inclusive: false }
  });

/**
 * Interns synthesizable kinds.
 *
 * Every accessor returns one shared value per canonical key, so two rules
 * asking for the same logical kind receive the same object.
 *
 * Enumeration policy
 * ------------------
 * 1. Parameterless kinds always exist.
 * 2. Variable-access kinds exist for any variable.
 * 3. Integer literals exist within the configured range only.
 * 4. Method-call and constant-read kinds exist only when at least one rule
 *    demands them (`requiresMethodCall` / `requiresConstant`). Asking for an
 *    undemanded kind is a rule-authoring defect and throws.
 *
 * See {@link DemandDrivenKinds}.
 */
export type KindRegistry = {
  simple<T extends SimpleKindTag>(tag: T): SynthKindOf<T>;
  variableAccess(variable: AccessibleVariable): VariableAccessKind;
  self(variable: SelfVariable): SelfKind;
  /** Throws outside the configured range. */
  integerLiteral(value: number): IntegerLiteralKind;
  rangeLiteral(inclusive: boolean): RangeLiteralKind;
  /** Throws unless some rule demands the kind. */
  methodCall(name: string, setter: boolean, arity: number): MethodCallKind;
  constantRead(name: string): ConstantReadKind;
  isMethodCallDemanded(name: string, setter: boolean, arity: number): boolean;
  isConstantDemanded(name: string): boolean;
};

/** Returns the memoized value for `key`, creating it on first use. */
function intern<K, V>(table: Map<K, V>, key: K, create: () => V): V {
  const existing = table.get(key);
  if (existing !== undefined) return existing;
  const value = create();
  table.set(key, value);
  return value;
}

export function createKindRegistry(
  rules: readonly SynthesisRule[],
  ctx: DemandContext,
  range: IntegerRange
): KindRegistry {
  const accesses = new Map<string, VariableAccessKind>();
  const selves = new Map<string, SelfKind>();
  const integers = new Map<number, IntegerLiteralKind>();
  const methodCalls = new Map<string, MethodCallKind>();
  const constants = new Map<string, ConstantReadKind>();
  const demanded = new Map<string, boolean>();

  const demand = (
    key: string,
    predicate: (rule: SynthesisRule) => boolean
  ): boolean => intern(demanded, key, () => rules.some(predicate));

  const isMethodCallDemanded = (
    name: string,
    setter: boolean,
    arity: number
  ): boolean =>
    demand(kindKey({ tag: 'MethodCall', name, setter, arity }), rule =>
      rule.requiresMethodCall
        ? rule.requiresMethodCall(name, setter, arity, ctx)
        : false
    );

  const isConstantDemanded = (name: string): boolean =>
    demand(kindKey({ tag: 'ConstantReadAccess', name }), rule =>
      rule.requiresConstant ? rule.requiresConstant(name, ctx) : false
    );

  return {
    simple: tag => SIMPLE_KINDS[tag],

    variableAccess: variable =>
      intern(accesses, variable.key, () => accessKindOf(variable)),

    self: variable =>
      intern(selves, variable.key, (): SelfKind => ({ tag: 'Self', variable })),

    integerLiteral: value =>
      intern(integers, value, (): IntegerLiteralKind => {
        if (!Number.isInteger(value)) {
          throw new Error(
            `[synthesis] Integer literal kinds take integer values, got ${value}.`
          );
        }
        const { min, max } = range;
        if (value < min || value > max) {
          throw new Error(
            `[synthesis] Integer literal kind ${value} is outside the synthesizable range [${min}, ${max}].`
          );
        }
        return { tag: 'IntegerLiteral', value };
      }),

    rangeLiteral: inclusive =>
      inclusive ? RANGE_KINDS.inclusive : RANGE_KINDS.exclusive,

    methodCall(name, setter, arity) {
      const candidate: MethodCallKind = { tag: 'MethodCall', name, setter, arity };
      const key = kindKey(candidate);
      return intern(methodCalls, key, () => {
        if (!isMethodCallDemanded(name, setter, arity)) {
          throw new Error(
            `[synthesis] Method-call kind ${key} is not demanded by any rule.`
          );
        }
        return candidate;
      });
    },

    constantRead: name =>
      intern(constants, name, (): ConstantReadKind => {
        if (!isConstantDemanded(name)) {
          throw new Error(
            `[synthesis] Constant-read kind "${name}" is not demanded by any rule.`
          );
        }
        return { tag: 'ConstantReadAccess', name };
      }),

    isMethodCallDemanded,
    isConstantDemanded
  };
}

function accessKindOf(variable: AccessibleVariable): VariableAccessKind {
  switch (variable.type) {
    case 'LocalVariable':
      return { tag: 'LocalVariableAccessReal', variable };
    case 'SynthLocalVariable':
      return { tag: 'LocalVariableAccessSynth', variable };
    case 'InstanceVariable':
      return { tag: 'InstanceVariableAccess', variable };
    case 'ClassVariable':
      return { tag: 'ClassVariableAccess', variable };
    case 'GlobalVariable':
      return { tag: 'GlobalVariableAccess', variable };
  }
}
