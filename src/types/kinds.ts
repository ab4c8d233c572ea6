import type {
  ClassVariable,
  GlobalVariable,
  InstanceVariable,
  LocalVariable,
  SelfVariable
} from '../source/variables';
import type { SynthLocalVariable } from './variables';

/**
 * Operator kinds produced by compound-assignment desugaring.
 */
export type OperatorKindTag =
  | 'AddExpr'
  | 'SubExpr'
  | 'MulExpr'
  | 'DivExpr'
  | 'ModuloExpr'
  | 'ExponentExpr'
  | 'LShiftExpr'
  | 'RShiftExpr'
  | 'BitwiseAndExpr'
  | 'BitwiseOrExpr'
  | 'BitwiseXorExpr'
  | 'LogicalAndExpr'
  | 'LogicalOrExpr';

/** One object type per operator tag, so `Extract` can narrow by tag. */
export type OperatorKind = {
  [T in OperatorKindTag]: { readonly tag: T };
}[OperatorKindTag];

/**
 * The closed set of synthesizable node kinds.
 *
 * A kind is a pure value: its identity is its `tag` plus its parameters, as
 * encoded by `kindKey`. Two requests for the same logical kind compare equal
 * by key and, through the {@link KindRegistry}, by reference.
 */
export type SynthKind =
  | OperatorKind
  | { readonly tag: 'AssignExpr' }
  | { readonly tag: 'BraceBlock' }
  | { readonly tag: 'StmtSequence' }
  | { readonly tag: 'SimpleParameter' }
  | { readonly tag: 'SplatExpr' }
  | { readonly tag: 'LocalVariableAccessReal'; readonly variable: LocalVariable }
  | {
      readonly tag: 'LocalVariableAccessSynth';
      readonly variable: SynthLocalVariable;
    }
  | {
      readonly tag: 'InstanceVariableAccess';
      readonly variable: InstanceVariable;
    }
  | { readonly tag: 'ClassVariableAccess'; readonly variable: ClassVariable }
  | { readonly tag: 'GlobalVariableAccess'; readonly variable: GlobalVariable }
  | { readonly tag: 'Self'; readonly variable: SelfVariable }
  | { readonly tag: 'IntegerLiteral'; readonly value: number }
  | { readonly tag: 'RangeLiteral'; readonly inclusive: boolean }
  | {
      readonly tag: 'MethodCall';
      readonly name: string;
      readonly setter: boolean;
      readonly arity: number;
    }
  | { readonly tag: 'ConstantReadAccess'; readonly name: string };

export type SynthKindTag = SynthKind['tag'];

export type SynthKindOf<T extends SynthKindTag> = Extract<
  SynthKind,
  { tag: T }
>;

/** Kinds that read a variable. */
export type VariableAccessKind = SynthKindOf<
  | 'LocalVariableAccessReal'
  | 'LocalVariableAccessSynth'
  | 'InstanceVariableAccess'
  | 'ClassVariableAccess'
  | 'GlobalVariableAccess'
  | 'Self'
>;

/** Kinds whose identity depends on nothing but their tag. */
export type SimpleKindTag =
  | OperatorKindTag
  | 'AssignExpr'
  | 'BraceBlock'
  | 'StmtSequence'
  | 'SimpleParameter'
  | 'SplatExpr';
