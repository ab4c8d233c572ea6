import type { ScopeNode, SelfScopeNode } from './nodes';

/**
 * Variables of the real program, as resolved by {@link SourceTree}.
 *
 * Every variable is interned by its `key`, so two accesses bound to the same
 * variable yield the same object.
 */

export type LocalVariable = {
  readonly type: 'LocalVariable';
  readonly key: string;
  readonly name: string;
  readonly scope: ScopeNode;
};

export type InstanceVariable = {
  readonly type: 'InstanceVariable';
  readonly key: string;
  readonly name: string;
  /** Class body (or toplevel) whose instances own the variable. */
  readonly owner: SelfScopeNode;
};

export type ClassVariable = {
  readonly type: 'ClassVariable';
  readonly key: string;
  readonly name: string;
  readonly owner: SelfScopeNode;
};

export type GlobalVariable = {
  readonly type: 'GlobalVariable';
  readonly key: string;
  readonly name: string;
};

/** The implicit `self` of a toplevel, class body or method body. */
export type SelfVariable = {
  readonly type: 'SelfVariable';
  readonly key: string;
  readonly scope: SelfScopeNode;
};

export type StorageVariable =
  | LocalVariable
  | InstanceVariable
  | ClassVariable
  | GlobalVariable;

export type SourceVariable = StorageVariable | SelfVariable;
