/**
 * Union of `T` variants in which at least one optional key is present.
 *
 * Each key of `T` yields one variant where that key is required and the
 * rest stay optional. A rule with only a `name` matches none of them:
 *
 * @example
 * ```ts
 * type Features = { synthesize?: S; excludeFromControlFlow?: E };
 *
 * // | { synthesize: S; excludeFromControlFlow?: E }
 * // | { excludeFromControlFlow: E; synthesize?: S }
 * type AnyFeature = RequireAtLeastOne<Features>;
 * ```
 */
export type RequireAtLeastOne<T> = {
  [K in keyof T]-?: Required<Pick<T, K>> & Partial<Omit<T, K>>;
}[keyof T];
