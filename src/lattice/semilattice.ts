/* ── join-semilattice contract ───────────────────────────── */

/** -1 less, 0 equal, 1 greater; `undefined` when incomparable. */
export type Ordering = -1 | 0 | 1;
export type PartialOrdering = Ordering | undefined;

/**
 * A join-semilattice over `T`, passed around as a dictionary rather than
 * attached to values, so plain data (bigints, arrays, records) can take part.
 *
 * `join` must be idempotent, commutative and associative with `bottom()` as
 * its identity; `compare` must agree with it: `a ≤ b ⇔ join(a, b) = b`.
 */
export interface Semilattice<T> {
  readonly bottom: () => T;
  readonly join: (a: T, b: T) => T;
  readonly compare: (a: T, b: T) => PartialOrdering;
}

/** Total order on keys and set elements. */
export interface Order<T> {
  readonly compare: (a: T, b: T) => Ordering;
}

export type LatticeValue<L> = L extends Semilattice<infer T> ? T : never;

export const leq = <T>(l: Semilattice<T>, a: T, b: T): boolean => {
  const o = l.compare(a, b);
  return o === -1 || o === 0;
};

export const equals = <T>(l: Semilattice<T>, a: T, b: T): boolean =>
  l.compare(a, b) === 0;

export const isBottom = <T>(l: Semilattice<T>, v: T): boolean =>
  equals(l, v, l.bottom());

export const joinAll = <T>(l: Semilattice<T>, values: Iterable<T>): T => {
  let acc = l.bottom();
  for (const v of values) acc = l.join(acc, v);
  return acc;
};

/**
 * Product rule: all equal → equal; equal-or-less with one strict less →
 * less (and the mirror for greater); mixed directions or any incomparable
 * component → incomparable.
 */
export const combineOrderings = (orderings: Iterable<PartialOrdering>): PartialOrdering => {
  let acc: Ordering = 0;
  for (const o of orderings) {
    if (o === undefined) return undefined;
    if (o === 0) continue;
    if (acc === 0) acc = o;
    else if (acc !== o) return undefined;
  }
  return acc;
};

export const sign = (n: number): Ordering => (n < 0 ? -1 : n > 0 ? 1 : 0);

export const isSemilattice = (x: unknown): x is Semilattice<unknown> =>
  typeof x === "object" &&
  x !== null &&
  "bottom" in x &&
  "join" in x &&
  "compare" in x &&
  typeof x.bottom === "function" &&
  typeof x.join === "function" &&
  typeof x.compare === "function";
