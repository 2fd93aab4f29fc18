import {
  combineOrderings,
  sign,
  type Order,
  type Ordering,
  type PartialOrdering,
  type Semilattice,
} from "./semilattice";
import type { MessageId } from "../types/brands";

/* ── orders ──────────────────────────────────────────────── */

export const bigintOrder: Order<bigint> = {
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
};

/** Code point order, which is also the order of the UTF-8 encodings. */
export const stringOrder: Order<string> = {
  compare: (a, b) => {
    if (a === b) return 0;
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; ) {
      const ca = a.codePointAt(i) ?? 0;
      const cb = b.codePointAt(i) ?? 0;
      if (ca !== cb) return ca < cb ? -1 : 1;
      i += ca > 0xffff ? 2 : 1;
    }
    return sign(a.length - b.length);
  },
};

export const messageIdOrder: Order<MessageId> = {
  compare: (a, b) => stringOrder.compare(a[0], b[0]) || bigintOrder.compare(a[1], b[1]),
};

/* ── Max<T> ──────────────────────────────────────────────── */

export const max = <T>(order: Order<T>, bottom: T): Semilattice<T> => ({
  bottom: () => bottom,
  join: (a, b) => (order.compare(a, b) < 0 ? b : a),
  compare: order.compare,
});

export const maxU64: Semilattice<bigint> = max<bigint>(bigintOrder, 0n);

/* ── GSet<T> ─────────────────────────────────────────────── */

/** Grow-only set, kept strictly ascending so equal sets are identical arrays. */
export type GSet<T> = readonly T[];

export interface GSetLattice<T> extends Semilattice<GSet<T>> {
  readonly order: Order<T>;
}

export const gset = <T>(order: Order<T>): GSetLattice<T> => ({
  order,
  bottom: () => [],
  join: (a, b) => {
    if (a.length === 0) return b;
    if (b.length === 0) return a;
    const out: T[] = [];
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
      const o = order.compare(a[i], b[j]);
      if (o < 0) out.push(a[i++]);
      else if (o > 0) out.push(b[j++]);
      else {
        out.push(a[i++]);
        j++;
      }
    }
    while (i < a.length) out.push(a[i++]);
    while (j < b.length) out.push(b[j++]);
    return out;
  },
  compare: (a, b) => {
    let onlyA = false;
    let onlyB = false;
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
      const o = order.compare(a[i], b[j]);
      if (o < 0) {
        onlyA = true;
        i++;
      } else if (o > 0) {
        onlyB = true;
        j++;
      } else {
        i++;
        j++;
      }
    }
    if (i < a.length) onlyA = true;
    if (j < b.length) onlyB = true;
    if (onlyA && onlyB) return undefined;
    return onlyA ? 1 : onlyB ? -1 : 0;
  },
});

const search = <T, E>(
  xs: readonly E[],
  key: T,
  keyOf: (e: E) => T,
  order: Order<T>,
): number => {
  let lo = 0;
  let hi = xs.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const o = order.compare(keyOf(xs[mid]), key);
    if (o === 0) return mid;
    if (o < 0) lo = mid + 1;
    else hi = mid - 1;
  }
  return -1;
};

export const gsetHas = <T>(l: GSetLattice<T>, s: GSet<T>, x: T): boolean =>
  search(s, x, (e) => e, l.order) >= 0;

export const gsetOf = <T>(l: GSetLattice<T>, xs: Iterable<T>): GSet<T> => {
  const sorted = [...xs].sort(l.order.compare);
  return sorted.filter((x, i) => i === 0 || l.order.compare(sorted[i - 1], x) !== 0);
};

/* ── GMap<K, V> ──────────────────────────────────────────── */

export type Entry<K, V> = readonly [key: K, value: V];

/** Grow-only map; entries strictly ascending by key, absent key reads as bottom. */
export type GMap<K, V> = readonly Entry<K, V>[];

export interface GMapLattice<K, V> extends Semilattice<GMap<K, V>> {
  readonly keyOrder: Order<K>;
  readonly value: Semilattice<V>;
}

export const gmap = <K, V>(keyOrder: Order<K>, value: Semilattice<V>): GMapLattice<K, V> => ({
  keyOrder,
  value,
  bottom: () => [],
  join: (a, b) => {
    if (a.length === 0) return b;
    if (b.length === 0) return a;
    const out: Entry<K, V>[] = [];
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
      const o = keyOrder.compare(a[i][0], b[j][0]);
      if (o < 0) out.push(a[i++]);
      else if (o > 0) out.push(b[j++]);
      else {
        out.push([a[i][0], value.join(a[i][1], b[j][1])]);
        i++;
        j++;
      }
    }
    while (i < a.length) out.push(a[i++]);
    while (j < b.length) out.push(b[j++]);
    return out;
  },
  compare: (a, b) => {
    const orderings: PartialOrdering[] = [];
    let i = 0;
    let j = 0;
    while (i < a.length || j < b.length) {
      const o: Ordering =
        i >= a.length ? 1 : j >= b.length ? -1 : keyOrder.compare(a[i][0], b[j][0]);
      if (o < 0) orderings.push(value.compare(a[i++][1], value.bottom()));
      else if (o > 0) orderings.push(value.compare(value.bottom(), b[j++][1]));
      else orderings.push(value.compare(a[i++][1], b[j++][1]));
    }
    return combineOrderings(orderings);
  },
});

export const gmapGet = <K, V>(l: GMapLattice<K, V>, m: GMap<K, V>, key: K): V => {
  const at = search(m, key, (e) => e[0], l.keyOrder);
  return at >= 0 ? m[at][1] : l.value.bottom();
};

export const gmapHas = <K, V>(l: GMapLattice<K, V>, m: GMap<K, V>, key: K): boolean =>
  search(m, key, (e) => e[0], l.keyOrder) >= 0;

export const gmapSingleton = <K, V>(key: K, value: V): GMap<K, V> => [[key, value]];

/** Builds a map from unordered entries, joining values of repeated keys. */
export const gmapFrom = <K, V>(l: GMapLattice<K, V>, entries: Iterable<Entry<K, V>>): GMap<K, V> => {
  let out: GMap<K, V> = [];
  for (const [k, v] of entries) out = l.join(out, gmapSingleton(k, v));
  return out;
};

export const gmapKeys = <K, V>(m: GMap<K, V>): K[] => m.map(([k]) => k);

/* ── GuardedPair<G, V> ───────────────────────────────────── */

export interface GuardedPair<G, V> {
  readonly guard: G;
  readonly value: V;
}

/**
 * A strictly greater guard supersedes the other side wholesale; equal
 * guards join their values. Incomparable guards (not produced by the
 * totally ordered guards used here) join both components.
 */
export const guardedPair = <G, V>(
  guard: Semilattice<G>,
  value: Semilattice<V>,
): Semilattice<GuardedPair<G, V>> => ({
  bottom: () => ({ guard: guard.bottom(), value: value.bottom() }),
  join: (a, b) => {
    const o = guard.compare(a.guard, b.guard);
    if (o === 1) return a;
    if (o === -1) return b;
    if (o === 0) return { guard: a.guard, value: value.join(a.value, b.value) };
    return { guard: guard.join(a.guard, b.guard), value: value.join(a.value, b.value) };
  },
  compare: (a, b) => {
    const o = guard.compare(a.guard, b.guard);
    return o === 0 ? value.compare(a.value, b.value) : o;
  },
});
