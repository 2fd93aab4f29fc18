import { DerivationError } from "../errors";
import {
  combineOrderings,
  isSemilattice,
  type PartialOrdering,
  type Semilattice,
} from "./semilattice";

/* ── structural derivation for product types ──────────────── */

type IsUnion<T, U = T> = T extends unknown ? ([U] extends [T] ? false : true) : false;

export type Fields<T> = { readonly [K in keyof T]: Semilattice<T[K]> };

/**
 * Field descriptors for `T`, or `never` when `T` is a union: there is no
 * canonical join between values carrying different tags, so a tagged
 * variant cannot be derived and the call does not type-check.
 */
export type ProductFields<T> = [IsUnion<T>] extends [false] ? Fields<T> : never;

interface FieldOps<T> {
  readonly key: keyof T;
  readonly bottom: () => unknown;
  readonly join: (a: T, b: T) => unknown;
  readonly compare: (a: T, b: T) => PartialOrdering;
}

const fieldOps = <T, K extends keyof T>(key: K, l: Semilattice<T[K]>): FieldOps<T> => {
  if (!isSemilattice(l)) throw new DerivationError(`field ${String(key)} is not joinable`);
  return {
    key,
    bottom: () => l.bottom(),
    join: (a, b) => l.join(a[key], b[key]),
    compare: (a, b) => l.compare(a[key], b[key]),
  };
};

const derive = <T>(
  ops: readonly FieldOps<T>[],
  assemble: (values: readonly unknown[]) => T,
): Semilattice<T> => ({
  bottom: () => assemble(ops.map((op) => op.bottom())),
  join: (a, b) => assemble(ops.map((op) => op.join(a, b))),
  compare: (a, b) => combineOrderings(ops.map((op) => op.compare(a, b))),
});

/**
 * Derives the componentwise join and the induced partial order for a record
 * whose every field is joinable. Fields are visited in declaration order.
 *
 * ```ts
 * const pair = product<{ hits: bigint; seen: GSet<string> }>({
 *   hits: maxU64,
 *   seen: gset(stringOrder),
 * });
 * ```
 */
export function product<T extends object>(fields: ProductFields<T>): Semilattice<T>;
export function product<T extends object>(fields: Fields<T>): Semilattice<T> {
  if (typeof fields !== "object" || fields === null)
    throw new DerivationError("product fields must be an object of semilattices");
  const ops: FieldOps<T>[] = [];
  for (const key in fields) ops.push(fieldOps<T, typeof key>(key, fields[key]));
  return derive(ops, (values) => {
    const out: Record<PropertyKey, unknown> = {};
    ops.forEach((op, i) => {
      out[op.key] = values[i];
    });
    // every key of T has exactly one descriptor in `ops`
    return out as T;
  });
}

/** Positional form of `product`: same rules, fields addressed by index. */
export const tuple = <T extends readonly unknown[]>(
  ...fields: { readonly [K in keyof T]: Semilattice<T[K]> }
): Semilattice<T> => {
  const ops = fields.map((l, i) => fieldOps<T, number>(i, l));
  return derive(ops, (values) => values as T);
};
