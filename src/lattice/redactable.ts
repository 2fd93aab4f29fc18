import type { Order, Semilattice } from "./semilattice";

export type Redactable<T> =
  | { readonly kind: "live"; readonly value: T }
  | { readonly kind: "redacted" };

export const live = <T>(value: T): Redactable<T> => ({ kind: "live", value });
export const REDACTED: Redactable<never> = { kind: "redacted" };

/**
 * A redacted cell absorbs everything joined into it. Two live values keep
 * the greater one under `order` (code point order for strings), so `bottom`
 * has to be the least element of that order.
 */
export const redactable = <T>(order: Order<T>, bottom: T): Semilattice<Redactable<T>> => ({
  bottom: () => live(bottom),
  join: (a, b) => {
    if (a.kind === "redacted") return a;
    if (b.kind === "redacted") return b;
    return order.compare(a.value, b.value) < 0 ? b : a;
  },
  compare: (a, b) => {
    if (a.kind === "redacted") return b.kind === "redacted" ? 0 : 1;
    if (b.kind === "redacted") return -1;
    return order.compare(a.value, b.value);
  },
});

export const isLive = <T>(r: Redactable<T>): r is { readonly kind: "live"; readonly value: T } =>
  r.kind === "live";
