import { DerivationError } from "../errors";
import { gmap, maxU64, stringOrder, type GMap, type GMapLattice } from "./primitives";
import type { ActorId } from "../types/brands";

/**
 * Per-actor monotonic counters; `counter mod n` is that actor's current
 * choice among `n` categories. Joins as the underlying map.
 */
export type Vote = GMap<ActorId, bigint>;

export interface VoteLattice extends GMapLattice<ActorId, bigint> {
  readonly arity: number;
}

export const vote = (arity: number): VoteLattice => {
  if (!Number.isSafeInteger(arity) || arity < 1)
    throw new DerivationError(`vote arity must be a positive integer, got ${arity}`);
  return { ...gmap<ActorId, bigint>(stringOrder, maxU64), arity };
};

/** Display-only histogram: how many actors currently sit in each category. */
export const aggregate = (l: VoteLattice, v: Vote): number[] => {
  const counts = new Array<number>(l.arity).fill(0);
  const n = BigInt(l.arity);
  for (const [, counter] of v) counts[Number(counter % n)] += 1;
  return counts;
};

export const categoryOf = (l: VoteLattice, counter: bigint): number =>
  Number(counter % BigInt(l.arity));
