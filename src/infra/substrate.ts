import type { ActorId } from "../types/brands";

/**
 * Content-addressed store the Slices travel through. Each actor has one
 * reference, overwritten on every publish (last write wins), which is safe
 * because a published Slice only ever grows.
 */
export interface ReplicationSubstrate {
  write(actor: ActorId, bytes: Uint8Array): Promise<void>;
  read(actor: ActorId): Promise<Uint8Array | undefined>;
  /** Every currently published actor, in no particular order. */
  readAll(): Promise<[ActorId, Uint8Array][]>;
  /** Materialized view cache; never authoritative. */
  writeCache(bytes: Uint8Array): Promise<void>;
  readCache(): Promise<Uint8Array | undefined>;
}
