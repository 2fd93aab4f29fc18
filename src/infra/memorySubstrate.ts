import { blobId, type Hex } from "../core/hash";
import type { ActorId } from "../types/brands";
import type { ReplicationSubstrate } from "./substrate";

/** In-process substrate: blobs by keccak id plus a ref table. */
export class MemorySubstrate implements ReplicationSubstrate {
  private blobs = new Map<Hex, Uint8Array>();
  private refs = new Map<ActorId, Hex>();
  private cacheRef: Hex | undefined;

  async write(actor: ActorId, bytes: Uint8Array): Promise<void> {
    this.refs.set(actor, this.put(bytes));
  }

  async read(actor: ActorId): Promise<Uint8Array | undefined> {
    return this.get(this.refs.get(actor));
  }

  async readAll(): Promise<[ActorId, Uint8Array][]> {
    const out: [ActorId, Uint8Array][] = [];
    for (const [actor, id] of this.refs) {
      const bytes = this.get(id);
      if (bytes) out.push([actor, bytes]);
    }
    return out;
  }

  async writeCache(bytes: Uint8Array): Promise<void> {
    this.cacheRef = this.put(bytes);
  }

  async readCache(): Promise<Uint8Array | undefined> {
    return this.get(this.cacheRef);
  }

  /** Distinct blobs held; identical republishes share one. */
  get blobCount(): number {
    return this.blobs.size;
  }

  refOf(actor: ActorId): Hex | undefined {
    return this.refs.get(actor);
  }

  private put(bytes: Uint8Array): Hex {
    const id = blobId(bytes);
    if (!this.blobs.has(id)) this.blobs.set(id, Uint8Array.from(bytes));
    return id;
  }

  private get(id: Hex | undefined): Uint8Array | undefined {
    const bytes = id === undefined ? undefined : this.blobs.get(id);
    return bytes && Uint8Array.from(bytes);
  }
}
