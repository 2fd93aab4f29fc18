import { decodeDetailed, decodeSlice, encodeDetailed, encodeSlice } from "../codec/schema";
import { blobId, computeRootDigest, type Hex } from "../core/hash";
import { DecodeError, SubstrateError, withDecodePath } from "../errors";
import { silentLogger, type ILogger } from "../logging";
import { materialize, type Detailed } from "../model/detailed";
import { RootL, SliceL, withSlice, type Root, type Slice } from "../model/schema";
import type { ActorSession } from "../model/session";
import type { ActorId } from "../types/brands";
import type { ReplicationSubstrate } from "./substrate";

const guard = async <T>(ref: string, op: () => Promise<T>): Promise<T> => {
  try {
    return await op();
  } catch (err) {
    if (err instanceof SubstrateError) throw err;
    throw new SubstrateError(ref, err instanceof Error ? err.message : String(err), { cause: err });
  }
};

/**
 * Publishes Slices to a substrate and reads the combined state back.
 * Holds no state of its own: every Root and view is rebuilt from what the
 * substrate returns.
 */
export class ThreadStore {
  private log: ILogger;

  constructor(
    private readonly substrate: ReplicationSubstrate,
    opts: { logger?: ILogger } = {},
  ) {
    this.log = opts.logger ?? silentLogger();
  }

  /** Writes the full Slice. Republishing the same content is harmless. */
  async publish(actor: ActorId, slice: Slice): Promise<Hex> {
    const bytes = encodeSlice(slice);
    await guard(`threads/${actor}`, () => this.substrate.write(actor, bytes));
    const id = blobId(bytes);
    this.log.info({ actor, blob: id, owned: slice.owned.length, shared: slice.shared.length }, "publish");
    return id;
  }

  publishSession(session: ActorSession): Promise<Hex> {
    return this.publish(session.actor, session.slice);
  }

  /** A never-published actor reads as the empty Slice. */
  async loadSlice(actor: ActorId): Promise<Slice> {
    const bytes = await guard(`threads/${actor}`, () => this.substrate.read(actor));
    if (!bytes) return SliceL.bottom();
    return withDecodePath(`threads/${actor}`, () => decodeSlice(bytes));
  }

  /** Joins every published Slice into one Root. Any malformed Slice aborts. */
  async collateRoot(): Promise<Root> {
    const published = await guard("refs/threads", () => this.substrate.readAll());
    let root = RootL.bottom();
    for (const [actor, bytes] of published) {
      const slice = withDecodePath(`threads/${actor}`, () => decodeSlice(bytes));
      root = withSlice(root, actor, slice);
    }
    this.log.debug({ actors: root.inner.length, digest: computeRootDigest(root) }, "collated root");
    return root;
  }

  /** Cached view when present and readable, otherwise a full rebuild. */
  async loadDetailed(opts: { useCache?: boolean } = {}): Promise<Detailed> {
    if (opts.useCache ?? true) {
      const cached = await guard("threads-materialized", () => this.substrate.readCache());
      if (cached) {
        try {
          return decodeDetailed(cached);
        } catch (err) {
          if (!(err instanceof DecodeError)) throw err;
          this.log.warn({ err: err.message }, "materialized cache unreadable, rebuilding");
        }
      }
    }
    return materialize(await this.collateRoot());
  }

  /** Rebuilds the view from all Slices and stores it as the cache. */
  async refreshCache(): Promise<Detailed> {
    const view = materialize(await this.collateRoot());
    const bytes = encodeDetailed(view);
    await guard("threads-materialized", () => this.substrate.writeCache(bytes));
    this.log.info({ blob: blobId(bytes) }, "cache refreshed");
    return view;
  }
}
