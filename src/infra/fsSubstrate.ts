import { mkdir, readFile, readdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { SubstrateError } from "../errors";
import { blobId } from "../core/hash";
import { asActorId, type ActorId } from "../types/brands";
import type { ReplicationSubstrate } from "./substrate";

const THREADS_REFS = join("refs", "threads");
const CACHE_REF = join("refs", "threads-materialized");

const REF_NAME = /^(?:[0-9a-f]{2})+$/;
const utf8 = new TextDecoder();

/** Actor names become lowercase hex of their UTF-8, so no name can carry a dot or a slash. */
const refPath = (actor: ActorId): string => {
  if (actor === "") throw new SubstrateError("threads/", "empty actor name");
  return join(THREADS_REFS, bytesToHex(utf8ToBytes(actor)));
};

const isMissing = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";

/**
 * Directory-backed substrate laid out like a tiny object store:
 *
 *   objects/<keccak>               blob bytes
 *   refs/threads/<hex(actor)>      blob id of that actor's Slice
 *   refs/threads-materialized      blob id of the cached view
 *
 * Refs and blobs are written to a temp file and renamed into place, so a
 * reader sees either the old or the new ref, never a torn one.
 */
export class FsSubstrate implements ReplicationSubstrate {
  constructor(private readonly dir: string) {}

  async write(actor: ActorId, bytes: Uint8Array): Promise<void> {
    const id = await this.putBlob(bytes, `threads/${actor}`);
    await this.atomicWrite(refPath(actor), id, `threads/${actor}`);
  }

  async read(actor: ActorId): Promise<Uint8Array | undefined> {
    return this.resolve(refPath(actor), `threads/${actor}`);
  }

  async readAll(): Promise<[ActorId, Uint8Array][]> {
    let names: string[];
    try {
      names = await readdir(join(this.dir, THREADS_REFS));
    } catch (err) {
      if (isMissing(err)) return [];
      throw new SubstrateError("refs/threads", "cannot list refs", { cause: err });
    }
    const out: [ActorId, Uint8Array][] = [];
    for (const name of names.filter((n) => REF_NAME.test(n)).sort()) {
      const actor = asActorId(utf8.decode(hexToBytes(name)));
      const bytes = await this.read(actor);
      if (bytes) out.push([actor, bytes]);
    }
    return out;
  }

  async writeCache(bytes: Uint8Array): Promise<void> {
    const id = await this.putBlob(bytes, "threads-materialized");
    await this.atomicWrite(CACHE_REF, id, "threads-materialized");
  }

  async readCache(): Promise<Uint8Array | undefined> {
    return this.resolve(CACHE_REF, "threads-materialized");
  }

  /* ── internals ───────────────────────────────────────── */

  private async putBlob(bytes: Uint8Array, ref: string): Promise<string> {
    const id = blobId(bytes).slice(2);
    await this.atomicWrite(join("objects", id), bytes, ref);
    return id;
  }

  private async resolve(path: string, ref: string): Promise<Uint8Array | undefined> {
    try {
      const id = (await readFile(join(this.dir, path), "utf8")).trim();
      if (!/^[0-9a-f]{64}$/.test(id)) throw new SubstrateError(ref, `malformed ref ${JSON.stringify(id)}`);
      return new Uint8Array(await readFile(join(this.dir, "objects", id)));
    } catch (err) {
      if (isMissing(err)) return undefined;
      if (err instanceof SubstrateError) throw err;
      throw new SubstrateError(ref, "read failed", { cause: err });
    }
  }

  private async atomicWrite(relPath: string, data: Uint8Array | string, ref: string): Promise<void> {
    const target = join(this.dir, relPath);
    const tmp = `${target}.${process.pid}.tmp`;
    try {
      await mkdir(join(target, ".."), { recursive: true });
      await writeFile(tmp, data);
      await rename(tmp, target);
    } catch (err) {
      throw new SubstrateError(ref, `write of ${relPath} failed`, { cause: err });
    }
  }
}
