import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { computeRootDigest } from "../src/core/hash";
import { DecodeError, SubstrateError } from "../src/errors";
import { FsSubstrate } from "../src/infra/fsSubstrate";
import { MemorySubstrate } from "../src/infra/memorySubstrate";
import { ThreadStore } from "../src/infra/store";
import { openWorkspace } from "../src/infra/workspace";
import { loadConfig } from "../src/config";
import { silentLogger, type ILogger } from "../src/logging";
import { commentAt, liveContent, materialize } from "../src/model/detailed";
import { rootFromSlices, SliceL } from "../src/model/schema";
import { ActorSession } from "../src/model/session";
import { asActorId, asLocalId, messageId } from "../src/types/brands";

const alice = asActorId("alice");
const bob = asActorId("bob");

const recordingLogger = () => {
  const warnings: string[] = [];
  const noop = () => {};
  const logger: ILogger = {
    debug: noop,
    info: noop,
    error: noop,
    warn: (obj, msg) => {
      warnings.push(msg ?? String(obj));
    },
  };
  return { logger, warnings };
};

class FailingSubstrate extends MemorySubstrate {
  override async write(): Promise<void> {
    throw new Error("disk full");
  }
}

describe("ThreadStore over MemorySubstrate", () => {
  it("publishes and reads back a slice", async () => {
    const store = new ThreadStore(new MemorySubstrate());
    const s = new ActorSession(alice, 0);
    s.newThread("Hello", "Hi all", ["intro"]);
    await store.publishSession(s);
    expect(await store.loadSlice(alice)).toEqual(s.slice);
  });

  it("reads an unpublished actor as the empty slice", async () => {
    const store = new ThreadStore(new MemorySubstrate());
    expect(await store.loadSlice(bob)).toEqual(SliceL.bottom());
  });

  it("stores identical republishes once", async () => {
    const substrate = new MemorySubstrate();
    const store = new ThreadStore(substrate);
    const s = new ActorSession(alice, 0);
    s.newThread("Hello", "Hi all");
    const first = await store.publishSession(s);
    const second = await store.publishSession(s);
    expect(second).toBe(first);
    expect(substrate.blobCount).toBe(1);
    expect(substrate.refOf(alice)).toBe(first);
  });

  it("collates every actor into one root", async () => {
    const store = new ThreadStore(new MemorySubstrate());
    const a = new ActorSession(alice, 0);
    const b = new ActorSession(bob, 0);
    const thread = a.newThread("Hello", "Hi all");
    b.reply(thread, "Welcome!");
    await store.publishSession(b);
    await store.publishSession(a);

    const root = await store.collateRoot();
    const expected = rootFromSlices([
      [alice, a.slice],
      [bob, b.slice],
    ]);
    expect(root).toEqual(expected);
    expect(computeRootDigest(root)).toBe(computeRootDigest(expected));
    expect(commentAt(materialize(root), thread).backrefs).toEqual([[bob, 0n]]);
  });

  it("serves the cached view until told to rebuild", async () => {
    const store = new ThreadStore(new MemorySubstrate());
    const a = new ActorSession(alice, 0);
    const thread = a.newThread("Hello", "v0");
    await store.publishSession(a);
    const cached = await store.refreshCache();

    a.edit(thread[1], "v1");
    await store.publishSession(a);

    expect(await store.loadDetailed()).toEqual(cached);
    const fresh = await store.loadDetailed({ useCache: false });
    expect(liveContent(commentAt(fresh, thread))).toEqual([
      [0n, "v0"],
      [65536n, "v1"],
    ]);
  });

  it("rebuilds and warns when the cache cannot be decoded", async () => {
    const substrate = new MemorySubstrate();
    const { logger, warnings } = recordingLogger();
    const store = new ThreadStore(substrate, { logger });
    const a = new ActorSession(alice, 0);
    a.newThread("Hello", "Hi all");
    await store.publishSession(a);
    await substrate.writeCache(Uint8Array.of(0x05));

    expect(await store.loadDetailed()).toEqual(materialize(rootFromSlices([[alice, a.slice]])));
    expect(warnings).toEqual(["materialized cache unreadable, rebuilding"]);
  });

  it("names the actor whose slice is malformed", async () => {
    const substrate = new MemorySubstrate();
    await substrate.write(alice, Uint8Array.of(0x05));
    const store = new ThreadStore(substrate);
    await expect(store.loadSlice(alice)).rejects.toThrow(DecodeError);
    await expect(store.collateRoot()).rejects.toThrow(
      "decode failed at threads/alice: expected struct, got a byte string",
    );
  });

  it("wraps substrate failures", async () => {
    const store = new ThreadStore(new FailingSubstrate());
    await expect(store.publish(alice, SliceL.bottom())).rejects.toThrow(SubstrateError);
    await expect(store.publish(alice, SliceL.bottom())).rejects.toThrow("substrate threads/alice: disk full");
  });
});

describe("FsSubstrate", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "threadlog-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lays out objects and refs on disk", async () => {
    const store = new ThreadStore(new FsSubstrate(dir));
    const s = new ActorSession(alice, 0);
    s.newThread("Hello", "Hi all");
    const id = await store.publishSession(s);

    expect(await readFile(join(dir, "refs", "threads", "616c696365"), "utf8")).toBe(id.slice(2));
    expect(await readdir(join(dir, "objects"))).toEqual([id.slice(2)]);
    expect(await readdir(join(dir, "refs", "threads"))).toEqual(["616c696365"]);
    expect(await store.loadSlice(alice)).toEqual(s.slice);
  });

  it("keeps actors with path-like names as plain ref files", async () => {
    const substrate = new FsSubstrate(dir);
    const slashed = asActorId("team/bob");
    const dots = asActorId("..");
    const tmpLike = asActorId("x.tmp");
    await substrate.write(slashed, Uint8Array.of(1, 2, 3));
    await substrate.write(dots, Uint8Array.of(5));
    await substrate.write(tmpLike, Uint8Array.of(6));
    await substrate.write(alice, Uint8Array.of(4));

    expect((await readdir(join(dir, "refs", "threads"))).sort()).toEqual([
      "2e2e",
      "616c696365",
      "7465616d2f626f62",
      "782e746d70",
    ]);
    expect(await substrate.readAll()).toEqual([
      [dots, Uint8Array.of(5)],
      [alice, Uint8Array.of(4)],
      [slashed, Uint8Array.of(1, 2, 3)],
      [tmpLike, Uint8Array.of(6)],
    ]);
    expect(await substrate.read(dots)).toEqual(Uint8Array.of(5));
  });

  it("refuses an empty actor name", async () => {
    const substrate = new FsSubstrate(dir);
    await expect(substrate.write(asActorId(""), Uint8Array.of(1))).rejects.toThrow(SubstrateError);
    await expect(substrate.read(asActorId(""))).rejects.toThrow("substrate threads/: empty actor name");
  });

  it("reads nothing from an empty directory", async () => {
    const substrate = new FsSubstrate(join(dir, "fresh"));
    expect(await substrate.readAll()).toEqual([]);
    expect(await substrate.read(alice)).toBeUndefined();
    expect(await substrate.readCache()).toBeUndefined();
  });

  it("keeps the cache under its own ref", async () => {
    const store = new ThreadStore(new FsSubstrate(dir));
    const s = new ActorSession(alice, 0);
    s.newThread("Hello", "Hi all");
    await store.publishSession(s);
    const view = await store.refreshCache();

    const ref = await readFile(join(dir, "refs", "threads-materialized"), "utf8");
    expect(ref).toMatch(/^[0-9a-f]{64}$/);
    expect(await store.loadDetailed()).toEqual(view);
  });

  it("rejects a malformed ref", async () => {
    const substrate = new FsSubstrate(dir);
    await substrate.write(alice, Uint8Array.of(1));
    await writeFile(join(dir, "refs", "threads", "616c696365"), "not-a-blob-id");
    await expect(substrate.read(alice)).rejects.toThrow(SubstrateError);
  });
});

describe("openWorkspace", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "threadlog-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("opens a session on the configured device and directory", async () => {
    const config = loadConfig({ THREADLOG_DIR: dir, THREADLOG_DEVICE: "3" });
    const { store, session } = await openWorkspace(config, alice, silentLogger());
    expect(session.device).toBe(3);
    expect(session.newThread("Hello", "Hi all")).toEqual([alice, 3n]);
    const id = await store.publishSession(session);
    expect(await readFile(join(dir, "refs", "threads", "616c696365"), "utf8")).toBe(id.slice(2));
  });

  it("resumes from the actor's published slice", async () => {
    const config = loadConfig({ THREADLOG_DIR: dir, THREADLOG_DEVICE: "3" });
    const first = await openWorkspace(config, alice, silentLogger());
    first.session.newThread("Hello", "Hi all");
    await first.store.publishSession(first.session);

    const again = await openWorkspace(config, alice, silentLogger());
    expect(again.session.slice).toEqual(first.session.slice);
    expect(again.session.reply(messageId(alice, asLocalId(3n)), "r")).toEqual([alice, 65539n]);
  });
});
