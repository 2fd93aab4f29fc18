import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ActorSession, MAX_DEVICES, reactStep, tagStep } from "../src/model/session";
import { countersL, ownedOf, sharedOf, SliceL } from "../src/model/schema";
import { gmapGet, gmapKeys } from "../src/lattice/primitives";
import { live, REDACTED } from "../src/lattice/redactable";
import { joinAll, leq } from "../src/lattice/semilattice";
import { SessionError } from "../src/errors";
import { asActorId, asLocalId, messageId } from "../src/types/brands";

const alice = asActorId("alice");
const bob = asActorId("bob");

const thrown = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
};

describe("ActorSession", () => {
  describe("identifiers", () => {
    it("allocates count << 16 | device", () => {
      const s = new ActorSession(alice, 0);
      const thread = s.newThread("Hello", "first");
      const replyId = s.reply(thread, "second");
      expect(thread).toEqual([alice, 0n]);
      expect(replyId).toEqual([alice, 65536n]);

      const d3 = new ActorSession(alice, 3);
      expect(d3.newThread("t", "b")).toEqual([alice, 3n]);
      expect(d3.reply(messageId(bob, asLocalId(0n)), "b")).toEqual([alice, 65539n]);
    });

    it("never collides across devices of one actor", () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: MAX_DEVICES - 1 }),
          fc.integer({ min: 0, max: MAX_DEVICES - 1 }),
          fc.nat({ max: 5 }),
          (d1, d2, n) => {
            fc.pre(d1 !== d2);
            const a = new ActorSession(alice, d1);
            const b = new ActorSession(alice, d2);
            for (let i = 0; i <= n; i++) {
              a.newThread("a", "a");
              b.newThread("b", "b");
            }
            const ours = new Set(gmapKeys(a.slice.owned));
            for (const id of gmapKeys(b.slice.owned)) expect(ours.has(id)).toBe(false);
          },
        ),
      );
    });

    it("keeps allocating fresh ids after absorbing another device", () => {
      const a = new ActorSession(alice, 1);
      const b = new ActorSession(alice, 2);
      a.newThread("a", "a");
      b.newThread("b", "b");
      a.absorb(b.slice);
      const next = a.newThread("c", "c");
      expect(next).toEqual([alice, 131073n]);
      expect(a.slice.owned.length).toBe(3);
    });

    it("rejects device ids outside 16 bits", () => {
      for (const device of [-1, MAX_DEVICES, 1.5]) {
        const err = thrown(() => new ActorSession(alice, device));
        expect(err).toBeInstanceOf(SessionError);
        expect(err).toMatchObject({ reason: "device-range" });
      }
      expect(new ActorSession(alice, MAX_DEVICES - 1).device).toBe(65535);
    });
  });

  describe("newThread and reply", () => {
    it("writes title, body and the author's tag votes", () => {
      const s = new ActorSession(alice, 0);
      const id = s.newThread("Hello", "Hi all", ["meta", "intro"]);
      const owned = ownedOf(s.slice, asLocalId(0n));
      expect(owned).toEqual({
        titles: { guard: 0n, value: ["Hello"] },
        replyTo: [],
        content: [[0n, live("Hi all")]],
      });
      expect(sharedOf(s.slice, id).tags).toEqual([
        ["intro", 1n],
        ["meta", 1n],
      ]);
    });

    it("writes no shared entry for an untagged thread", () => {
      const s = new ActorSession(alice, 0);
      s.newThread("Hello", "Hi all");
      expect(s.slice.shared).toEqual([]);
    });

    it("records the parent of a reply", () => {
      const s = new ActorSession(bob, 0);
      const parent = messageId(alice, asLocalId(0n));
      const id = s.reply(parent, "Welcome!");
      const owned = ownedOf(s.slice, id[1]);
      expect(owned.replyTo).toEqual([parent]);
      expect(owned.titles).toEqual({ guard: 0n, value: [] });
    });
  });

  describe("edit and redact", () => {
    it("allocates versions above the highest existing one", () => {
      const s = new ActorSession(alice, 0);
      const [, local] = s.newThread("t", "v0");
      expect(s.edit(local, "v1")).toBe(65536n);
      expect(s.edit(local, "v2")).toBe(131072n);
      expect(ownedOf(s.slice, local).content).toEqual([
        [0n, live("v0")],
        [65536n, live("v1")],
        [131072n, live("v2")],
      ]);
    });

    it("stamps the device into the version", () => {
      const s = new ActorSession(alice, 5);
      const [, local] = s.newThread("t", "v0");
      expect(local).toBe(5n);
      expect(s.edit(local, "v1")).toBe(65541n);
    });

    it("tombstones a version, even one never written", () => {
      const s = new ActorSession(alice, 0);
      const [, local] = s.newThread("t", "v0");
      s.redact(local, 0n);
      s.redact(local, 999n);
      expect(ownedOf(s.slice, local).content).toEqual([
        [0n, REDACTED],
        [999n, REDACTED],
      ]);
    });

    it("refuses ids this device never allocated", () => {
      const s = new ActorSession(alice, 0);
      const edit = thrown(() => s.edit(asLocalId(65536n), "x"));
      expect(edit).toBeInstanceOf(SessionError);
      expect(edit).toMatchObject({ reason: "unknown-message" });
      expect(thrown(() => s.redact(asLocalId(65536n), 0n))).toMatchObject({ reason: "unknown-message" });
      expect(s.slice).toEqual(SliceL.bottom());
    });

    it("edits and redacts a sibling device's message before absorbing it", () => {
      const devA = new ActorSession(alice, 0);
      const [, local] = devA.newThread("Hello", "v0");
      const devB = new ActorSession(alice, 1);

      devB.redact(local, 0n);
      expect(devB.edit(local, "from B")).toBe(65537n);
      expect(ownedOf(devB.slice, local).content).toEqual([
        [0n, REDACTED],
        [65537n, live("from B")],
      ]);

      const merged = SliceL.join(devA.slice, devB.slice);
      expect(ownedOf(merged, local)).toEqual({
        titles: { guard: 0n, value: ["Hello"] },
        replyTo: [],
        content: [
          [0n, REDACTED],
          [65537n, live("from B")],
        ],
      });
    });
  });

  describe("react", () => {
    it("steps the counter only when the parity must change", () => {
      const s = new ActorSession(bob, 0);
      const target = messageId(alice, asLocalId(0n));
      const like = () => gmapGet(countersL, sharedOf(s.slice, target).reactions, "like");

      s.react(target, "like", true);
      expect(like()).toBe(1n);
      s.react(target, "like", true);
      expect(like()).toBe(1n);
      s.react(target, "like", false);
      expect(like()).toBe(2n);
      s.react(target, "like", false);
      expect(like()).toBe(2n);
      expect(s.drainDeltas()).toHaveLength(2);
    });

    it("follows the parity table", () => {
      expect(reactStep(0n, true)).toBe(1n);
      expect(reactStep(0n, false)).toBe(0n);
      expect(reactStep(7n, true)).toBe(0n);
      expect(reactStep(7n, false)).toBe(1n);
    });
  });

  describe("adjustTags", () => {
    it("follows the mod-4 step table", () => {
      expect([0n, 1n, 2n, 3n].map((c) => tagStep(c, "add"))).toEqual([1n, 0n, 3n, 2n]);
      expect([0n, 1n, 2n, 3n].map((c) => tagStep(c, "remove"))).toEqual([2n, 1n, 0n, 3n]);
      expect(tagStep(6n, "add")).toBe(3n);
    });

    it("moves a tag between positive and negative without decrementing", () => {
      const s = new ActorSession(bob, 0);
      const target = messageId(alice, asLocalId(0n));
      const intro = () => gmapGet(countersL, sharedOf(s.slice, target).tags, "intro");

      s.adjustTags(target, ["intro"], []);
      expect(intro()).toBe(1n);
      s.adjustTags(target, ["intro"], []);
      expect(intro()).toBe(1n);
      s.adjustTags(target, [], ["intro"]);
      expect(intro()).toBe(2n);
      s.adjustTags(target, ["intro"], []);
      expect(intro()).toBe(5n);
    });

    it("applies additions before removals of the same tag", () => {
      const s = new ActorSession(bob, 0);
      const target = messageId(alice, asLocalId(0n));
      s.adjustTags(target, ["intro"], ["intro", "meta"]);
      expect(sharedOf(s.slice, target).tags).toEqual([
        ["intro", 2n],
        ["meta", 2n],
      ]);
    });

    it("emits no delta when nothing changes", () => {
      const s = new ActorSession(bob, 0);
      s.adjustTags(messageId(alice, asLocalId(0n)), [], []);
      expect(s.drainDeltas()).toEqual([]);
    });
  });

  describe("deltas", () => {
    it("only ever grows the slice", () => {
      const s = new ActorSession(alice, 0);
      const steps: (() => void)[] = [
        () => s.newThread("t", "b", ["x"]),
        () => s.reply([bob, asLocalId(0n)], "r"),
        () => s.edit(asLocalId(0n), "e"),
        () => s.redact(asLocalId(0n), 0n),
        () => s.react([bob, asLocalId(0n)], "like", true),
        () => s.adjustTags([alice, asLocalId(0n)], [], ["x"]),
      ];
      for (const step of steps) {
        const before = s.slice;
        step();
        expect(leq(SliceL, before, s.slice)).toBe(true);
      }
    });

    it("drains deltas that join back to the slice", () => {
      const s = new ActorSession(alice, 0);
      const t = s.newThread("t", "b", ["x"]);
      s.reply(t, "r");
      s.react(t, "like", true);
      const deltas = s.drainDeltas();
      expect(deltas).toHaveLength(3);
      expect(joinAll(SliceL, deltas)).toEqual(s.slice);
      expect(s.drainDeltas()).toEqual([]);
    });
  });
});
