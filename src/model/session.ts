import { SessionError } from "../errors";
import { gmapFrom, gmapGet, gmapHas, gmapSingleton } from "../lattice/primitives";
import { live, REDACTED, type Redactable } from "../lattice/redactable";
import {
  countersL,
  ownedMapL,
  OwnedL,
  ownedOf,
  sharedOf,
  SliceL,
  titlesL,
  type Owned,
  type Shared,
  type Slice,
} from "./schema";
import {
  asDeviceId,
  asLocalId,
  messageId,
  type ActorId,
  type DeviceId,
  type LocalId,
  type MessageId,
  type Reaction,
  type Tag,
} from "../types/brands";

export const DEVICE_BITS = 16n;
export const MAX_DEVICES = 1 << Number(DEVICE_BITS);
const DEVICE_MASK = (1n << DEVICE_BITS) - 1n;

/* ── tag votes: 0 neutral, 1 positive, 2 negative, 3 reserved ── */
// Counters only ever grow so they stay Max-joinable; each row is the step
// taken from the current residue.
const ADD_STEP: readonly bigint[] = [1n, 0n, 3n, 2n];
const REMOVE_STEP: readonly bigint[] = [2n, 1n, 0n, 3n];

export const tagStep = (counter: bigint, op: "add" | "remove"): bigint =>
  (op === "add" ? ADD_STEP : REMOVE_STEP)[Number(counter % 4n)];

export const reactStep = (counter: bigint, want: boolean): bigint =>
  counter % 2n === (want ? 1n : 0n) ? 0n : 1n;

/**
 * Exclusive write handle on one actor's Slice from one device.
 *
 * Every operation is a delta joined into the held Slice; the deltas are kept
 * until `drainDeltas` so a caller can ship them incrementally, but publishing
 * must always send the full `slice`. Two live sessions for the same
 * (actor, device) race on identifier allocation and are not supported.
 */
export class ActorSession {
  readonly actor: ActorId;
  readonly device: DeviceId;
  private current: Slice;
  private pending: Slice[] = [];

  constructor(actor: ActorId, device: number, slice: Slice = SliceL.bottom()) {
    if (!Number.isInteger(device) || device < 0 || device >= MAX_DEVICES)
      throw new SessionError(
        "device-range",
        `device id must be an integer in [0, ${MAX_DEVICES}), got ${device}`,
      );
    this.actor = actor;
    this.device = asDeviceId(device);
    this.current = slice;
  }

  get slice(): Slice {
    return this.current;
  }

  /** Deltas produced since the last drain, oldest first. */
  drainDeltas(): Slice[] {
    const out = this.pending;
    this.pending = [];
    return out;
  }

  /** Folds in state learned elsewhere, e.g. this actor's slice from another device. */
  absorb(slice: Slice): void {
    this.current = SliceL.join(this.current, slice);
  }

  newThread(title: string, body: string, tags: Iterable<Tag> = []): MessageId {
    const id = this.allocate();
    const owned: Owned = {
      titles: { guard: 0n, value: [title] },
      replyTo: [],
      content: gmapSingleton(0n, live(body)),
    };
    const votes = gmapFrom(countersL, [...tags].map((t) => [t, 1n] as const));
    this.apply({
      owned: gmapSingleton(id, owned),
      shared: votes.length ? gmapSingleton(messageId(this.actor, id), { tags: votes, reactions: [] }) : [],
    });
    return messageId(this.actor, id);
  }

  reply(parent: MessageId, body: string): MessageId {
    const id = this.allocate();
    this.apply({
      owned: gmapSingleton(id, {
        titles: titlesL.bottom(),
        replyTo: [parent],
        content: gmapSingleton(0n, live(body)),
      }),
      shared: [],
    });
    return messageId(this.actor, id);
  }

  /**
   * Adds a new content version; concurrent edits from other devices survive
   * alongside it. A message from another device of this actor may be edited
   * before its Slice has been absorbed here.
   */
  edit(id: LocalId, body: string): bigint {
    const { content } = this.authored(id);
    const latest = content.length ? content[content.length - 1][0] : undefined;
    const high = latest === undefined ? 0n : (latest >> DEVICE_BITS) + 1n;
    const version = (high << DEVICE_BITS) | BigInt(this.device);
    this.apply(this.contentDelta(id, version, live(body)));
    return version;
  }

  /** Tombstones a version. A version never written is tombstoned all the same. */
  redact(id: LocalId, version: bigint): void {
    this.authored(id);
    this.apply(this.contentDelta(id, version, REDACTED));
  }

  react(target: MessageId, reaction: Reaction, want: boolean): void {
    const counter = gmapGet(countersL, sharedOf(this.current, target).reactions, reaction);
    const step = reactStep(counter, want);
    if (step === 0n) return;
    this.applyShared(target, { tags: [], reactions: gmapSingleton(reaction, counter + step) });
  }

  adjustTags(target: MessageId, add: Iterable<Tag>, remove: Iterable<Tag>): void {
    const { tags } = sharedOf(this.current, target);
    const next = new Map<Tag, bigint>();
    const bump = (tag: Tag, op: "add" | "remove") => {
      const counter = next.get(tag) ?? gmapGet(countersL, tags, tag);
      const step = tagStep(counter, op);
      if (step !== 0n) next.set(tag, counter + step);
    };
    for (const tag of add) bump(tag, "add");
    for (const tag of remove) bump(tag, "remove");
    if (next.size === 0) return;
    this.applyShared(target, { tags: gmapFrom(countersL, next), reactions: [] });
  }

  /* ── internals ───────────────────────────────────────── */

  private allocate(): LocalId {
    const count = BigInt(this.current.owned.length);
    return asLocalId((count << DEVICE_BITS) | BigInt(this.device));
  }

  /**
   * Only this device allocates ids carrying its own device bits, so an
   * unknown one of those was never issued and writing it could collide with
   * a later allocation. Ids of other devices are taken on trust.
   */
  private authored(id: LocalId): Owned {
    const ownDevice = (id & DEVICE_MASK) === BigInt(this.device);
    if (ownDevice && !gmapHas(ownedMapL, this.current.owned, id))
      throw new SessionError("unknown-message", `device ${this.device} of ${this.actor} never allocated message ${id}`);
    return ownedOf(this.current, id);
  }

  private contentDelta(id: LocalId, version: bigint, cell: Redactable<string>): Slice {
    return {
      owned: gmapSingleton(id, { ...OwnedL.bottom(), content: gmapSingleton(version, cell) }),
      shared: [],
    };
  }

  private applyShared(target: MessageId, shared: Shared): void {
    this.apply({ owned: [], shared: gmapSingleton(target, shared) });
  }

  private apply(delta: Slice): void {
    this.current = SliceL.join(this.current, delta);
    this.pending.push(delta);
  }
}
