import {
  bigintOrder,
  gmap,
  gmapGet,
  gmapFrom,
  gset,
  guardedPair,
  maxU64,
  messageIdOrder,
  stringOrder,
  type Entry,
  type GMap,
  type GSet,
  type GuardedPair,
} from "../lattice/primitives";
import { product } from "../lattice/product";
import { redactable, type Redactable } from "../lattice/redactable";
import type { Order } from "../lattice/semilattice";
import type { ActorId, LocalId, MessageId, Reaction, Tag } from "../types/brands";

/* =========================================================================
   FIELD LATTICES
   ========================================================================= */
export const actorOrder: Order<ActorId> = stringOrder;
export const localOrder: Order<LocalId> = bigintOrder;

export type Titles = GuardedPair<bigint, GSet<string>>;
/** Content versions; a version number is allocated like a LocalId. */
export type Content = GMap<bigint, Redactable<string>>;

export const titlesL = guardedPair(maxU64, gset(stringOrder));
export const replyToL = gset(messageIdOrder);
export const contentL = gmap(bigintOrder, redactable<string>(stringOrder, ""));
export const countersL = gmap<string, bigint>(stringOrder, maxU64);

/* =========================================================================
   PER-ACTOR STATE
   ========================================================================= */

/** Fields only the authoring actor writes, for one of their own messages. */
export interface Owned {
  readonly titles: Titles;
  readonly replyTo: GSet<MessageId>;
  readonly content: Content;
}

/** One actor's private opinion counters about a message, possibly someone else's. */
export interface Shared {
  readonly tags: GMap<Tag, bigint>;
  readonly reactions: GMap<Reaction, bigint>;
}

/** Everything one actor has ever written. Only grows. */
export interface Slice {
  readonly owned: GMap<LocalId, Owned>;
  readonly shared: GMap<MessageId, Shared>;
}

/** Join of every known actor's Slice; the unit of replication. */
export interface Root {
  readonly inner: GMap<ActorId, Slice>;
}

export const OwnedL = product<Owned>({
  titles: titlesL,
  replyTo: replyToL,
  content: contentL,
});

export const SharedL = product<Shared>({
  tags: countersL,
  reactions: countersL,
});

export const ownedMapL = gmap(localOrder, OwnedL);
export const sharedMapL = gmap(messageIdOrder, SharedL);

export const SliceL = product<Slice>({
  owned: ownedMapL,
  shared: sharedMapL,
});

export const sliceMapL = gmap(actorOrder, SliceL);

export const RootL = product<Root>({ inner: sliceMapL });

/* =========================================================================
   HELPERS
   ========================================================================= */

/** An actor nobody has heard from reads as the empty Slice. */
export const sliceOf = (root: Root, actor: ActorId): Slice => gmapGet(sliceMapL, root.inner, actor);

export const withSlice = (root: Root, actor: ActorId, slice: Slice): Root =>
  RootL.join(root, { inner: [[actor, slice]] });

export const rootFromSlices = (slices: Iterable<Entry<ActorId, Slice>>): Root => ({
  inner: gmapFrom(sliceMapL, slices),
});

export const ownedOf = (slice: Slice, id: LocalId): Owned => gmapGet(ownedMapL, slice.owned, id);

export const sharedOf = (slice: Slice, target: MessageId): Shared =>
  gmapGet(sharedMapL, slice.shared, target);
