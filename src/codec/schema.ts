import { bigintOrder, messageIdOrder, stringOrder } from "../lattice/primitives";
import {
  CommentL,
  DetailedL,
  ThreadL,
  type Comment,
  type Detailed,
  type Thread,
} from "../model/detailed";
import {
  OwnedL,
  RootL,
  SharedL,
  SliceL,
  actorOrder,
  localOrder,
  titlesL,
  type Owned,
  type Root,
  type Shared,
  type Slice,
  type Titles,
} from "../model/schema";
import { asActorId, asLocalId, type MessageId } from "../types/brands";
import { branded, fromBytes, map, pair, redactableOf, set, struct, toBytes, u64, utf8 } from "./wire";

/* ── field codecs ────────────────────────────────────────── */
// Tags are part of the persisted format: never renumber, only append.

const actorId = branded(utf8, asActorId);
const localId = branded(u64, asLocalId);
const messageId = pair(actorId, localId);
const messageIds = set<MessageId>(messageId, messageIdOrder);
const counters = map(utf8, u64, stringOrder);
const content = map(u64, redactableOf(utf8), bigintOrder);
const votes = map(utf8, map(actorId, u64, actorOrder), stringOrder);

const titles = struct<Titles>(titlesL.bottom, {
  guard: [0, u64],
  value: [1, set(utf8, stringOrder)],
});

/* ── per-actor state ─────────────────────────────────────── */

export const ownedCodec = struct<Owned>(OwnedL.bottom, {
  titles: [0, titles],
  replyTo: [1, messageIds],
  content: [2, content],
});

export const sharedCodec = struct<Shared>(SharedL.bottom, {
  tags: [0, counters],
  reactions: [1, counters],
});

export const sliceCodec = struct<Slice>(SliceL.bottom, {
  owned: [0, map(localId, ownedCodec, localOrder)],
  shared: [1, map(messageId, sharedCodec, messageIdOrder)],
});

export const rootCodec = struct<Root>(RootL.bottom, {
  inner: [0, map(actorId, sliceCodec, actorOrder)],
});

/* ── materialized view ───────────────────────────────────── */

export const threadCodec = struct<Thread>(ThreadL.bottom, {
  titles: [0, titles],
  tags: [1, votes],
});

export const commentCodec = struct<Comment>(CommentL.bottom, {
  replyTo: [0, messageIds],
  content: [1, content],
  reactions: [2, votes],
  backrefs: [3, messageIds],
});

export const detailedCodec = struct<Detailed>(DetailedL.bottom, {
  threads: [0, map(actorId, map(localId, threadCodec, localOrder), actorOrder)],
  messages: [1, map(actorId, map(localId, commentCodec, localOrder), actorOrder)],
});

/* ── entry points ────────────────────────────────────────── */

export const encodeSlice = (s: Slice): Uint8Array => toBytes(sliceCodec, s);
export const decodeSlice = (b: Uint8Array): Slice => fromBytes(sliceCodec, b);

export const encodeRoot = (r: Root): Uint8Array => toBytes(rootCodec, r);
export const decodeRoot = (b: Uint8Array): Root => fromBytes(rootCodec, b);

export const encodeDetailed = (d: Detailed): Uint8Array => toBytes(detailedCodec, d);
export const decodeDetailed = (b: Uint8Array): Detailed => fromBytes(detailedCodec, b);
