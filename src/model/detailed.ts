import {
  gmap,
  gmapGet,
  gmapSingleton,
  gset,
  messageIdOrder,
  stringOrder,
  type GMap,
  type GSet,
} from "../lattice/primitives";
import { product } from "../lattice/product";
import { isLive } from "../lattice/redactable";
import { isBottom, joinAll } from "../lattice/semilattice";
import { aggregate, vote, type Vote } from "../lattice/vote";
import {
  actorOrder,
  contentL,
  localOrder,
  replyToL,
  titlesL,
  type Content,
  type Root,
  type Slice,
  type Titles,
} from "./schema";
import { messageId, type ActorId, type LocalId, type MessageId, type Reaction, type Tag } from "../types/brands";

/* =========================================================================
   MATERIALIZED VIEW
   ========================================================================= */

/** Tag opinions: 0 neutral, 1 positive, 2 negative, 3 reserved. */
export const TAG_VOTE = vote(4);
/** Reactions: 0 off, 1 on. */
export const REACTION_VOTE = vote(2);

export interface Thread {
  readonly titles: Titles;
  readonly tags: GMap<Tag, Vote>;
}

export interface Comment {
  readonly replyTo: GSet<MessageId>;
  readonly content: Content;
  readonly reactions: GMap<Reaction, Vote>;
  /** Replies pointing here; only ever written by the fold. */
  readonly backrefs: GSet<MessageId>;
}

/**
 * Read-only projection of a Root. Always re-derivable from it; the join
 * below exists so the fold can combine per-actor contributions, not to merge
 * views received from peers.
 */
export interface Detailed {
  readonly threads: GMap<ActorId, GMap<LocalId, Thread>>;
  readonly messages: GMap<ActorId, GMap<LocalId, Comment>>;
}

export const ThreadL = product<Thread>({
  titles: titlesL,
  tags: gmap(stringOrder, TAG_VOTE),
});

export const CommentL = product<Comment>({
  replyTo: replyToL,
  content: contentL,
  reactions: gmap(stringOrder, REACTION_VOTE),
  backrefs: gset(messageIdOrder),
});

const threadMapL = gmap(localOrder, ThreadL);
const commentMapL = gmap(localOrder, CommentL);
const threadsL = gmap(actorOrder, threadMapL);
const messagesL = gmap(actorOrder, commentMapL);

export const DetailedL = product<Detailed>({
  threads: threadsL,
  messages: messagesL,
});

/* =========================================================================
   FOLD
   ========================================================================= */

/**
 * Promotes one actor's private counters to attributed votes, so the same
 * actor's contribution replayed by any replica lands in the same slot.
 */
export const attributeVotes = <K>(actor: ActorId, counters: GMap<K, bigint>): GMap<K, Vote> =>
  counters.map(([key, counter]) => [key, gmapSingleton(actor, counter)] as const);

const atThread = ([author, local]: MessageId, thread: Thread): Detailed => ({
  threads: gmapSingleton(author, gmapSingleton(local, thread)),
  messages: [],
});

const atComment = ([author, local]: MessageId, comment: Comment): Detailed => ({
  threads: [],
  messages: gmapSingleton(author, gmapSingleton(local, comment)),
});

/** One actor's contribution to the view. */
export const materializeSlice = (actor: ActorId, slice: Slice): Detailed => {
  const parts: Detailed[] = [];
  const bottom = CommentL.bottom();

  for (const [local, { titles, replyTo, content }] of slice.owned) {
    const self = messageId(actor, local);
    // sessions write either bottom or (0, {title}); anything above bottom opens a thread
    if (!isBottom(titlesL, titles)) parts.push(atThread(self, { titles, tags: [] }));
    for (const parent of replyTo) parts.push(atComment(parent, { ...bottom, backrefs: [self] }));
    parts.push(atComment(self, { ...bottom, replyTo, content }));
  }

  for (const [target, { tags, reactions }] of slice.shared) {
    parts.push(atComment(target, { ...bottom, reactions: attributeVotes(actor, reactions) }));
    if (tags.length > 0)
      parts.push(atThread(target, { titles: titlesL.bottom(), tags: attributeVotes(actor, tags) }));
  }

  return joinAll(DetailedL, parts);
};

/** Folds every actor of `root`; any order of actors gives the same view. */
export const materialize = (root: Root): Detailed =>
  joinAll(
    DetailedL,
    root.inner.map(([actor, slice]) => materializeSlice(actor, slice)),
  );

/** Incremental form: identical to materializing the union in one pass. */
export const foldInto = (view: Detailed, root: Root): Detailed =>
  DetailedL.join(view, materialize(root));

export const foldSlice = (view: Detailed, actor: ActorId, slice: Slice): Detailed =>
  DetailedL.join(view, materializeSlice(actor, slice));

/* =========================================================================
   QUERIES
   ========================================================================= */

export const threadAt = (view: Detailed, [author, local]: MessageId): Thread =>
  gmapGet(threadMapL, gmapGet(threadsL, view.threads, author), local);

export const commentAt = (view: Detailed, [author, local]: MessageId): Comment =>
  gmapGet(commentMapL, gmapGet(messagesL, view.messages, author), local);

export const hasComment = (view: Detailed, [author, local]: MessageId): boolean =>
  gmapGet(messagesL, view.messages, author).some(([id]) => id === local);

/** Positive votes minus negative votes, per tag, in tag order. */
export const netTagScores = (thread: Thread): [Tag, number][] =>
  thread.tags.map(([tag, v]): [Tag, number] => {
    const counts = aggregate(TAG_VOTE, v);
    return [tag, counts[1] - counts[2]];
  });

export const reactionCounts = (comment: Comment): [Reaction, number][] =>
  comment.reactions.map(([reaction, v]): [Reaction, number] => [reaction, aggregate(REACTION_VOTE, v)[1]]);

/** Every version that has not been redacted, oldest version number first. */
export const liveContent = (comment: Comment): [bigint, string][] =>
  comment.content.flatMap(([version, cell]): [bigint, string][] =>
    isLive(cell) ? [[version, cell.value]] : [],
  );

/** All threads as (author, local id, thread), in key order. */
export const listThreads = (view: Detailed): [MessageId, Thread][] =>
  view.threads.flatMap(([author, threads]) =>
    threads.map(([local, thread]): [MessageId, Thread] => [messageId(author, local), thread]),
  );
