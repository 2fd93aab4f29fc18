import type { Input } from "rlp";
import { DecodeError, withDecodePath } from "../errors";
import type { Entry, GMap, GSet } from "../lattice/primitives";
import type { Redactable } from "../lattice/redactable";
import type { Order } from "../lattice/semilattice";
import { asList, bnToBuf, bufToBn, bufToStr, decodeRlp, encodeRlp, strToBuf, type Raw } from "./rlp";

/**
 * Deterministic encoding of one value type. Products are tag-indexed:
 * each field travels as `[tag, value]`, so fields added later are skipped
 * by older readers and absent fields decode as bottom.
 */
export interface Codec<T> {
  readonly encode: (v: T) => Input;
  readonly decode: (raw: Raw) => T;
}

export const toBytes = <T>(c: Codec<T>, v: T): Uint8Array => encodeRlp(c.encode(v));
export const fromBytes = <T>(c: Codec<T>, bytes: Uint8Array): T => c.decode(decodeRlp(bytes));

/* — scalars — */

export const u64: Codec<bigint> = { encode: bnToBuf, decode: bufToBn };

export const utf8: Codec<string> = { encode: strToBuf, decode: bufToStr };

export const branded = <Base, B extends Base>(c: Codec<Base>, brand: (v: Base) => B): Codec<B> => ({
  encode: c.encode,
  decode: (raw) => brand(c.decode(raw)),
});

export const pair = <A, B>(a: Codec<A>, b: Codec<B>): Codec<readonly [A, B]> => ({
  encode: ([x, y]) => [a.encode(x), b.encode(y)],
  decode: (raw) => {
    const items = asList(raw, "pair");
    if (items.length !== 2) throw new DecodeError("", `expected 2 items, got ${items.length}`);
    return [withDecodePath("0", () => a.decode(items[0])), withDecodePath("1", () => b.decode(items[1]))];
  },
});

/* — collections: canonical order is part of the format — */

export const set = <T>(item: Codec<T>, order: Order<T>): Codec<GSet<T>> => ({
  encode: (s) => s.map(item.encode),
  decode: (raw) => {
    const out: T[] = [];
    asList(raw, "set").forEach((x, i) => {
      const v = withDecodePath(`[${i}]`, () => item.decode(x));
      if (out.length && order.compare(out[out.length - 1], v) >= 0)
        throw new DecodeError(`[${i}]`, "set elements not strictly ascending");
      out.push(v);
    });
    return out;
  },
});

export const map = <K, V>(key: Codec<K>, value: Codec<V>, order: Order<K>): Codec<GMap<K, V>> => {
  const entry = pair(key, value);
  return {
    encode: (m) => m.map(entry.encode),
    decode: (raw) => {
      const out: Entry<K, V>[] = [];
      asList(raw, "map").forEach((x, i) => {
        const e = withDecodePath(`[${i}]`, () => entry.decode(x));
        if (out.length && order.compare(out[out.length - 1][0], e[0]) >= 0)
          throw new DecodeError(`[${i}]`, "map keys not strictly ascending");
        out.push(e);
      });
      return out;
    },
  };
};

export const redactableOf = <T>(inner: Codec<T>): Codec<Redactable<T>> => ({
  encode: (r) => (r.kind === "live" ? [bnToBuf(0n), inner.encode(r.value)] : [bnToBuf(1n)]),
  decode: (raw) => {
    const items = asList(raw, "redactable");
    const tag = items.length ? bufToBn(items[0]) : undefined;
    if (tag === 0n && items.length === 2)
      return { kind: "live", value: withDecodePath("live", () => inner.decode(items[1])) };
    if (tag === 1n && items.length === 1) return { kind: "redacted" };
    throw new DecodeError("", `malformed redactable cell (tag ${tag}, ${items.length} items)`);
  },
});

/* — tag-indexed products — */

export type StructFields<T> = { readonly [K in keyof T]: readonly [tag: number, codec: Codec<T[K]>] };

interface FieldCodec<T> {
  readonly key: keyof T;
  readonly tag: number;
  readonly encode: (v: T) => Input;
  readonly decode: (raw: Raw) => unknown;
  readonly fallback: (bottom: T) => unknown;
}

const fieldCodec = <T, K extends keyof T>(key: K, [tag, c]: readonly [number, Codec<T[K]>]): FieldCodec<T> => {
  if (!Number.isSafeInteger(tag) || tag < 0) throw new RangeError(`bad tag ${tag} for ${String(key)}`);
  return {
    key,
    tag,
    encode: (v) => c.encode(v[key]),
    decode: (raw) => withDecodePath(String(key), () => c.decode(raw)),
    fallback: (bottom) => bottom[key],
  };
};

export const struct = <T extends object>(bottom: () => T, fields: StructFields<T>): Codec<T> => {
  const ops: FieldCodec<T>[] = [];
  for (const key in fields) ops.push(fieldCodec<T, typeof key>(key, fields[key]));
  ops.sort((a, b) => a.tag - b.tag);
  ops.forEach((op, i) => {
    if (i > 0 && ops[i - 1].tag === op.tag) throw new RangeError(`duplicate tag ${op.tag}`);
  });
  const byTag = new Map(ops.map((op) => [op.tag, op]));

  return {
    encode: (v) => ops.map((op) => [bnToBuf(BigInt(op.tag)), op.encode(v)]),
    decode: (raw) => {
      const seen = new Map<FieldCodec<T>, unknown>();
      let last = -1n;
      asList(raw, "struct").forEach((x, i) => {
        const [tagRaw, valueRaw] = withDecodePath(`[${i}]`, () => {
          const items = asList(x, "tagged field");
          if (items.length !== 2) throw new DecodeError("", `expected [tag, value], got ${items.length} items`);
          return items;
        });
        const tag = withDecodePath(`[${i}]`, () => bufToBn(tagRaw));
        if (tag <= last) throw new DecodeError(`[${i}]`, `tag ${tag} out of order`);
        last = tag;
        const op = byTag.get(Number(tag));
        if (op) seen.set(op, op.decode(valueRaw));
      });
      const base = bottom();
      const out: Record<PropertyKey, unknown> = {};
      for (const op of ops) out[op.key] = seen.has(op) ? seen.get(op) : op.fallback(base);
      // every field of T is assigned from its own codec or from bottom
      return out as T;
    },
  };
};
