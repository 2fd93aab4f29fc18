// Byte-level RLP helpers (no external deps except rlp).

import * as rlp from "rlp";
import { DecodeError } from "../errors";

export type Raw = Uint8Array | rlp.NestedUint8Array;

export const MAX_U64 = 2n ** 64n - 1n;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/* — whole buffers — */
export const encodeRlp = (v: rlp.Input): Uint8Array => rlp.encode(v);

/** Strict decode: trailing bytes and non-canonical lengths are errors. */
export const decodeRlp = (bytes: Uint8Array): Raw => {
  try {
    return rlp.decode(bytes);
  } catch (err) {
    throw new DecodeError("", `invalid rlp: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
};

/* — items — */
export const asBytes = (raw: Raw, what: string): Uint8Array => {
  if (raw instanceof Uint8Array) return raw;
  throw new DecodeError("", `expected ${what}, got a list`);
};

export const asList = (raw: Raw, what: string): rlp.NestedUint8Array => {
  if (Array.isArray(raw)) return raw;
  throw new DecodeError("", `expected ${what}, got a byte string`);
};

/* — u64: minimal big-endian, zero is the empty string — */
export const bnToBuf = (n: bigint): Uint8Array => {
  if (n < 0n || n > MAX_U64) throw new RangeError(`u64 out of range: ${n}`);
  if (n === 0n) return new Uint8Array(0);
  const hex = n.toString(16);
  return new Uint8Array(Buffer.from(hex.length % 2 ? "0" + hex : hex, "hex"));
};

export const bufToBn = (raw: Raw): bigint => {
  const b = asBytes(raw, "u64");
  if (b.length > 8) throw new DecodeError("", `u64 overflow (${b.length} bytes)`);
  if (b.length > 0 && b[0] === 0) throw new DecodeError("", "u64 has leading zero byte");
  return b.length === 0 ? 0n : BigInt("0x" + Buffer.from(b).toString("hex"));
};

/* — strings: raw UTF-8, never hex-interpreted — */
export const strToBuf = (s: string): Uint8Array => new Uint8Array(Buffer.from(s, "utf8"));

export const bufToStr = (raw: Raw): string => {
  const b = asBytes(raw, "utf-8 string");
  try {
    return utf8.decode(b);
  } catch (err) {
    throw new DecodeError("", "invalid utf-8", { cause: err });
  }
};
