import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex } from "@noble/hashes/utils";
import { encodeRlp, strToBuf } from "../codec/rlp";
import { encodeSlice } from "../codec/schema";
import type { Root } from "../model/schema";

export type Hex = `0x${string}`;

const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;

/* ── content address of a stored blob ────────────────────── */
export const blobId = (bytes: Uint8Array): Hex => toHex(keccak_256(bytes));

/* ── Merkle helper ───────────────────────────────────────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak_256(new Uint8Array(0));
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    const both = new Uint8Array(left.length + right.length);
    both.set(left);
    both.set(right, left.length);
    next.push(keccak_256(both));
  }
  return merkle(next);
};

/* ── digest of a whole Root ──────────────────────────────── */
// Leaves are keccak(rlp([actor, keccak(slice)])) in actor order, which the
// Root already keeps, so equal Roots always digest equally.
export const computeRootDigest = (root: Root): Hex =>
  toHex(
    merkle(
      root.inner.map(([actor, slice]) =>
        keccak_256(encodeRlp([strToBuf(actor), keccak_256(encodeSlice(slice))])),
      ),
    ),
  );
