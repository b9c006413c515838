import { keccak_256 } from "@noble/hashes/sha3";
import { concat } from "uint8arrays";
import { utf8 } from "../utils/bytes";

export const keccak = (data: Uint8Array | string): Uint8Array =>
  keccak_256(typeof data === "string" ? utf8(data) : data);

/* ── Merkle helper ───────────────────────────────────────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak(new Uint8Array(0));
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak(concat([left, right])));
  }
  return merkle(next);
};

/** Root over key/value entries; callers pass them already sorted by key. */
export const entriesRoot = (entries: Iterable<[Uint8Array, Uint8Array]>): Uint8Array =>
  merkle([...entries].map(([k, val]) => keccak(concat([keccak(k), keccak(val)]))));
