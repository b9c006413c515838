import { concat } from "uint8arrays";
import { keccak } from "./hash";

/*
 * Storage layout: every item lives under
 *   keccak(module)[0..16] ++ keccak(item)[0..16]
 * and each map key is appended as keccak(key)[0..16] ++ key, so a
 * prefix scan over one map (or one contract's storage) stays possible.
 */

const half = (s: string) => keccak(s).subarray(0, 16);

export const itemPrefix = (module: string, item: string): Uint8Array =>
  concat([half(module), half(item)]);

const hashedConcat = (key: Uint8Array): Uint8Array =>
  concat([keccak(key).subarray(0, 16), key]);

export const storageKey = (module: string, item: string, ...mapKeys: Uint8Array[]): Uint8Array =>
  concat([itemPrefix(module, item), ...mapKeys.map(hashedConcat)]);

/* ── well-known items ────────────────────────────────────── */
export const Keys = {
  blockNumber: () => storageKey("System", "Number"),
  extrinsicCount: () => storageKey("System", "ExtrinsicCount"),
  blockHash: (n: Uint8Array) => storageKey("System", "BlockHash", n),
  account: (who: Uint8Array) => storageKey("System", "Account", who),
  now: () => storageKey("Timestamp", "Now"),
  asset: (id: Uint8Array) => storageKey("Assets", "Asset", id),
  assetAccount: (id: Uint8Array, who: Uint8Array) => storageKey("Assets", "Account", id, who),
  assetApproval: (id: Uint8Array, owner: Uint8Array, delegate: Uint8Array) =>
    storageKey("Assets", "Approvals", id, owner, delegate),
  assetMetadata: (id: Uint8Array) => storageKey("Assets", "Metadata", id),
  contractInfo: (address: Uint8Array) => storageKey("Contracts", "ContractInfoOf", address),
  codeInfo: (hash: Uint8Array) => storageKey("Contracts", "CodeInfoOf", hash),
  pristineCode: (hash: Uint8Array) => storageKey("Contracts", "PristineCode", hash),
  contractStorage: (address: Uint8Array, key: Uint8Array) =>
    storageKey("Contracts", "Storage", address, key),
};
