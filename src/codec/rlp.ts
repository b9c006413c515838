// RLP encode/decode helpers for ledger records.

import { decode, encode, type NestedUint8Array } from "@ethereumjs/rlp";
import { StateError } from "../errors";
import type { Address, Hex } from "../types/brands";
import {
  addressToBytes,
  bytesToHex,
  bytesToUint,
  fromUtf8,
  hexToBytes,
  toAddress,
  utf8,
} from "../utils/bytes";

/* ── helpers ── */
type Item = Uint8Array | NestedUint8Array;

const list = (item: Item, what: string, len: number): Item[] => {
  if (!Array.isArray(item) || item.length !== len) {
    throw new StateError(`corrupt ${what} record`);
  }
  return item;
};

const bytes = (item: Item | undefined, what: string): Uint8Array => {
  if (!(item instanceof Uint8Array)) throw new StateError(`corrupt ${what} record`);
  return item;
};

const big = (item: Item | undefined, what: string) => bytesToUint(bytes(item, what));
const num = (item: Item | undefined, what: string) => Number(big(item, what));
const addr = (item: Item | undefined, what: string): Address => {
  const b = bytes(item, what);
  if (b.length !== 32) throw new StateError(`corrupt ${what} record`);
  return toAddress(b);
};
const hex = (item: Item | undefined, what: string): Hex => bytesToHex(bytes(item, what));

const fields = (b: Uint8Array, what: string, len: number): Item[] => {
  try {
    return list(decode(b), what, len);
  } catch (e) {
    if (e instanceof StateError) throw e;
    throw new StateError(`corrupt ${what} record`);
  }
};

/* ── scalar values (block number, timestamp, balances) ── */
export const encU = (n: bigint): Uint8Array => encode(n);
export const decU = (b: Uint8Array): bigint => {
  try {
    return big(decode(b), "scalar");
  } catch (e) {
    if (e instanceof StateError) throw e;
    throw new StateError("corrupt scalar record");
  }
};

/* ── AccountInfo ── */
export type AccountInfo = { nonce: bigint; free: bigint };

export const encAccount = (a: AccountInfo): Uint8Array => encode([a.nonce, a.free]);
export const decAccount = (b: Uint8Array): AccountInfo => {
  const [n, f] = fields(b, "account", 2);
  return { nonce: big(n, "account"), free: big(f, "account") };
};

/* ── ContractInfo ── */
export type ContractInfo = { codeHash: Hex; deployer: Address };

export const encContractInfo = (c: ContractInfo): Uint8Array =>
  encode([hexToBytes(c.codeHash), addressToBytes(c.deployer)]);
export const decContractInfo = (b: Uint8Array): ContractInfo => {
  const [h, d] = fields(b, "contract", 2);
  return { codeHash: hex(h, "contract"), deployer: addr(d, "contract") };
};

/* ── CodeInfo ── */
export type CodeInfo = { owner: Address; refcount: bigint; codeLen: number };

export const encCodeInfo = (c: CodeInfo): Uint8Array =>
  encode([addressToBytes(c.owner), c.refcount, c.codeLen]);
export const decCodeInfo = (b: Uint8Array): CodeInfo => {
  const [o, r, l] = fields(b, "code", 3);
  return { owner: addr(o, "code"), refcount: big(r, "code"), codeLen: num(l, "code") };
};

/* ── AssetDetails ── */
export type AssetStatus = "Live" | "Destroying";
export type AssetDetails = {
  owner: Address;
  admin: Address;
  supply: bigint;
  minBalance: bigint;
  accounts: number;
  status: AssetStatus;
};

export const encAsset = (a: AssetDetails): Uint8Array =>
  encode([
    addressToBytes(a.owner),
    addressToBytes(a.admin),
    a.supply,
    a.minBalance,
    a.accounts,
    a.status === "Live" ? 0 : 1,
  ]);
export const decAsset = (b: Uint8Array): AssetDetails => {
  const [o, ad, s, m, acc, st] = fields(b, "asset", 6);
  return {
    owner: addr(o, "asset"),
    admin: addr(ad, "asset"),
    supply: big(s, "asset"),
    minBalance: big(m, "asset"),
    accounts: num(acc, "asset"),
    status: num(st, "asset") === 0 ? "Live" : "Destroying",
  };
};

/* ── AssetMetadata ── */
export type AssetMetadata = { name: string; symbol: string; decimals: number };

export const encAssetMetadata = (m: AssetMetadata): Uint8Array =>
  encode([utf8(m.name), utf8(m.symbol), m.decimals]);
export const decAssetMetadata = (b: Uint8Array): AssetMetadata => {
  const [n, s, d] = fields(b, "metadata", 3);
  return {
    name: fromUtf8(bytes(n, "metadata")),
    symbol: fromUtf8(bytes(s, "metadata")),
    decimals: num(d, "metadata"),
  };
};

/* ── BlockHeader ── */
export type BlockHeader = {
  number: bigint;
  timestamp: bigint;
  parentHash: Hex;
  stateRoot: Hex;
  eventCount: number;
  extrinsicCount: number;
};

export const encBlockHeader = (h: BlockHeader): Uint8Array =>
  encode([
    h.number,
    h.timestamp,
    hexToBytes(h.parentHash),
    hexToBytes(h.stateRoot),
    h.eventCount,
    h.extrinsicCount,
  ]);
