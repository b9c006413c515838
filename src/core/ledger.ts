import {
  type AccountInfo,
  type AssetDetails,
  type AssetMetadata,
  type CodeInfo,
  type ContractInfo,
  decAccount,
  decAsset,
  decAssetMetadata,
  decCodeInfo,
  decContractInfo,
  decU,
  encAccount,
  encAsset,
  encAssetMetadata,
  encCodeInfo,
  encContractInfo,
  encU,
} from "../codec/rlp";
import type { Hex } from "../types/brands";
import { addressToBytes, bytesToHex, hexToBytes, uintToBytes } from "../utils/bytes";
import { Keys } from "./keys";
import type { StateStore } from "./store";
import type { Address, BlockContext, EventRecord, RuntimeEvent } from "./types";

const assetKey = (id: number) => uintToBytes(BigInt(id), 4);

/**
 * Typed view over the raw store. Every runtime module and the engine go
 * through this class; nothing else knows the key layout.
 */
export class Ledger {
  constructor(readonly store: StateStore) {}

  /* ── block context ─────────────────────────────────────── */
  blockNumber(): bigint {
    const raw = this.store.read(Keys.blockNumber());
    return raw ? decU(raw) : 0n;
  }

  setBlockNumber(n: bigint): void {
    this.store.write(Keys.blockNumber(), encU(n));
  }

  timestamp(): bigint {
    const raw = this.store.read(Keys.now());
    return raw ? decU(raw) : 0n;
  }

  setTimestamp(ms: bigint): void {
    this.store.write(Keys.now(), encU(ms));
  }

  blockContext(): BlockContext {
    return { number: this.blockNumber(), timestamp: this.timestamp() };
  }

  extrinsicCount(): number {
    const raw = this.store.read(Keys.extrinsicCount());
    return raw ? Number(decU(raw)) : 0;
  }

  noteExtrinsic(): void {
    this.store.write(Keys.extrinsicCount(), encU(BigInt(this.extrinsicCount() + 1)));
  }

  clearExtrinsics(): void {
    this.store.remove(Keys.extrinsicCount());
  }

  blockHash(n: bigint): Hex | undefined {
    const raw = this.store.read(Keys.blockHash(uintToBytes(n, 8)));
    return raw ? bytesToHex(raw) : undefined;
  }

  setBlockHash(n: bigint, hash: Uint8Array): void {
    this.store.write(Keys.blockHash(uintToBytes(n, 8)), hash);
  }

  /** Appends an event to the pending log, stamped with the open block. */
  emit(event: RuntimeEvent): EventRecord {
    return this.store.depositEvent({ block: this.blockNumber(), event });
  }

  /* ── accounts ──────────────────────────────────────────── */
  account(who: Address): AccountInfo | undefined {
    const raw = this.store.read(Keys.account(addressToBytes(who)));
    return raw ? decAccount(raw) : undefined;
  }

  setAccount(who: Address, info: AccountInfo | undefined): void {
    const key = Keys.account(addressToBytes(who));
    if (info) this.store.write(key, encAccount(info));
    else this.store.remove(key);
  }

  freeBalance(who: Address): bigint {
    return this.account(who)?.free ?? 0n;
  }

  /* ── assets ────────────────────────────────────────────── */
  asset(id: number): AssetDetails | undefined {
    const raw = this.store.read(Keys.asset(assetKey(id)));
    return raw ? decAsset(raw) : undefined;
  }

  setAsset(id: number, details: AssetDetails): void {
    this.store.write(Keys.asset(assetKey(id)), encAsset(details));
  }

  /** undefined when the account holds no balance record for the asset. */
  assetBalance(id: number, who: Address): bigint | undefined {
    const raw = this.store.read(Keys.assetAccount(assetKey(id), addressToBytes(who)));
    return raw ? decU(raw) : undefined;
  }

  setAssetBalance(id: number, who: Address, balance: bigint | undefined): void {
    const key = Keys.assetAccount(assetKey(id), addressToBytes(who));
    if (balance === undefined) this.store.remove(key);
    else this.store.write(key, encU(balance));
  }

  approval(id: number, owner: Address, delegate: Address): bigint {
    const raw = this.store.read(
      Keys.assetApproval(assetKey(id), addressToBytes(owner), addressToBytes(delegate)),
    );
    return raw ? decU(raw) : 0n;
  }

  setApproval(id: number, owner: Address, delegate: Address, amount: bigint): void {
    const key = Keys.assetApproval(assetKey(id), addressToBytes(owner), addressToBytes(delegate));
    if (amount === 0n) this.store.remove(key);
    else this.store.write(key, encU(amount));
  }

  assetMetadata(id: number): AssetMetadata | undefined {
    const raw = this.store.read(Keys.assetMetadata(assetKey(id)));
    return raw ? decAssetMetadata(raw) : undefined;
  }

  setAssetMetadata(id: number, meta: AssetMetadata): void {
    this.store.write(Keys.assetMetadata(assetKey(id)), encAssetMetadata(meta));
  }

  /* ── contracts ─────────────────────────────────────────── */
  contractInfo(address: Address): ContractInfo | undefined {
    const raw = this.store.read(Keys.contractInfo(addressToBytes(address)));
    return raw ? decContractInfo(raw) : undefined;
  }

  setContractInfo(address: Address, info: ContractInfo): void {
    this.store.write(Keys.contractInfo(addressToBytes(address)), encContractInfo(info));
  }

  codeInfo(hash: Hex): CodeInfo | undefined {
    const raw = this.store.read(Keys.codeInfo(hexToBytes(hash)));
    return raw ? decCodeInfo(raw) : undefined;
  }

  setCodeInfo(hash: Hex, info: CodeInfo): void {
    this.store.write(Keys.codeInfo(hexToBytes(hash)), encCodeInfo(info));
  }

  pristineCode(hash: Hex): Uint8Array | undefined {
    return this.store.read(Keys.pristineCode(hexToBytes(hash)));
  }

  setPristineCode(hash: Hex, code: Uint8Array): void {
    this.store.write(Keys.pristineCode(hexToBytes(hash)), code);
  }

  contractStorage(address: Address, key: Uint8Array): Uint8Array | undefined {
    return this.store.read(Keys.contractStorage(addressToBytes(address), key));
  }

  setContractStorage(address: Address, key: Uint8Array, value: Uint8Array | undefined): void {
    const k = Keys.contractStorage(addressToBytes(address), key);
    if (value === undefined) this.store.remove(k);
    else this.store.write(k, value);
  }
}
