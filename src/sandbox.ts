import { type SandboxConfig, resolveConfig } from "./config";
import { BlockBuilder } from "./core/block";
import { makeGenesis } from "./core/genesis";
import { Ledger } from "./core/ledger";
import type { Result } from "./core/result";
import { StateStore } from "./core/store";
import {
  type BlockContext,
  type DispatchError,
  type DispatchOutcome,
  type EventRecord,
  type ExecutionOutcome,
  type InstantiateReturnValue,
  type Origin,
  type Weight,
  signed,
} from "./core/types";
import { ContractEngine } from "./engine/engine";
import { type ILogger, makeLogger } from "./logging";
import {
  assetAllowance,
  assetBalanceOf,
  assetExists,
  assetTotalSupply,
} from "./runtime/assets";
import { mintInto } from "./runtime/balances";
import type { RuntimeCall } from "./runtime/call";
import type { DispatchResult, RuntimeContext } from "./runtime/context";
import { Dispatcher } from "./runtime/dispatcher";
import type { Address, CodeHash, Hex, SnapshotId } from "./types/brands";

const NO_SALT = new Uint8Array(0);

/**
 * One isolated ledger instance: store, dispatcher, contract engine and
 * block builder. Instances share no mutable state.
 */
export class Sandbox {
  readonly config: SandboxConfig;
  readonly logger: ILogger;
  readonly store: StateStore;
  readonly ledger: Ledger;
  readonly dispatcher: Dispatcher;
  readonly engine: ContractEngine;
  readonly blocks: BlockBuilder;
  private readonly ctx: RuntimeContext;

  constructor(overrides: Partial<SandboxConfig> = {}, env?: Record<string, string | undefined>) {
    this.config = resolveConfig(overrides, env);
    const { config } = this;
    this.logger = makeLogger(config.logLevel, config.logPretty).child({ component: "sandbox" });

    this.store = new StateStore(
      makeGenesis(config.genesisTimestamp),
      this.logger.child({ component: "store" }),
    );
    this.ledger = new Ledger(this.store);
    this.ctx = {
      ledger: this.ledger,
      existentialDeposit: config.existentialDeposit,
      assetStringLimit: config.assetStringLimit,
    };
    this.dispatcher = new Dispatcher(this.ctx, this.logger.child({ component: "dispatcher" }));
    this.engine = new ContractEngine(
      this.ctx,
      this.dispatcher,
      {
        maxCallDepth: config.maxCallDepth,
        maxCodeLen: config.maxCodeLen,
        maxStorageKeyLen: config.maxStorageKeyLen,
        maxDebugBufferLen: config.maxDebugBufferLen,
        maxMemoryPages: config.maxMemoryPages,
      },
      this.logger.child({ component: "engine" }),
    );
    this.blocks = new BlockBuilder(
      this.ledger,
      config.blockTimeMs,
      this.logger.child({ component: "blocks" }),
    );
    this.store.resetToGenesis(config.genesisBalances);
  }

  get defaultActor(): Address {
    return this.config.defaultActor;
  }

  get defaultGasLimit(): Weight {
    return { ...this.config.gasLimit };
  }

  /* ── runtime ───────────────────────────────────────────── */
  dispatch(call: RuntimeCall, origin: Origin = signed(this.defaultActor)): DispatchOutcome {
    return this.dispatcher.dispatch(call, origin);
  }

  /* ── contracts ─────────────────────────────────────────── */
  uploadCode(code: Uint8Array, origin: Origin = signed(this.defaultActor)): Result<CodeHash, DispatchError> {
    return this.engine.uploadCode(code, origin);
  }

  instantiate(
    code: Uint8Array | CodeHash,
    selector: Uint8Array | Hex,
    input: Uint8Array,
    origin: Origin = signed(this.defaultActor),
    endowment = 0n,
    salt: Uint8Array = NO_SALT,
    gasLimit: Weight = this.defaultGasLimit,
  ): ExecutionOutcome<InstantiateReturnValue> {
    return this.engine.instantiate(code, selector, input, origin, endowment, salt, gasLimit);
  }

  invoke(
    address: Address,
    selector: Uint8Array | Hex,
    input: Uint8Array,
    origin: Origin = signed(this.defaultActor),
    value = 0n,
    gasLimit: Weight = this.defaultGasLimit,
  ): ExecutionOutcome {
    return this.engine.invoke(address, selector, input, origin, value, gasLimit);
  }

  /** Runs `fn`, then puts the ledger back exactly as it was. */
  dryRun<T>(fn: (sandbox: this) => T): T {
    const id = this.store.snapshot();
    try {
      return fn(this);
    } finally {
      this.store.restore(id);
      this.store.dropSnapshot(id);
    }
  }

  /* ── blocks ────────────────────────────────────────────── */
  buildBlock(): bigint {
    return this.blocks.buildBlock();
  }

  buildBlocks(count: number): bigint {
    return this.blocks.buildBlocks(count);
  }

  blockNumber(): bigint {
    return this.ledger.blockNumber();
  }

  timestamp(): bigint {
    return this.ledger.timestamp();
  }

  blockHash(n: bigint): Hex | undefined {
    return this.blocks.blockHash(n);
  }

  blockContext(): BlockContext {
    return this.blocks.blockContext();
  }

  /** Events of the open block. */
  events(): EventRecord[] {
    return this.store.events();
  }

  resetEvents(): void {
    this.store.resetEvents();
  }

  /* ── state ─────────────────────────────────────────────── */
  snapshot(): SnapshotId {
    return this.store.snapshot();
  }

  restore(id: SnapshotId): void {
    this.store.restore(id);
  }

  resetToGenesis(): void {
    this.store.resetToGenesis(this.config.genesisBalances);
  }

  /* ── balances ──────────────────────────────────────────── */
  freeBalance(who: Address): bigint {
    return this.ledger.freeBalance(who);
  }

  mintInto(who: Address, amount: bigint): Result<bigint, DispatchError> {
    return this.store.transactional(() => mintInto(this.ctx, who, amount));
  }

  /* ── assets ────────────────────────────────────────────── */
  createAsset(id: number, owner: Address, minBalance: bigint): DispatchResult {
    return this.dispatch({ module: "Assets", call: "create", id, admin: owner, minBalance }, signed(owner))
      .result;
  }

  /** Mints as the asset's admin. */
  mintAsset(id: number, beneficiary: Address, amount: bigint): DispatchResult {
    const admin = this.ledger.asset(id)?.admin ?? this.defaultActor;
    return this.dispatch({ module: "Assets", call: "mint", id, beneficiary, amount }, signed(admin))
      .result;
  }

  approveAsset(id: number, owner: Address, delegate: Address, amount: bigint): DispatchResult {
    return this.dispatch(
      { module: "Assets", call: "approveTransfer", id, delegate, amount },
      signed(owner),
    ).result;
  }

  /** Starts destruction as the asset's owner. */
  startDestroyAsset(id: number): DispatchResult {
    const owner = this.ledger.asset(id)?.owner ?? this.defaultActor;
    return this.dispatch({ module: "Assets", call: "startDestroy", id }, signed(owner)).result;
  }

  /** Sets metadata as the asset's owner. */
  setAssetMetadata(id: number, name: string, symbol: string, decimals: number): DispatchResult {
    const owner = this.ledger.asset(id)?.owner ?? this.defaultActor;
    return this.dispatch(
      { module: "Assets", call: "setMetadata", id, name, symbol, decimals },
      signed(owner),
    ).result;
  }

  assetBalance(id: number, who: Address): bigint {
    return assetBalanceOf(this.ctx, id, who);
  }

  assetTotalSupply(id: number): bigint {
    return assetTotalSupply(this.ctx, id);
  }

  assetAllowance(id: number, owner: Address, delegate: Address): bigint {
    return assetAllowance(this.ctx, id, owner, delegate);
  }

  assetExists(id: number): boolean {
    return assetExists(this.ctx, id);
  }

  assetMetadata(id: number) {
    return this.ledger.assetMetadata(id);
  }
}
