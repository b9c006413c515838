import type { Ledger } from "../core/ledger";
import { err, ok, type Result } from "../core/result";
import {
  type DispatchError,
  type ExecReturnValue,
  type ExecutionOutcome,
  type InstantiateReturnValue,
  type Origin,
  type Weight,
  didRevert,
  signed,
} from "../core/types";
import type { ILogger } from "../logging";
import { transfer } from "../runtime/balances";
import type { RuntimeCall } from "../runtime/call";
import type { DispatchResult, RuntimeContext } from "../runtime/context";
import type { Dispatcher } from "../runtime/dispatcher";
import { contractsErr, describeDispatchError } from "../runtime/errors";
import type { Address, CodeHash, Hex } from "../types/brands";
import { bytesToHex } from "../utils/bytes";
import { type Program, parseProgram } from "../vm/format";
import { GasMeter } from "../vm/gas";
import { execute } from "../vm/interpreter";
import { codeHashOf, contractAddress } from "./address";
import { type CallStack, DebugBuffer, type EngineLimits, type Frame, type FrameResult } from "./frame";
import { ContractHost, type HostBackend } from "./host";

const toHexSelector = (selector: Uint8Array | Hex): Hex =>
  typeof selector === "string" ? selector : bytesToHex(selector);

const frameToResult = (r: FrameResult): Result<ExecReturnValue, DispatchError> => {
  switch (r.kind) {
    case "return":
      return ok({ flags: r.flags, data: r.data });
    case "trap":
      return err(contractsErr("ContractTrapped", { trap: r.trap }));
    case "abort":
    case "fail":
      return err(r.error);
  }
};

/**
 * Runs contract code against the ledger. Every frame executes in its own
 * storage transaction; a revert or trap rolls back exactly that frame.
 */
export class ContractEngine implements HostBackend {
  readonly ledger: Ledger;
  private readonly programs = new Map<Hex, Program>();

  constructor(
    private readonly ctx: RuntimeContext,
    private readonly dispatcher: Dispatcher,
    readonly limits: EngineLimits,
    private readonly logger?: ILogger,
  ) {
    this.ledger = ctx.ledger;
  }

  /* ── top-level operations ──────────────────────────────── */

  /** Stores code under its hash. Uploading the same code twice is a no-op. */
  uploadCode(code: Uint8Array, origin: Origin): Result<CodeHash, DispatchError> {
    if (origin.kind !== "signed") return err({ kind: "BadOrigin" });
    return this.ledger.store.transactional(() => {
      const stored = this.storeCode(code, origin.account);
      if (stored.ok) this.ledger.noteExtrinsic();
      return stored;
    });
  }

  instantiate(
    code: Uint8Array | CodeHash,
    selector: Uint8Array | Hex,
    input: Uint8Array,
    origin: Origin,
    value: bigint,
    salt: Uint8Array,
    gasLimit: Weight,
  ): ExecutionOutcome<InstantiateReturnValue> {
    return this.topLevel(gasLimit, origin, (stack, deployer) => {
      let codeHash: Hex;
      if (typeof code === "string") {
        codeHash = code;
      } else {
        const stored = this.storeCode(code, deployer);
        if (!stored.ok) return stored;
        codeHash = stored.value;
      }
      const root = this.rootFrame(deployer);
      const { result, address } = this.instantiateFrame(
        stack,
        root,
        codeHash,
        toHexSelector(selector),
        input,
        value,
        salt,
        1,
      );
      const mapped = frameToResult(result);
      if (!mapped.ok) return mapped;
      this.logger?.debug({ address, reverted: didRevert(mapped.value) }, "instantiated");
      return ok({ ...mapped.value, address });
    });
  }

  invoke(
    address: Address,
    selector: Uint8Array | Hex,
    input: Uint8Array,
    origin: Origin,
    value: bigint,
    gasLimit: Weight,
  ): ExecutionOutcome {
    return this.topLevel(gasLimit, origin, (stack, caller) => {
      const result = this.callFrame(
        stack,
        this.rootFrame(caller),
        address,
        toHexSelector(selector),
        input,
        value,
        1,
      );
      const mapped = frameToResult(result);
      this.logger?.debug(
        {
          address,
          selector: toHexSelector(selector),
          outcome: mapped.ok ? (didRevert(mapped.value) ? "reverted" : "ok") : describeDispatchError(mapped.error),
        },
        "called",
      );
      return mapped;
    });
  }

  /**
   * Shared wrapper for instantiate and invoke: one gas meter, one debug
   * buffer, one outer transaction that survives only a clean return.
   */
  private topLevel<T extends ExecReturnValue>(
    gasLimit: Weight,
    origin: Origin,
    run: (stack: CallStack, caller: Address) => Result<T, DispatchError>,
  ): ExecutionOutcome<T> {
    const { store } = this.ledger;
    const stack: CallStack = {
      gas: new GasMeter(gasLimit),
      debug: new DebugBuffer(this.limits.maxDebugBufferLen, this.logger),
    };
    const mark = store.eventCount;

    let result: Result<T, DispatchError>;
    if (origin.kind !== "signed") {
      result = err({ kind: "BadOrigin" });
    } else {
      store.startTransaction();
      try {
        result = run(stack, origin.account);
      } catch (e) {
        store.rollbackTransaction();
        throw e;
      }
      if (result.ok && !didRevert(result.value)) {
        this.ledger.noteExtrinsic();
        store.commitTransaction();
      } else {
        store.rollbackTransaction();
      }
    }

    return {
      result,
      gasConsumed: stack.gas.consumed(),
      gasRequired: stack.gas.required(),
      events: store.eventsSince(mark),
      debugMessages: [...stack.debug.messages],
    };
  }

  /* ── frames ────────────────────────────────────────────── */

  private rootFrame(account: Address): Frame {
    return { address: account, caller: account, value: 0n, input: new Uint8Array(0), depth: 0 };
  }

  callFrame(
    stack: CallStack,
    caller: Frame,
    callee: Address,
    selector: Hex,
    input: Uint8Array,
    value: bigint,
    depth = caller.depth + 1,
  ): FrameResult {
    if (depth > this.limits.maxCallDepth) {
      return { kind: "abort", error: contractsErr("MaxCallDepthReached") };
    }
    const info = this.ledger.contractInfo(callee);
    if (!info) return { kind: "fail", error: contractsErr("ContractNotFound") };
    const program = this.program(info.codeHash);
    if (!program) return { kind: "fail", error: contractsErr("CodeNotFound") };

    const frame: Frame = { address: callee, caller: caller.address, value, input, depth };
    return this.inTransaction(() => {
      if (!this.endow(caller.address, callee, value)) {
        return { kind: "fail", error: contractsErr("TransferFailed") };
      }
      const result = execute(program, selector, stack.gas, new ContractHost(this, stack, frame));
      if (result.kind === "return" && !didRevert(result)) {
        this.ledger.emit({ module: "Contracts", name: "Called", caller: caller.address, contract: callee });
      }
      return result;
    });
  }

  instantiateFrame(
    stack: CallStack,
    deployer: Frame,
    codeHash: Hex,
    selector: Hex,
    input: Uint8Array,
    value: bigint,
    salt: Uint8Array,
    depth = deployer.depth + 1,
  ): { result: FrameResult; address: Address } {
    const address = contractAddress(deployer.address, codeHash, salt);
    if (depth > this.limits.maxCallDepth) {
      return { result: { kind: "abort", error: contractsErr("MaxCallDepthReached") }, address };
    }
    const program = this.program(codeHash);
    const codeInfo = this.ledger.codeInfo(codeHash);
    if (!program || !codeInfo) {
      return { result: { kind: "fail", error: contractsErr("CodeNotFound") }, address };
    }
    if (this.ledger.contractInfo(address)) {
      return { result: { kind: "fail", error: contractsErr("DuplicateContract") }, address };
    }

    const frame: Frame = { address, caller: deployer.address, value, input, depth };
    const result = this.inTransaction((): FrameResult => {
      this.ledger.setContractInfo(address, { codeHash, deployer: deployer.address });
      this.ledger.setCodeInfo(codeHash, { ...codeInfo, refcount: codeInfo.refcount + 1n });
      if (!this.ledger.account(address)) {
        this.ledger.setAccount(address, { nonce: 0n, free: 0n });
        this.ledger.emit({ module: "System", name: "NewAccount", account: address });
      }
      if (!this.endow(deployer.address, address, value)) {
        return { kind: "fail", error: contractsErr("TransferFailed") };
      }
      const r = execute(program, selector, stack.gas, new ContractHost(this, stack, frame));
      if (r.kind === "return" && !didRevert(r)) {
        this.ledger.emit({
          module: "Contracts",
          name: "Instantiated",
          deployer: deployer.address,
          contract: address,
        });
      }
      return r;
    });
    return { result, address };
  }

  /** Runs `fn` in a storage transaction kept only on a non-reverted return. */
  private inTransaction(fn: () => FrameResult): FrameResult {
    const { store } = this.ledger;
    store.startTransaction();
    let result: FrameResult;
    try {
      result = fn();
    } catch (e) {
      store.rollbackTransaction();
      throw e;
    }
    if (result.kind === "return" && !didRevert(result)) store.commitTransaction();
    else store.rollbackTransaction();
    return result;
  }

  private endow(from: Address, to: Address, value: bigint): boolean {
    return value === 0n || this.transfer(from, to, value).ok;
  }

  /* ── host backend ──────────────────────────────────────── */

  /** Balance move made by or on behalf of a contract; the payer is kept alive. */
  transfer(from: Address, to: Address, value: bigint): DispatchResult {
    return this.ledger.store.transactional(() => transfer(this.ctx, from, to, value, true));
  }

  dispatchRuntime(call: RuntimeCall, origin: Address): DispatchResult {
    return this.dispatcher.applyNested(call, signed(origin));
  }

  /* ── code ──────────────────────────────────────────────── */

  private storeCode(code: Uint8Array, owner: Address): Result<CodeHash, DispatchError> {
    if (code.length > this.limits.maxCodeLen) return err(contractsErr("CodeTooLarge"));
    const parsed = parseProgram(code, this.limits.maxMemoryPages);
    if (!parsed.ok) {
      this.logger?.debug({ reason: parsed.error }, "code rejected");
      return err(contractsErr("CodeRejected"));
    }
    const hash = codeHashOf(code);
    if (this.ledger.codeInfo(hash)) return ok(hash);

    this.ledger.setPristineCode(hash, code);
    this.ledger.setCodeInfo(hash, { owner, refcount: 0n, codeLen: code.length });
    this.programs.set(hash, parsed.value);
    this.ledger.emit({ module: "Contracts", name: "CodeStored", codeHash: hash, deployer: owner });
    return ok(hash);
  }

  /** Parsed program for stored code; the cache is keyed by content hash. */
  private program(hash: Hex): Program | undefined {
    const code = this.ledger.pristineCode(hash);
    if (!code) return undefined;
    const cached = this.programs.get(hash);
    if (cached) return cached;
    const parsed = parseProgram(code, this.limits.maxMemoryPages);
    if (!parsed.ok) return undefined;
    this.programs.set(hash, parsed.value);
    return parsed.value;
  }
}
