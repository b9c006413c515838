import { keccak } from "../core/hash";
import type { Ledger } from "../core/ledger";
import { type DispatchError, REVERT_FLAG } from "../core/types";
import { CodecError } from "../errors";
import { type RuntimeCall, decodeRuntimeCall } from "../runtime/call";
import type { DispatchResult } from "../runtime/context";
import { isContractsErr, toStatusCode } from "../runtime/errors";
import type { Address, Hex } from "../types/brands";
import { addressToBytes, bytesToHex, fromUtf8, toAddress, uintToBytes } from "../utils/bytes";
import { VmAbort, VmTrap } from "../vm/faults";
import type { Host, HostResult } from "../vm/interpreter";
import type { Memory } from "../vm/memory";
import { Cost, type HostName, ReturnCode, SENTINEL_NONE } from "../vm/opcodes";
import type { CallStack, EngineLimits, Frame, FrameResult } from "./frame";

const MAX_TOPICS = 4;

/** What the host surface needs from the engine that owns it. */
export interface HostBackend {
  readonly ledger: Ledger;
  readonly limits: EngineLimits;
  transfer(from: Address, to: Address, value: bigint): DispatchResult;
  callFrame(
    stack: CallStack,
    caller: Frame,
    callee: Address,
    selector: Hex,
    input: Uint8Array,
    value: bigint,
  ): FrameResult;
  instantiateFrame(
    stack: CallStack,
    deployer: Frame,
    codeHash: Hex,
    selector: Hex,
    input: Uint8Array,
    value: bigint,
    salt: Uint8Array,
  ): { result: FrameResult; address: Address };
  dispatchRuntime(call: RuntimeCall, origin: Address): DispatchResult;
}

const results = (...values: (bigint | number)[]): HostResult => ({ results: values.map(BigInt) });

const selectorHex = (word: bigint): Hex => bytesToHex(uintToBytes(word & 0xffff_ffffn, 4));

/** Host functions seen by one frame. */
export class ContractHost implements Host {
  constructor(
    private readonly backend: HostBackend,
    private readonly stack: CallStack,
    private readonly frame: Frame,
  ) {}

  private charge(bytes: number, proof = 0n): void {
    this.stack.gas.charge(Cost.hostPerByte * BigInt(bytes), proof);
  }

  private read(memory: Memory, ptr: bigint, len: bigint): Uint8Array {
    const out = memory.read(ptr, len);
    this.charge(out.length);
    return out;
  }

  private storageKey(memory: Memory, ptr: bigint, len: bigint): Uint8Array {
    if (len > BigInt(this.backend.limits.maxStorageKeyLen)) {
      throw new VmTrap("HostError", `storage key longer than ${this.backend.limits.maxStorageKeyLen} bytes`);
    }
    return this.read(memory, ptr, len);
  }

  private touch(key: Uint8Array, value: Uint8Array | undefined): void {
    this.stack.gas.charge(0n, Cost.proofPerStorageItem + BigInt(key.length + (value?.length ?? 0)));
  }

  private writeOut(memory: Memory, ptr: bigint, cap: bigint, data: Uint8Array): void {
    if (BigInt(data.length) > cap) {
      throw new VmTrap("HostError", `output of ${data.length} bytes exceeds buffer of ${cap}`);
    }
    this.charge(data.length);
    memory.write(ptr, data);
  }

  invoke(name: HostName, args: bigint[], memory: Memory): HostResult {
    const { ledger } = this.backend;
    const self = this.frame.address;
    const [a = 0n, b = 0n, c = 0n, d = 0n, e = 0n, f = 0n, g = 0n, h = 0n] = args;

    switch (name) {
      case "input_size":
        return results(this.frame.input.length);
      case "input_copy": {
        if (b + c > BigInt(this.frame.input.length)) {
          throw new VmTrap("HostError", "input_copy past the end of input");
        }
        this.charge(Number(c));
        memory.write(a, this.frame.input.slice(Number(b), Number(b + c)));
        return results();
      }
      case "return":
        return { halt: { flags: Number(a & 0xffff_ffffn), data: this.read(memory, b, c) } };

      /* ── storage ─────────────────────────────────────────── */
      case "storage_get": {
        const key = this.storageKey(memory, a, b);
        const value = ledger.contractStorage(self, key);
        this.touch(key, value);
        if (!value) return results(SENTINEL_NONE);
        this.writeOut(memory, c, d, value);
        return results(value.length);
      }
      case "storage_set": {
        const key = this.storageKey(memory, a, b);
        const value = this.read(memory, c, d);
        const prev = ledger.contractStorage(self, key);
        this.touch(key, value);
        ledger.setContractStorage(self, key, value);
        return results(prev ? prev.length : SENTINEL_NONE);
      }
      case "storage_clear": {
        const key = this.storageKey(memory, a, b);
        const prev = ledger.contractStorage(self, key);
        this.touch(key, prev);
        ledger.setContractStorage(self, key, undefined);
        return results(prev ? prev.length : SENTINEL_NONE);
      }
      case "storage_contains": {
        const key = this.storageKey(memory, a, b);
        const value = ledger.contractStorage(self, key);
        this.touch(key, undefined);
        return results(value ? value.length : SENTINEL_NONE);
      }

      /* ── environment ─────────────────────────────────────── */
      case "caller":
        memory.write(a, addressToBytes(this.frame.caller));
        return results();
      case "address":
        memory.write(a, addressToBytes(self));
        return results();
      case "value_transferred":
        return results(this.frame.value);
      case "balance":
        return results(ledger.freeBalance(self));
      case "balance_of":
        return results(ledger.freeBalance(toAddress(this.read(memory, a, 32n))));
      case "block_number":
        return results(ledger.blockNumber());
      case "now":
        return results(ledger.timestamp());

      /* ── output ──────────────────────────────────────────── */
      case "deposit_event": {
        if (b > BigInt(MAX_TOPICS)) throw new VmTrap("HostError", `more than ${MAX_TOPICS} topics`);
        const raw = this.read(memory, a, b * 32n);
        const topics: Hex[] = [];
        for (let i = 0; i < raw.length; i += 32) topics.push(bytesToHex(raw.subarray(i, i + 32)));
        const data = this.read(memory, c, d);
        ledger.emit({ module: "Contracts", name: "ContractEmitted", contract: self, topics, data });
        return results();
      }
      case "debug_message": {
        const bytes = this.read(memory, a, b);
        this.stack.debug.push(fromUtf8(bytes), bytes.length);
        return results();
      }
      case "hash_keccak_256":
        memory.write(c, keccak(this.read(memory, a, b)));
        return results();

      /* ── balance moves and nested execution ──────────────── */
      case "transfer": {
        const dest = toAddress(this.read(memory, a, 32n));
        const moved = this.backend.transfer(self, dest, b);
        return results(moved.ok ? ReturnCode.Success : ReturnCode.TransferFailed);
      }
      case "call":
        return this.nestedCall(memory, a, b, c, d, e, f, g);
      case "instantiate":
        return this.nestedInstantiate(memory, a, b, c, d, e, f, g, h);
      case "call_runtime": {
        let call: RuntimeCall;
        try {
          call = decodeRuntimeCall(this.read(memory, a, b));
        } catch (err) {
          if (err instanceof CodecError) throw new VmTrap("HostError", `call_runtime: ${err.message}`);
          throw err;
        }
        const applied = this.backend.dispatchRuntime(call, self);
        return results(applied.ok ? 0 : toStatusCode(applied.error));
      }
    }
  }

  /** call(calleePtr, selector, inPtr, inLen, value, outPtr, outCap) -> (outLen, code) */
  private nestedCall(
    memory: Memory,
    calleePtr: bigint,
    selector: bigint,
    inPtr: bigint,
    inLen: bigint,
    value: bigint,
    outPtr: bigint,
    outCap: bigint,
  ): HostResult {
    this.stack.gas.charge(Cost.nestedBase);
    const callee = toAddress(this.read(memory, calleePtr, 32n));
    const input = this.read(memory, inPtr, inLen);
    const r = this.backend.callFrame(this.stack, this.frame, callee, selectorHex(selector), input, value);
    switch (r.kind) {
      case "abort":
        throw new VmAbort(r.error);
      case "trap":
        return results(0, ReturnCode.CalleeTrapped);
      case "fail":
        return results(0, this.failCode(r.error));
      case "return": {
        this.writeOut(memory, outPtr, outCap, r.data);
        const reverted = (r.flags & REVERT_FLAG) !== 0;
        return results(r.data.length, reverted ? ReturnCode.CalleeReverted : ReturnCode.Success);
      }
    }
  }

  /** instantiate(codeHashPtr, selector, inPtr, inLen, value, saltPtr, saltLen, outAddrPtr) -> code */
  private nestedInstantiate(
    memory: Memory,
    codeHashPtr: bigint,
    selector: bigint,
    inPtr: bigint,
    inLen: bigint,
    value: bigint,
    saltPtr: bigint,
    saltLen: bigint,
    outAddrPtr: bigint,
  ): HostResult {
    this.stack.gas.charge(Cost.nestedBase);
    const codeHash = bytesToHex(this.read(memory, codeHashPtr, 32n));
    const input = this.read(memory, inPtr, inLen);
    const salt = this.read(memory, saltPtr, saltLen);
    const { result: r, address } = this.backend.instantiateFrame(
      this.stack,
      this.frame,
      codeHash,
      selectorHex(selector),
      input,
      value,
      salt,
    );
    switch (r.kind) {
      case "abort":
        throw new VmAbort(r.error);
      case "trap":
        return results(ReturnCode.CalleeTrapped);
      case "fail":
        return results(this.failCode(r.error));
      case "return":
        if ((r.flags & REVERT_FLAG) !== 0) return results(ReturnCode.CalleeReverted);
        memory.write(outAddrPtr, addressToBytes(address));
        return results(ReturnCode.Success);
    }
  }

  private failCode(error: DispatchError): number {
    if (isContractsErr(error, "ContractNotFound")) return ReturnCode.NotCallable;
    if (isContractsErr(error, "CodeNotFound")) return ReturnCode.CodeNotFound;
    if (isContractsErr(error, "TransferFailed")) return ReturnCode.TransferFailed;
    if (isContractsErr(error, "DuplicateContract")) {
      throw new VmTrap("HostError", "a contract already exists at the derived address");
    }
    return ReturnCode.CalleeTrapped;
  }
}
