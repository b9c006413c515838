import { type AbiType, type AbiValue, decodeArgs, decodeValue, encodeValue } from "../codec/abi";
import { err, ok, type Result } from "../core/result";
import {
  type Address,
  type EventRecord,
  type Weight,
  didRevert,
  signed,
} from "../core/types";
import { CodecError } from "../errors";
import type { ILogger } from "../logging";
import type { RuntimeCall } from "../runtime/call";
import type { Sandbox } from "../sandbox";
import { type ArgSpec, type ContractMetadata, findConstructor, findMessage } from "../bundle/metadata";
import type { BundleRegistry, ContractBundle } from "../bundle/registry";
import { concatBytes } from "../utils/bytes";
import { ErrorTable, SessionError, type UsageReason } from "./errors";
import { type ContractEvent, type EventBatch, SessionRecord } from "./record";

/** An argument already in wire form; passed through untouched. */
export class EncodedArg {
  constructor(readonly bytes: Uint8Array) {}
}

export const encoded = (bytes: Uint8Array): EncodedArg => new EncodedArg(bytes.slice());

export type CallArg = AbiValue | EncodedArg;

export type ContractHandle = {
  label: string;
  address: Address;
  bundle: ContractBundle;
  metadata: ContractMetadata;
};

export type DeployOptions = {
  salt?: Uint8Array;
  endowment?: bigint;
  /** Name to file the handle under; defaults to the bundle label. */
  label?: string;
  /** Allow reusing a label that already names a contract. */
  replace?: boolean;
};

export type CallOptions = { value?: bigint };

export type SessionOptions = {
  bundles: BundleRegistry;
  errorTable?: ErrorTable;
  logger?: ILogger;
};

const usage = (reason: UsageReason, message: string): SessionError =>
  new SessionError({ kind: "Usage", reason, message });

/**
 * Test-author facade over one Sandbox: deploys bundles by label, calls
 * messages with native values and classifies every failure.
 */
export class Session {
  readonly record = new SessionRecord();
  private readonly bundles: BundleRegistry;
  private readonly errors: ErrorTable;
  private readonly logger?: ILogger;
  private readonly handles = new Map<string, ContractHandle>();
  private currentActor: Address;
  private gas: Weight;

  constructor(
    readonly sandbox: Sandbox,
    options: SessionOptions,
  ) {
    this.bundles = options.bundles;
    this.errors = options.errorTable ?? ErrorTable.default();
    this.logger = options.logger ?? sandbox.logger.child({ component: "session" });
    this.currentActor = sandbox.defaultActor;
    this.gas = sandbox.defaultGasLimit;
  }

  /* ── actor & gas ───────────────────────────────────────── */
  get actor(): Address {
    return this.currentActor;
  }

  /** Returns the previous actor. */
  setActor(actor: Address): Address {
    const previous = this.currentActor;
    this.currentActor = actor;
    return previous;
  }

  as(actor: Address): this {
    this.currentActor = actor;
    return this;
  }

  get gasLimit(): Weight {
    return { ...this.gas };
  }

  setGasLimit(limit: Weight): this {
    this.gas = { ...limit };
    return this;
  }

  /* ── contracts ─────────────────────────────────────────── */
  contract(label: string): ContractHandle | undefined {
    return this.handles.get(label);
  }

  contracts(): ContractHandle[] {
    return [...this.handles.values()];
  }

  deploy(
    bundleLabel: string,
    constructor: string,
    args: readonly CallArg[],
    options: DeployOptions = {},
  ): Result<ContractHandle, SessionError> {
    const bundle = this.bundles.get(bundleLabel);
    if (!bundle) return err(usage("BundleNotFound", `no bundle ${bundleLabel}`));
    const entry = findConstructor(bundle.metadata, constructor);
    if (!entry) {
      return err(usage("ConstructorNotFound", `${bundle.name} has no constructor ${constructor}`));
    }
    const label = options.label ?? bundleLabel;
    if (this.handles.has(label) && !options.replace) {
      return err(usage("LabelInUse", `label ${label} already names a contract`));
    }
    const input = encodeCallArgs(entry.args, args);
    if (!input.ok) return input;

    const outcome = this.sandbox.instantiate(
      bundle.code,
      entry.selector,
      input.value,
      signed(this.currentActor),
      options.endowment ?? 0n,
      options.salt,
      this.gas,
    );
    const { result } = outcome;
    const handle: ContractHandle | undefined =
      result.ok && !didRevert(result.value)
        ? { label, address: result.value.address, bundle, metadata: bundle.metadata }
        : undefined;
    this.record.pushDeploy(outcome, this.batch(outcome.events, handle));

    if (!result.ok) return err(new SessionError(this.errors.classifyDispatch(result.error), result.error));
    if (!handle) return err(this.revertError(entry.errorType, result.value.data));
    this.handles.set(label, handle);
    this.logger?.debug({ label, address: handle.address, constructor }, "deployed");
    return ok(handle);
  }

  call(
    target: string | ContractHandle,
    method: string,
    args: readonly CallArg[],
    options: CallOptions = {},
  ): Result<AbiValue, SessionError> {
    const handle = typeof target === "string" ? this.handles.get(target) : target;
    if (!handle) return err(usage("ContractNotFound", `no contract labelled ${String(target)}`));
    const entry = findMessage(handle.metadata, method);
    if (!entry) return err(usage("MessageNotFound", `${handle.metadata.name} has no message ${method}`));
    const input = encodeCallArgs(entry.args, args);
    if (!input.ok) return input;

    const outcome = this.sandbox.invoke(
      handle.address,
      entry.selector,
      input.value,
      signed(this.currentActor),
      options.value ?? 0n,
      this.gas,
    );
    this.record.pushCall(outcome, this.batch(outcome.events));
    this.logger?.debug({ label: handle.label, method, ok: outcome.result.ok }, "called");

    const { result } = outcome;
    if (!result.ok) return err(new SessionError(this.errors.classifyDispatch(result.error), result.error));
    const { data } = result.value;

    if (didRevert(result.value)) return err(this.revertError(entry.errorType, data));

    let value: AbiValue = null;
    if (entry.returnType !== undefined) {
      try {
        value = decodeValue(entry.returnType, data);
      } catch (e) {
        if (!(e instanceof CodecError)) throw e;
        return err(new SessionError({ kind: "Decode", message: e.message }));
      }
    }
    this.record.pushCallReturn(value);
    return ok(value);
  }

  /** Dispatches a runtime call signed by the current actor. */
  dispatch(call: RuntimeCall): Result<void, SessionError> {
    const outcome = this.sandbox.dispatch(call, signed(this.currentActor));
    this.record.pushDispatch(this.batch(outcome.events));
    const { result } = outcome;
    if (!result.ok) return err(new SessionError(this.errors.classifyDispatch(result.error), result.error));
    return ok(undefined);
  }

  /* ── chaining ──────────────────────────────────────────── */
  deployAnd(bundleLabel: string, constructor: string, args: readonly CallArg[], options?: DeployOptions): this {
    const r = this.deploy(bundleLabel, constructor, args, options);
    if (!r.ok) throw r.error;
    return this;
  }

  callAnd(target: string | ContractHandle, method: string, args: readonly CallArg[], options?: CallOptions): this {
    const r = this.call(target, method, args, options);
    if (!r.ok) throw r.error;
    return this;
  }

  dispatchAnd(call: RuntimeCall): this {
    const r = this.dispatch(call);
    if (!r.ok) throw r.error;
    return this;
  }

  /** Reads a reverted payload as the declared error type, if any. */
  private revertError(errorType: AbiType | undefined, data: Uint8Array): SessionError {
    if (errorType === undefined) return new SessionError({ kind: "Reverted", data });
    const value = decodeOrUndefined(errorType, data);
    if (errorType === "status") {
      return new SessionError(typeof value === "number" ? this.errors.classify(value) : { kind: "Reverted", data });
    }
    return new SessionError(value === undefined ? { kind: "Reverted", data } : { kind: "Reverted", data, value });
  }

  /* ── events ────────────────────────────────────────────── */
  /** `fresh` is a contract deployed by this outcome and not yet filed under its label. */
  private batch(events: EventRecord[], fresh?: ContractHandle): EventBatch {
    const contractEvents: ContractEvent[] = [];
    for (const { block, event } of events) {
      if (event.module !== "Contracts" || event.name !== "ContractEmitted") continue;
      contractEvents.push({
        block,
        contract: event.contract,
        topics: [...event.topics],
        data: event.data.slice(),
        ...this.decodeEvent(event.contract, event.data, fresh),
      });
    }
    return { events, contractEvents };
  }

  private decodeEvent(
    contract: Address,
    data: Uint8Array,
    fresh?: ContractHandle,
  ): { label?: string; fields?: Record<string, AbiValue> } {
    const handle =
      fresh?.address === contract ? fresh : this.contracts().find((h) => h.address === contract);
    const index = data[0];
    const entry = index === undefined ? undefined : handle?.metadata.events[index];
    if (!entry) return {};
    try {
      const values = decodeArgs(
        entry.fields.map((f) => f.type),
        data.subarray(1),
      );
      const fields: Record<string, AbiValue> = {};
      entry.fields.forEach((f, i) => {
        const value = values[i];
        if (value !== undefined) fields[f.label] = value;
      });
      return { label: entry.label, fields };
    } catch (e) {
      if (!(e instanceof CodecError)) throw e;
      this.logger?.warn({ contract, event: entry.label, error: e.message }, "undecodable contract event");
      return { label: entry.label };
    }
  }
}

const encodeCallArgs = (
  specs: readonly ArgSpec[],
  args: readonly CallArg[],
): Result<Uint8Array, SessionError> => {
  if (specs.length !== args.length) {
    return err(usage("EncodingFailed", `expected ${specs.length} argument(s), got ${args.length}`));
  }
  try {
    const parts = args.map((arg, i) => {
      const entry = specs[i];
      if (arg instanceof EncodedArg) return arg.bytes;
      if (!entry) throw new CodecError(`no type for argument ${i}`);
      return encodeValue(entry.type, arg);
    });
    return ok(concatBytes(...parts));
  } catch (e) {
    if (!(e instanceof CodecError)) throw e;
    return err(usage("EncodingFailed", e.message));
  }
};

const decodeOrUndefined = (type: AbiType, data: Uint8Array): AbiValue | undefined => {
  try {
    return decodeValue(type, data);
  } catch (e) {
    if (!(e instanceof CodecError)) throw e;
    return undefined;
  }
};
