import { err, ok, type Result } from "../core/result";
import type { DispatchError, DispatchOutcome, Origin, Weight } from "../core/types";
import { CodecError } from "../errors";
import type { ILogger } from "../logging";
import { dispatchAssets } from "./assets";
import { dispatchBalances } from "./balances";
import { type RuntimeCall, encodeRuntimeCall } from "./call";
import { type DispatchResult, type RuntimeContext, done } from "./context";
import { describeDispatchError } from "./errors";
import { dispatchSystem } from "./system";
import { dispatchTimestamp } from "./timestamp";

/** Flat per-call weight plus a per-byte charge on the encoded call. */
export const BASE_DISPATCH_WEIGHT: Weight = { refTime: 125_000_000n, proofSize: 3_593n };
const REF_TIME_PER_BYTE = 1_000n;

export const dispatchWeight = (call: RuntimeCall): Weight => ({
  refTime:
    BASE_DISPATCH_WEIGHT.refTime + REF_TIME_PER_BYTE * BigInt(encodeRuntimeCall(call).length),
  proofSize: BASE_DISPATCH_WEIGHT.proofSize,
});

/* Arguments wider than their wire type never reach a module. */
const weigh = (call: RuntimeCall): Result<Weight, DispatchError> => {
  try {
    return ok(dispatchWeight(call));
  } catch (e) {
    if (!(e instanceof CodecError)) throw e;
    return err({ kind: "Arithmetic", error: "Overflow" });
  }
};

const bumpNonce = (ctx: RuntimeContext, origin: Origin): void => {
  if (origin.kind !== "signed") return;
  const acc = ctx.ledger.account(origin.account);
  if (acc) ctx.ledger.setAccount(origin.account, { ...acc, nonce: acc.nonce + 1n });
};

export class Dispatcher {
  constructor(
    private readonly ctx: RuntimeContext,
    private readonly logger?: ILogger,
  ) {}

  /**
   * Applies one runtime call in its own storage transaction. A failed call
   * leaves no writes and no events behind.
   */
  dispatch(call: RuntimeCall, origin: Origin): DispatchOutcome {
    const weight = weigh(call);
    if (!weight.ok) {
      this.logger?.debug({ module: call.module, call: call.call }, "dispatch rejected: argument out of range");
      return { result: err(weight.error), events: [], weight: BASE_DISPATCH_WEIGHT };
    }
    const { store } = this.ctx.ledger;
    const mark = store.eventCount;
    const result = store.transactional((): DispatchResult => {
      const applied = this.apply(call, origin);
      if (!applied.ok) return applied;
      bumpNonce(this.ctx, origin);
      this.ctx.ledger.noteExtrinsic();
      return done;
    });
    const events = store.eventsSince(mark);

    if (result.ok) {
      this.logger?.debug({ module: call.module, call: call.call, events: events.length }, "dispatched");
    } else {
      this.logger?.debug(
        { module: call.module, call: call.call, error: describeDispatchError(result.error) },
        "dispatch failed",
      );
    }
    return { result, events, weight: weight.value };
  }

  /**
   * Applies a call on behalf of a running contract: transactional, but not
   * counted as an extrinsic and without touching the origin's nonce.
   */
  applyNested(call: RuntimeCall, origin: Origin): DispatchResult {
    return this.ctx.ledger.store.transactional(() => this.apply(call, origin));
  }

  private apply(call: RuntimeCall, origin: Origin): DispatchResult {
    switch (call.module) {
      case "System":
        return dispatchSystem(this.ctx, call, origin);
      case "Assets":
        return dispatchAssets(this.ctx, call, origin);
      case "Balances":
        return dispatchBalances(this.ctx, call, origin);
      case "Timestamp":
        return dispatchTimestamp(this.ctx, call, origin);
    }
  }
}
