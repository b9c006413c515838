import { err } from "../core/result";
import type { Origin } from "../core/types";
import { type DispatchResult, type RuntimeContext, done } from "./context";

export type TimestampCall = { module: "Timestamp"; call: "set"; now: bigint };

/** Inherent-style setter: unsigned or root only, and time never goes back. */
export const dispatchTimestamp = (
  ctx: RuntimeContext,
  call: TimestampCall,
  origin: Origin,
): DispatchResult => {
  if (origin.kind === "signed") return err({ kind: "BadOrigin" });
  const current = ctx.ledger.timestamp();
  if (call.now < current) {
    return err({ kind: "Other", message: `timestamp must not decrease (${current} > ${call.now})` });
  }
  ctx.ledger.setTimestamp(call.now);
  return done;
};
