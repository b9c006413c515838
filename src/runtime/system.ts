import { keccak } from "../core/hash";
import { err } from "../core/result";
import type { Origin } from "../core/types";
import { bytesToHex } from "../utils/bytes";
import { type DispatchResult, type RuntimeContext, done, ensureSigned } from "./context";

export type SystemCall =
  | { module: "System"; call: "remark"; remark: Uint8Array }
  | { module: "System"; call: "remarkWithEvent"; remark: Uint8Array };

export const dispatchSystem = (
  ctx: RuntimeContext,
  call: SystemCall,
  origin: Origin,
): DispatchResult => {
  if (call.call === "remark") {
    return origin.kind === "none" ? err({ kind: "BadOrigin" }) : done;
  }
  const sender = ensureSigned(origin);
  if (!sender.ok) return sender;
  ctx.ledger.emit({
    module: "System",
    name: "Remarked",
    sender: sender.value,
    hash: bytesToHex(keccak(call.remark)),
  });
  return done;
};
