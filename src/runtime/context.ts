import type { Ledger } from "../core/ledger";
import type { Address, DispatchError, Origin } from "../core/types";
import { err, ok, type Result } from "../core/result";

/** What every runtime module needs: the ledger plus chain constants. */
export type RuntimeContext = {
  ledger: Ledger;
  existentialDeposit: bigint;
  assetStringLimit: number;
};

export type DispatchResult = Result<void, DispatchError>;

export const MAX_U128 = (1n << 128n) - 1n;

export const done: DispatchResult = ok(undefined);

export const ensureSigned = (origin: Origin): Result<Address, DispatchError> =>
  origin.kind === "signed" ? ok(origin.account) : err({ kind: "BadOrigin" });
