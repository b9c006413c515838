import type { Address, Hex } from "../types/brands";
import type { Result } from "./result";

export type { Address, Hex };
export type Balance = bigint;

/* ── resource accounting ─────────────────────────────────── */
export type Weight = { refTime: bigint; proofSize: bigint };

export type BlockContext = { number: bigint; timestamp: bigint };

/* ── dispatch origins ────────────────────────────────────── */
export type Origin =
  | { kind: "signed"; account: Address }
  | { kind: "root" }
  | { kind: "none" };

export const signed = (account: Address): Origin => ({ kind: "signed", account });
export const ROOT: Origin = { kind: "root" };

/* ── dispatch errors ─────────────────────────────────────── */
export type TokenError =
  | "FundsUnavailable"
  | "OnlyProvider"
  | "BelowMinimum"
  | "CannotCreate"
  | "UnknownAsset"
  | "Frozen"
  | "Unsupported"
  | "CannotCreateHold"
  | "NotExpendable"
  | "Blocked";

export type ArithmeticError = "Underflow" | "Overflow" | "DivisionByZero";

export type DispatchError =
  | { kind: "Other"; message: string }
  | { kind: "CannotLookup" }
  | { kind: "BadOrigin" }
  | { kind: "Module"; index: number; error: number; message?: string; trap?: TrapInfo }
  | { kind: "Token"; error: TokenError }
  | { kind: "Arithmetic"; error: ArithmeticError }
  | { kind: "Exhausted" }
  | { kind: "Corruption" }
  | { kind: "Unavailable" };

/** Why a contract stopped abnormally; attached to Contracts.ContractTrapped. */
export type TrapKind =
  | "Unreachable"
  | "StackUnderflow"
  | "StackOverflow"
  | "MemoryOutOfBounds"
  | "InvalidJump"
  | "InvalidOpcode"
  | "DivisionByZero"
  | "EntryPointNotFound"
  | "HostError";

export type TrapInfo = { kind: TrapKind; message: string; pc: number };

/* ── events ──────────────────────────────────────────────── */
export type RuntimeEvent =
  | { module: "System"; name: "NewAccount"; account: Address }
  | { module: "System"; name: "KilledAccount"; account: Address }
  | { module: "System"; name: "Remarked"; sender: Address; hash: Hex }
  | { module: "Balances"; name: "Endowed"; account: Address; freeBalance: Balance }
  | { module: "Balances"; name: "Transfer"; from: Address; to: Address; amount: Balance }
  | { module: "Balances"; name: "BalanceSet"; who: Address; free: Balance }
  | { module: "Balances"; name: "Minted"; who: Address; amount: Balance }
  | { module: "Balances"; name: "DustLost"; account: Address; amount: Balance }
  | { module: "Assets"; name: "Created"; assetId: number; creator: Address; owner: Address }
  | { module: "Assets"; name: "Issued"; assetId: number; owner: Address; amount: Balance }
  | {
      module: "Assets";
      name: "Transferred";
      assetId: number;
      from: Address;
      to: Address;
      amount: Balance;
    }
  | {
      module: "Assets";
      name: "ApprovedTransfer";
      assetId: number;
      source: Address;
      delegate: Address;
      amount: Balance;
    }
  | {
      module: "Assets";
      name: "TransferredApproved";
      assetId: number;
      owner: Address;
      delegate: Address;
      destination: Address;
      amount: Balance;
    }
  | { module: "Assets"; name: "DestructionStarted"; assetId: number }
  | {
      module: "Assets";
      name: "MetadataSet";
      assetId: number;
      tokenName: string;
      symbol: string;
      decimals: number;
    }
  | { module: "Contracts"; name: "CodeStored"; codeHash: Hex; deployer: Address }
  | { module: "Contracts"; name: "Instantiated"; deployer: Address; contract: Address }
  | { module: "Contracts"; name: "Called"; caller: Address; contract: Address }
  | {
      module: "Contracts";
      name: "ContractEmitted";
      contract: Address;
      topics: Hex[];
      data: Uint8Array;
    };

export type EventRecord = { block: bigint; index: number; event: RuntimeEvent };

/* ── outcomes ────────────────────────────────────────────── */
export type DispatchOutcome = {
  result: Result<void, DispatchError>;
  events: EventRecord[];
  weight: Weight;
};

/** Bit 0 of the return flags marks a revert. */
export const REVERT_FLAG = 1;

export type ExecReturnValue = { flags: number; data: Uint8Array };

export type ExecutionOutcome<T extends ExecReturnValue = ExecReturnValue> = {
  result: Result<T, DispatchError>;
  gasConsumed: Weight;
  gasRequired: Weight;
  events: EventRecord[];
  debugMessages: string[];
};

export type InstantiateReturnValue = ExecReturnValue & { address: Address };

export const didRevert = (value: ExecReturnValue): boolean =>
  (value.flags & REVERT_FLAG) !== 0;
