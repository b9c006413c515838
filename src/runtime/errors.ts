import type { ArithmeticError, DispatchError, TokenError } from "../core/types";

/** Module indices, in runtime declaration order. */
export const MODULE = {
  System: 0,
  Assets: 1,
  Balances: 2,
  Timestamp: 3,
  Contracts: 4,
} as const;

/* ── module error indices raised by this runtime ─────────── */
export const BalancesError = {
  InsufficientBalance: 2,
  ExistentialDeposit: 3,
  Expendability: 4,
} as const;

export const AssetsError = {
  BalanceLow: 0,
  NoAccount: 1,
  NoPermission: 2,
  Unknown: 3,
  InUse: 5,
  MinBalanceZero: 7,
  BadMetadata: 9,
  Unapproved: 10,
  AssetNotLive: 16,
} as const;

export const ContractsError = {
  OutOfGas: 2,
  TransferFailed: 4,
  MaxCallDepthReached: 5,
  ContractNotFound: 6,
  CodeTooLarge: 7,
  CodeNotFound: 8,
  ContractTrapped: 12,
  DuplicateContract: 20,
  CodeRejected: 28,
} as const;

export const balancesErr = (name: keyof typeof BalancesError): DispatchError => ({
  kind: "Module",
  index: MODULE.Balances,
  error: BalancesError[name],
  message: name,
});

export const assetsErr = (name: keyof typeof AssetsError): DispatchError => ({
  kind: "Module",
  index: MODULE.Assets,
  error: AssetsError[name],
  message: name,
});

export const contractsErr = (
  name: keyof typeof ContractsError,
  extra: Pick<Extract<DispatchError, { kind: "Module" }>, "trap"> = {},
): DispatchError => ({
  kind: "Module",
  index: MODULE.Contracts,
  error: ContractsError[name],
  message: name,
  ...extra,
});

export const isContractsErr = (e: DispatchError, name: keyof typeof ContractsError): boolean =>
  e.kind === "Module" && e.index === MODULE.Contracts && e.error === ContractsError[name];

/* ── status codes ────────────────────────────────────────── */
// byte 0: variant (0 = success), byte 1: module/token/arithmetic index,
// byte 2: module error index

export const STATUS_VARIANT = {
  Other: 1,
  CannotLookup: 2,
  BadOrigin: 3,
  Module: 4,
  ConsumerRemaining: 5,
  NoProviders: 6,
  TooManyConsumers: 7,
  Token: 8,
  Arithmetic: 9,
  Transactional: 10,
  Exhausted: 11,
  Corruption: 12,
  Unavailable: 13,
  DecodingFailed: 255,
} as const;

export const TOKEN_ERRORS: readonly TokenError[] = [
  "FundsUnavailable",
  "OnlyProvider",
  "BelowMinimum",
  "CannotCreate",
  "UnknownAsset",
  "Frozen",
  "Unsupported",
  "CannotCreateHold",
  "NotExpendable",
  "Blocked",
];

export const ARITHMETIC_ERRORS: readonly ArithmeticError[] = [
  "Underflow",
  "Overflow",
  "DivisionByZero",
];

export const statusCode = (variant: number, index = 0, error = 0): number =>
  variant + (index << 8) + (error << 16);

export const toStatusCode = (e: DispatchError): number => {
  switch (e.kind) {
    case "Module":
      return statusCode(STATUS_VARIANT.Module, e.index, e.error);
    case "Token":
      return statusCode(STATUS_VARIANT.Token, TOKEN_ERRORS.indexOf(e.error));
    case "Arithmetic":
      return statusCode(STATUS_VARIANT.Arithmetic, ARITHMETIC_ERRORS.indexOf(e.error));
    default:
      return statusCode(STATUS_VARIANT[e.kind]);
  }
};

export const describeDispatchError = (e: DispatchError): string => {
  switch (e.kind) {
    case "Module":
      return `Module(${e.index}, ${e.error}${e.message ? `: ${e.message}` : ""})`;
    case "Token":
    case "Arithmetic":
      return `${e.kind}(${e.error})`;
    case "Other":
      return `Other(${e.message})`;
    default:
      return e.kind;
  }
};
