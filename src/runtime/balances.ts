import { err, ok, type Result } from "../core/result";
import type { Address, DispatchError, Origin } from "../core/types";
import { type DispatchResult, type RuntimeContext, MAX_U128, done, ensureSigned } from "./context";
import { balancesErr } from "./errors";

export type BalancesCall =
  | { module: "Balances"; call: "transferAllowDeath"; dest: Address; value: bigint }
  | { module: "Balances"; call: "forceSetBalance"; who: Address; newFree: bigint }
  | { module: "Balances"; call: "transferKeepAlive"; dest: Address; value: bigint };

/**
 * Adds `amount` to `who`, opening the account when needed. A new account
 * must receive at least the existential deposit.
 */
export const credit = (ctx: RuntimeContext, who: Address, amount: bigint): DispatchResult => {
  const { ledger } = ctx;
  const acc = ledger.account(who);
  if (!acc) {
    if (amount < ctx.existentialDeposit) return err(balancesErr("ExistentialDeposit"));
    ledger.setAccount(who, { nonce: 0n, free: amount });
    ledger.emit({ module: "System", name: "NewAccount", account: who });
    ledger.emit({ module: "Balances", name: "Endowed", account: who, freeBalance: amount });
    return done;
  }
  const free = acc.free + amount;
  if (free > MAX_U128) return err({ kind: "Arithmetic", error: "Overflow" });
  ledger.setAccount(who, { ...acc, free });
  return done;
};

const reap = (ctx: RuntimeContext, who: Address, dust: bigint): void => {
  ctx.ledger.setAccount(who, undefined);
  if (dust > 0n) ctx.ledger.emit({ module: "Balances", name: "DustLost", account: who, amount: dust });
  ctx.ledger.emit({ module: "System", name: "KilledAccount", account: who });
};

/**
 * Moves `value` from `from` to `to`. With `keepAlive` the sender must stay
 * above the existential deposit; otherwise a sender left below it is
 * reaped and the remainder is lost as dust.
 */
export const transfer = (
  ctx: RuntimeContext,
  from: Address,
  to: Address,
  value: bigint,
  keepAlive: boolean,
): DispatchResult => {
  if (value === 0n || from === to) return done;
  const { ledger } = ctx;
  const acc = ledger.account(from);
  if (!acc || acc.free < value) return err(balancesErr("InsufficientBalance"));

  const remaining = acc.free - value;
  const dies = remaining < ctx.existentialDeposit;
  if (dies && keepAlive) return err(balancesErr("Expendability"));

  ledger.setAccount(from, { ...acc, free: remaining });
  const credited = credit(ctx, to, value);
  if (!credited.ok) return credited;
  ledger.emit({ module: "Balances", name: "Transfer", from, to, amount: value });
  if (dies) reap(ctx, from, remaining);
  return done;
};

export const forceSetBalance = (ctx: RuntimeContext, who: Address, newFree: bigint): DispatchResult => {
  const { ledger } = ctx;
  const acc = ledger.account(who);
  if (newFree < ctx.existentialDeposit) {
    if (acc) reap(ctx, who, 0n);
    ledger.emit({ module: "Balances", name: "BalanceSet", who, free: 0n });
    return done;
  }
  if (!acc) ledger.emit({ module: "System", name: "NewAccount", account: who });
  ledger.setAccount(who, { nonce: acc?.nonce ?? 0n, free: newFree });
  ledger.emit({ module: "Balances", name: "BalanceSet", who, free: newFree });
  return done;
};

/** Creates `amount` out of thin air for `who`. Returns the new free balance. */
export const mintInto = (
  ctx: RuntimeContext,
  who: Address,
  amount: bigint,
): Result<bigint, DispatchError> => {
  const credited = credit(ctx, who, amount);
  if (!credited.ok) return credited;
  ctx.ledger.emit({ module: "Balances", name: "Minted", who, amount });
  return ok(ctx.ledger.freeBalance(who));
};

export const dispatchBalances = (
  ctx: RuntimeContext,
  call: BalancesCall,
  origin: Origin,
): DispatchResult => {
  if (call.call === "forceSetBalance") {
    if (origin.kind !== "root") return err({ kind: "BadOrigin" });
    return forceSetBalance(ctx, call.who, call.newFree);
  }
  const sender = ensureSigned(origin);
  if (!sender.ok) return sender;
  return transfer(ctx, sender.value, call.dest, call.value, call.call === "transferKeepAlive");
};
