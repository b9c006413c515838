import type { AssetDetails } from "../codec/rlp";
import { err, ok, type Result } from "../core/result";
import type { Address, DispatchError, Origin } from "../core/types";
import { utf8 } from "../utils/bytes";
import { type DispatchResult, type RuntimeContext, MAX_U128, done, ensureSigned } from "./context";
import { assetsErr } from "./errors";

export type AssetsCall =
  | { module: "Assets"; call: "create"; id: number; admin: Address; minBalance: bigint }
  | { module: "Assets"; call: "mint"; id: number; beneficiary: Address; amount: bigint }
  | { module: "Assets"; call: "transfer"; id: number; target: Address; amount: bigint }
  | { module: "Assets"; call: "approveTransfer"; id: number; delegate: Address; amount: bigint }
  | {
      module: "Assets";
      call: "transferApproved";
      id: number;
      owner: Address;
      destination: Address;
      amount: bigint;
    }
  | { module: "Assets"; call: "startDestroy"; id: number }
  | {
      module: "Assets";
      call: "setMetadata";
      id: number;
      name: string;
      symbol: string;
      decimals: number;
    };

/* ── helpers ─────────────────────────────────────────────── */
const liveAsset = (ctx: RuntimeContext, id: number): Result<AssetDetails, DispatchError> => {
  const details = ctx.ledger.asset(id);
  if (!details) return err(assetsErr("Unknown"));
  if (details.status !== "Live") return err(assetsErr("AssetNotLive"));
  return ok(details);
};

/** Moves asset balance; a source left under the minimum hands over the rest. */
const moveAsset = (
  ctx: RuntimeContext,
  id: number,
  from: Address,
  to: Address,
  amount: bigint,
): Result<bigint, DispatchError> => {
  const { ledger } = ctx;
  const asset = liveAsset(ctx, id);
  if (!asset.ok) return asset;
  let details = asset.value;
  if (amount === 0n || from === to) return ok(0n);

  const balance = ledger.assetBalance(id, from) ?? 0n;
  if (balance < amount) return err(assetsErr("BalanceLow"));

  let moved = amount;
  let left = balance - amount;
  if (left < details.minBalance) {
    moved += left;
    left = 0n;
  }
  const targetBalance = ledger.assetBalance(id, to);
  if (targetBalance === undefined && moved < details.minBalance) {
    return err({ kind: "Token", error: "BelowMinimum" });
  }

  if (left === 0n) {
    ledger.setAssetBalance(id, from, undefined);
    details = { ...details, accounts: details.accounts - 1 };
  } else {
    ledger.setAssetBalance(id, from, left);
  }
  if (targetBalance === undefined) details = { ...details, accounts: details.accounts + 1 };
  ledger.setAssetBalance(id, to, (targetBalance ?? 0n) + moved);
  ledger.setAsset(id, details);
  ledger.emit({ module: "Assets", name: "Transferred", assetId: id, from, to, amount: moved });
  return ok(moved);
};

/* ── calls ───────────────────────────────────────────────── */
export const createAsset = (
  ctx: RuntimeContext,
  owner: Address,
  id: number,
  admin: Address,
  minBalance: bigint,
): DispatchResult => {
  if (ctx.ledger.asset(id)) return err(assetsErr("InUse"));
  if (minBalance === 0n) return err(assetsErr("MinBalanceZero"));
  ctx.ledger.setAsset(id, { owner, admin, supply: 0n, minBalance, accounts: 0, status: "Live" });
  ctx.ledger.emit({ module: "Assets", name: "Created", assetId: id, creator: owner, owner: admin });
  return done;
};

export const mintAsset = (
  ctx: RuntimeContext,
  issuer: Address,
  id: number,
  beneficiary: Address,
  amount: bigint,
): DispatchResult => {
  const { ledger } = ctx;
  const asset = liveAsset(ctx, id);
  if (!asset.ok) return asset;
  const details = asset.value;
  if (issuer !== details.admin) return err(assetsErr("NoPermission"));

  const current = ledger.assetBalance(id, beneficiary);
  if (current === undefined && amount < details.minBalance) {
    return err({ kind: "Token", error: "BelowMinimum" });
  }
  const supply = details.supply + amount;
  if (supply > MAX_U128) return err({ kind: "Arithmetic", error: "Overflow" });

  ledger.setAssetBalance(id, beneficiary, (current ?? 0n) + amount);
  ledger.setAsset(id, {
    ...details,
    supply,
    accounts: details.accounts + (current === undefined ? 1 : 0),
  });
  ledger.emit({ module: "Assets", name: "Issued", assetId: id, owner: beneficiary, amount });
  return done;
};

export const transferAsset = (
  ctx: RuntimeContext,
  from: Address,
  id: number,
  target: Address,
  amount: bigint,
): DispatchResult => {
  const moved = moveAsset(ctx, id, from, target, amount);
  return moved.ok ? done : moved;
};

/** Approvals accumulate: a second approval adds to the first. */
export const approveTransfer = (
  ctx: RuntimeContext,
  owner: Address,
  id: number,
  delegate: Address,
  amount: bigint,
): DispatchResult => {
  const asset = liveAsset(ctx, id);
  if (!asset.ok) return asset;
  const total = ctx.ledger.approval(id, owner, delegate) + amount;
  ctx.ledger.setApproval(id, owner, delegate, total);
  ctx.ledger.emit({
    module: "Assets",
    name: "ApprovedTransfer",
    assetId: id,
    source: owner,
    delegate,
    amount: total,
  });
  return done;
};

export const transferApproved = (
  ctx: RuntimeContext,
  delegate: Address,
  id: number,
  owner: Address,
  destination: Address,
  amount: bigint,
): DispatchResult => {
  const asset = liveAsset(ctx, id);
  if (!asset.ok) return asset;
  const approved = ctx.ledger.approval(id, owner, delegate);
  if (approved === 0n || approved < amount) return err(assetsErr("Unapproved"));

  const moved = moveAsset(ctx, id, owner, destination, amount);
  if (!moved.ok) return moved;
  ctx.ledger.setApproval(id, owner, delegate, approved - amount);
  ctx.ledger.emit({
    module: "Assets",
    name: "TransferredApproved",
    assetId: id,
    owner,
    delegate,
    destination,
    amount,
  });
  return done;
};

export const startDestroy = (ctx: RuntimeContext, who: Address, id: number): DispatchResult => {
  const asset = liveAsset(ctx, id);
  if (!asset.ok) return asset;
  if (who !== asset.value.owner) return err(assetsErr("NoPermission"));
  ctx.ledger.setAsset(id, { ...asset.value, status: "Destroying" });
  ctx.ledger.emit({ module: "Assets", name: "DestructionStarted", assetId: id });
  return done;
};

export const setMetadata = (
  ctx: RuntimeContext,
  who: Address,
  id: number,
  name: string,
  symbol: string,
  decimals: number,
): DispatchResult => {
  const asset = liveAsset(ctx, id);
  if (!asset.ok) return asset;
  if (who !== asset.value.owner) return err(assetsErr("NoPermission"));
  const limit = ctx.assetStringLimit;
  if (utf8(name).length > limit || utf8(symbol).length > limit) {
    return err(assetsErr("BadMetadata"));
  }
  ctx.ledger.setAssetMetadata(id, { name, symbol, decimals });
  ctx.ledger.emit({
    module: "Assets",
    name: "MetadataSet",
    assetId: id,
    tokenName: name,
    symbol,
    decimals,
  });
  return done;
};

/* ── queries ─────────────────────────────────────────────── */
export const assetExists = (ctx: RuntimeContext, id: number): boolean =>
  ctx.ledger.asset(id) !== undefined;

export const assetTotalSupply = (ctx: RuntimeContext, id: number): bigint =>
  ctx.ledger.asset(id)?.supply ?? 0n;

export const assetBalanceOf = (ctx: RuntimeContext, id: number, who: Address): bigint =>
  ctx.ledger.assetBalance(id, who) ?? 0n;

export const assetAllowance = (
  ctx: RuntimeContext,
  id: number,
  owner: Address,
  delegate: Address,
): bigint => ctx.ledger.approval(id, owner, delegate);

export const dispatchAssets = (
  ctx: RuntimeContext,
  call: AssetsCall,
  origin: Origin,
): DispatchResult => {
  const signer = ensureSigned(origin);
  if (!signer.ok) return signer;
  const who = signer.value;
  switch (call.call) {
    case "create":
      return createAsset(ctx, who, call.id, call.admin, call.minBalance);
    case "mint":
      return mintAsset(ctx, who, call.id, call.beneficiary, call.amount);
    case "transfer":
      return transferAsset(ctx, who, call.id, call.target, call.amount);
    case "approveTransfer":
      return approveTransfer(ctx, who, call.id, call.delegate, call.amount);
    case "transferApproved":
      return transferApproved(ctx, who, call.id, call.owner, call.destination, call.amount);
    case "startDestroy":
      return startDestroy(ctx, who, call.id);
    case "setMetadata":
      return setMetadata(ctx, who, call.id, call.name, call.symbol, call.decimals);
  }
};
