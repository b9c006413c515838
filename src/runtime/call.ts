import { type AbiType, type AbiValue, decodeArgs, encodeArgs } from "../codec/abi";
import { CodecError } from "../errors";
import type { Address } from "../types/brands";
import { concatBytes, isAddress } from "../utils/bytes";
import type { AssetsCall } from "./assets";
import type { BalancesCall } from "./balances";
import { MODULE } from "./errors";
import type { SystemCall } from "./system";
import type { TimestampCall } from "./timestamp";

export type RuntimeCall = SystemCall | AssetsCall | BalancesCall | TimestampCall;

/*
 * Byte form: module index (u8), call index (u8), then the ABI-encoded
 * arguments in declaration order. Call indices keep the pallet
 * numbering, so gaps are expected.
 */

type Encoded = { call: number; types: AbiType[]; values: AbiValue[] };

const layout = (c: RuntimeCall): Encoded => {
  switch (c.module) {
    case "System":
      return c.call === "remark"
        ? { call: 0, types: ["bytes"], values: [c.remark] }
        : { call: 7, types: ["bytes"], values: [c.remark] };
    case "Assets":
      switch (c.call) {
        case "create":
          return { call: 0, types: ["u32", "address", "u128"], values: [c.id, c.admin, c.minBalance] };
        case "startDestroy":
          return { call: 2, types: ["u32"], values: [c.id] };
        case "mint":
          return { call: 6, types: ["u32", "address", "u128"], values: [c.id, c.beneficiary, c.amount] };
        case "transfer":
          return { call: 8, types: ["u32", "address", "u128"], values: [c.id, c.target, c.amount] };
        case "setMetadata":
          return {
            call: 17,
            types: ["u32", "string", "string", "u8"],
            values: [c.id, c.name, c.symbol, c.decimals],
          };
        case "approveTransfer":
          return { call: 22, types: ["u32", "address", "u128"], values: [c.id, c.delegate, c.amount] };
        case "transferApproved":
          return {
            call: 25,
            types: ["u32", "address", "address", "u128"],
            values: [c.id, c.owner, c.destination, c.amount],
          };
      }
    case "Balances":
      switch (c.call) {
        case "transferAllowDeath":
          return { call: 0, types: ["address", "u128"], values: [c.dest, c.value] };
        case "transferKeepAlive":
          return { call: 3, types: ["address", "u128"], values: [c.dest, c.value] };
        case "forceSetBalance":
          return { call: 8, types: ["address", "u128"], values: [c.who, c.newFree] };
      }
    case "Timestamp":
      return { call: 0, types: ["u64"], values: [c.now] };
  }
};

export const encodeRuntimeCall = (c: RuntimeCall): Uint8Array => {
  const { call, types, values } = layout(c);
  return concatBytes(Uint8Array.of(MODULE[c.module], call), encodeArgs(types, values));
};

/* ── decoding ────────────────────────────────────────────── */
const u32 = (v: AbiValue | undefined): number => {
  if (typeof v !== "number") throw new CodecError("expected a u32");
  return v;
};
const big = (v: AbiValue | undefined): bigint => {
  if (typeof v !== "bigint") throw new CodecError("expected a wide integer");
  return v;
};
const addr = (v: AbiValue | undefined): Address => {
  if (typeof v !== "string" || !isAddress(v)) throw new CodecError("expected an address");
  return v;
};
const bytes = (v: AbiValue | undefined): Uint8Array => {
  if (!(v instanceof Uint8Array)) throw new CodecError("expected bytes");
  return v;
};
const str = (v: AbiValue | undefined): string => {
  if (typeof v !== "string") throw new CodecError("expected a string");
  return v;
};

const ID_ADDR_AMOUNT: AbiType[] = ["u32", "address", "u128"];

/** Parses the byte form back into a call; throws CodecError on anything unknown. */
export const decodeRuntimeCall = (data: Uint8Array): RuntimeCall => {
  if (data.length < 2) throw new CodecError("runtime call shorter than two bytes");
  const [module, index] = data;
  const body = data.subarray(2);
  const args = (types: AbiType[]) => decodeArgs(types, body);

  switch (module) {
    case MODULE.System: {
      if (index !== 0 && index !== 7) break;
      const [remark] = args(["bytes"]);
      return { module: "System", call: index === 0 ? "remark" : "remarkWithEvent", remark: bytes(remark) };
    }
    case MODULE.Assets:
      switch (index) {
        case 0: {
          const [id, admin, minBalance] = args(ID_ADDR_AMOUNT);
          return { module: "Assets", call: "create", id: u32(id), admin: addr(admin), minBalance: big(minBalance) };
        }
        case 2: {
          const [id] = args(["u32"]);
          return { module: "Assets", call: "startDestroy", id: u32(id) };
        }
        case 6: {
          const [id, who, amount] = args(ID_ADDR_AMOUNT);
          return { module: "Assets", call: "mint", id: u32(id), beneficiary: addr(who), amount: big(amount) };
        }
        case 8: {
          const [id, who, amount] = args(ID_ADDR_AMOUNT);
          return { module: "Assets", call: "transfer", id: u32(id), target: addr(who), amount: big(amount) };
        }
        case 17: {
          const [id, name, symbol, decimals] = args(["u32", "string", "string", "u8"]);
          return {
            module: "Assets",
            call: "setMetadata",
            id: u32(id),
            name: str(name),
            symbol: str(symbol),
            decimals: u32(decimals),
          };
        }
        case 22: {
          const [id, who, amount] = args(ID_ADDR_AMOUNT);
          return {
            module: "Assets",
            call: "approveTransfer",
            id: u32(id),
            delegate: addr(who),
            amount: big(amount),
          };
        }
        case 25: {
          const [id, owner, dest, amount] = args(["u32", "address", "address", "u128"]);
          return {
            module: "Assets",
            call: "transferApproved",
            id: u32(id),
            owner: addr(owner),
            destination: addr(dest),
            amount: big(amount),
          };
        }
      }
      break;
    case MODULE.Balances: {
      if (index !== 0 && index !== 3 && index !== 8) break;
      const [who, amount] = args(["address", "u128"]);
      if (index === 8) {
        return { module: "Balances", call: "forceSetBalance", who: addr(who), newFree: big(amount) };
      }
      return {
        module: "Balances",
        call: index === 0 ? "transferAllowDeath" : "transferKeepAlive",
        dest: addr(who),
        value: big(amount),
      };
    }
    case MODULE.Timestamp: {
      if (index !== 0) break;
      const [now] = args(["u64"]);
      return { module: "Timestamp", call: "set", now: big(now) };
    }
  }
  throw new CodecError(`unknown runtime call ${module}.${index}`);
};
