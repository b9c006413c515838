import { describe, it, expect, beforeEach } from "vitest";
import { keccak } from "../src/core/hash";
import { ROOT, type RuntimeEvent, signed } from "../src/core/types";
import { CodecError } from "../src/errors";
import { decodeRuntimeCall, encodeRuntimeCall, type RuntimeCall } from "../src/runtime/call";
import { BASE_DISPATCH_WEIGHT, dispatchWeight } from "../src/runtime/dispatcher";
import { toStatusCode } from "../src/runtime/errors";
import { Sandbox } from "../src/sandbox";
import { bytesToHex, utf8 } from "../src/utils/bytes";
import { ALICE, BOB, CHARLIE, DAVE, quietLog } from "./helpers/actors";

const names = (events: { event: RuntimeEvent }[]) => events.map((e) => `${e.event.module}.${e.event.name}`);

const newSandbox = () =>
  new Sandbox(
    {
      ...quietLog,
      existentialDeposit: 10n,
      genesisBalances: [
        [ALICE, 1_000_000n],
        [BOB, 1_000n],
      ],
    },
    {},
  );

describe("Dispatcher", () => {
  let sb: Sandbox;
  beforeEach(() => {
    sb = newSandbox();
  });

  describe("Balances", () => {
    it("opens a new account on transfer and bumps the sender nonce", () => {
      const out = sb.dispatch({ module: "Balances", call: "transferAllowDeath", dest: CHARLIE, value: 500n });
      expect(out.result.ok).toBe(true);
      expect(names(out.events)).toEqual(["System.NewAccount", "Balances.Endowed", "Balances.Transfer"]);
      expect(out.events[2]?.event).toEqual({
        module: "Balances",
        name: "Transfer",
        from: ALICE,
        to: CHARLIE,
        amount: 500n,
      });
      expect(sb.freeBalance(ALICE)).toBe(999_500n);
      expect(sb.freeBalance(CHARLIE)).toBe(500n);
      expect(sb.ledger.account(ALICE)?.nonce).toBe(1n);
      expect(sb.ledger.extrinsicCount()).toBe(1);
    });

    it("charges the base weight plus the encoded call length", () => {
      const call: RuntimeCall = { module: "Balances", call: "transferAllowDeath", dest: CHARLIE, value: 1n };
      expect(dispatchWeight(call)).toEqual({ refTime: 125_050_000n, proofSize: 3_593n });
      expect(sb.dispatch(call).weight).toEqual({ refTime: 125_050_000n, proofSize: 3_593n });
    });

    it("fails with InsufficientBalance and leaves both balances unchanged", () => {
      const out = sb.dispatch(
        { module: "Balances", call: "transferAllowDeath", dest: ALICE, value: 5_000n },
        signed(BOB),
      );
      expect(out.result).toEqual({
        ok: false,
        error: { kind: "Module", index: 2, error: 2, message: "InsufficientBalance" },
      });
      expect(out.result.ok ? 0 : toStatusCode(out.result.error)).toBe(131588);
      expect(out.events).toEqual([]);
      expect(sb.freeBalance(ALICE)).toBe(1_000_000n);
      expect(sb.freeBalance(BOB)).toBe(1_000n);
      expect(sb.ledger.account(BOB)?.nonce).toBe(0n);
      expect(sb.ledger.extrinsicCount()).toBe(0);
    });

    it("refuses to open an account below the existential deposit", () => {
      const out = sb.dispatch({ module: "Balances", call: "transferAllowDeath", dest: CHARLIE, value: 5n });
      expect(out.result).toEqual({
        ok: false,
        error: { kind: "Module", index: 2, error: 3, message: "ExistentialDeposit" },
      });
      expect(sb.ledger.account(CHARLIE)).toBeUndefined();
      expect(sb.freeBalance(ALICE)).toBe(1_000_000n);
    });

    it("keep-alive transfers may not take the sender below the existential deposit", () => {
      const out = sb.dispatch(
        { module: "Balances", call: "transferKeepAlive", dest: ALICE, value: 995n },
        signed(BOB),
      );
      expect(out.result.ok ? undefined : out.result.error).toEqual({
        kind: "Module",
        index: 2,
        error: 4,
        message: "Expendability",
      });
      expect(sb.freeBalance(BOB)).toBe(1_000n);
    });

    it("reaps a sender left below the existential deposit", () => {
      const out = sb.dispatch(
        { module: "Balances", call: "transferAllowDeath", dest: ALICE, value: 995n },
        signed(BOB),
      );
      expect(out.result.ok).toBe(true);
      expect(names(out.events)).toEqual(["Balances.Transfer", "Balances.DustLost", "System.KilledAccount"]);
      expect(out.events[1]?.event).toEqual({ module: "Balances", name: "DustLost", account: BOB, amount: 5n });
      expect(sb.ledger.account(BOB)).toBeUndefined();
      expect(sb.freeBalance(ALICE)).toBe(1_000_995n);
    });

    it("treats a zero transfer as a successful no-op", () => {
      const out = sb.dispatch({ module: "Balances", call: "transferAllowDeath", dest: BOB, value: 0n });
      expect(out.result.ok).toBe(true);
      expect(out.events).toEqual([]);
      expect(sb.freeBalance(BOB)).toBe(1_000n);
    });

    it("force-sets balances from root only", () => {
      const call: RuntimeCall = { module: "Balances", call: "forceSetBalance", who: CHARLIE, newFree: 77n };
      expect(sb.dispatch(call).result).toEqual({ ok: false, error: { kind: "BadOrigin" } });

      const out = sb.dispatch(call, ROOT);
      expect(out.result.ok).toBe(true);
      expect(names(out.events)).toEqual(["System.NewAccount", "Balances.BalanceSet"]);
      expect(sb.freeBalance(CHARLIE)).toBe(77n);
    });

    it("mintInto credits an existing account and reports the new balance", () => {
      expect(sb.mintInto(BOB, 50n)).toEqual({ ok: true, value: 1_050n });
      expect(sb.mintInto(CHARLIE, 1n).ok).toBe(false);
      expect(sb.ledger.account(CHARLIE)).toBeUndefined();
    });
  });

  describe("argument widths", () => {
    it("rejects a balance wider than u128 before touching state", () => {
      const call: RuntimeCall = { module: "Balances", call: "forceSetBalance", who: BOB, newFree: 1n << 128n };
      expect(sb.dispatch(call, ROOT)).toEqual({
        result: { ok: false, error: { kind: "Arithmetic", error: "Overflow" } },
        events: [],
        weight: BASE_DISPATCH_WEIGHT,
      });
      expect(sb.freeBalance(BOB)).toBe(1_000n);
    });

    it("rejects a timestamp wider than u64 before touching state", () => {
      const pending = sb.events().length;
      const out = sb.dispatch({ module: "Timestamp", call: "set", now: 1n << 64n }, ROOT);
      expect(out.result).toEqual({ ok: false, error: { kind: "Arithmetic", error: "Overflow" } });
      expect(sb.timestamp()).toBe(0n);
      expect(sb.events()).toHaveLength(pending);
    });
  });

  describe("System and Timestamp", () => {
    it("remark needs some origin; remarkWithEvent needs a signer", () => {
      const remark = utf8("hello");
      expect(sb.dispatch({ module: "System", call: "remark", remark }, { kind: "none" }).result).toEqual({
        ok: false,
        error: { kind: "BadOrigin" },
      });
      expect(sb.dispatch({ module: "System", call: "remark", remark }, ROOT).result.ok).toBe(true);
      expect(sb.dispatch({ module: "System", call: "remarkWithEvent", remark }, ROOT).result.ok).toBe(false);

      const out = sb.dispatch({ module: "System", call: "remarkWithEvent", remark });
      expect(out.events.map((e) => e.event)).toEqual([
        { module: "System", name: "Remarked", sender: ALICE, hash: bytesToHex(keccak(remark)) },
      ]);
    });

    it("timestamp moves forward only and rejects signed origins", () => {
      expect(sb.dispatch({ module: "Timestamp", call: "set", now: 5n }).result).toEqual({
        ok: false,
        error: { kind: "BadOrigin" },
      });
      expect(sb.dispatch({ module: "Timestamp", call: "set", now: 5_000n }, ROOT).result.ok).toBe(true);
      expect(sb.timestamp()).toBe(5_000n);

      const back = sb.dispatch({ module: "Timestamp", call: "set", now: 4_000n }, { kind: "none" });
      expect(back.result).toEqual({
        ok: false,
        error: { kind: "Other", message: "timestamp must not decrease (5000 > 4000)" },
      });
      expect(sb.timestamp()).toBe(5_000n);
    });
  });

  describe("Assets", () => {
    const assetErr = (error: number, message: string) => ({
      ok: false,
      error: { kind: "Module", index: 1, error, message },
    });

    beforeEach(() => {
      expect(sb.createAsset(1, ALICE, 10n).ok).toBe(true);
    });

    it("creates assets once and requires a positive minimum balance", () => {
      expect(sb.assetExists(1)).toBe(true);
      expect(sb.assetExists(2)).toBe(false);
      expect(sb.createAsset(1, BOB, 10n)).toEqual(assetErr(5, "InUse"));
      expect(sb.createAsset(2, BOB, 0n)).toEqual(assetErr(7, "MinBalanceZero"));
    });

    it("only the admin mints, and new holders need the minimum balance", () => {
      const mint: RuntimeCall = { module: "Assets", call: "mint", id: 1, beneficiary: BOB, amount: 100n };
      expect(sb.dispatch(mint, signed(BOB)).result).toEqual(assetErr(2, "NoPermission"));
      expect(sb.mintAsset(1, BOB, 5n)).toEqual({ ok: false, error: { kind: "Token", error: "BelowMinimum" } });
      expect(sb.mintAsset(1, BOB, 100n).ok).toBe(true);
      expect(sb.assetBalance(1, BOB)).toBe(100n);
      expect(sb.assetTotalSupply(1)).toBe(100n);
      expect(sb.mintAsset(9, BOB, 100n)).toEqual(assetErr(3, "Unknown"));
    });

    it("a transfer that would leave dust moves the whole balance", () => {
      sb.mintAsset(1, BOB, 100n);
      const out = sb.dispatch(
        { module: "Assets", call: "transfer", id: 1, target: CHARLIE, amount: 95n },
        signed(BOB),
      );
      expect(out.result.ok).toBe(true);
      expect(sb.assetBalance(1, BOB)).toBe(0n);
      expect(sb.assetBalance(1, CHARLIE)).toBe(100n);
      expect(sb.ledger.asset(1)?.accounts).toBe(1);
      expect(out.events.map((e) => e.event)).toEqual([
        { module: "Assets", name: "Transferred", assetId: 1, from: BOB, to: CHARLIE, amount: 100n },
      ]);
    });

    it("fails a transfer larger than the balance", () => {
      sb.mintAsset(1, BOB, 100n);
      const out = sb.dispatch(
        { module: "Assets", call: "transfer", id: 1, target: CHARLIE, amount: 101n },
        signed(BOB),
      );
      expect(out.result).toEqual(assetErr(0, "BalanceLow"));
      expect(sb.assetBalance(1, BOB)).toBe(100n);
    });

    it("approvals accumulate and are spent by transferApproved", () => {
      sb.mintAsset(1, CHARLIE, 100n);
      expect(sb.approveAsset(1, CHARLIE, DAVE, 30n).ok).toBe(true);
      expect(sb.approveAsset(1, CHARLIE, DAVE, 20n).ok).toBe(true);
      expect(sb.assetAllowance(1, CHARLIE, DAVE)).toBe(50n);

      const spend = (amount: bigint) =>
        sb.dispatch(
          { module: "Assets", call: "transferApproved", id: 1, owner: CHARLIE, destination: ALICE, amount },
          signed(DAVE),
        );
      expect(spend(60n).result).toEqual(assetErr(10, "Unapproved"));

      const out = spend(40n);
      expect(out.result.ok).toBe(true);
      expect(names(out.events)).toEqual(["Assets.Transferred", "Assets.TransferredApproved"]);
      expect(sb.assetBalance(1, ALICE)).toBe(40n);
      expect(sb.assetBalance(1, CHARLIE)).toBe(60n);
      expect(sb.assetAllowance(1, CHARLIE, DAVE)).toBe(10n);
    });

    it("a delegate without approval is Unapproved", () => {
      sb.mintAsset(1, CHARLIE, 100n);
      const out = sb.dispatch(
        { module: "Assets", call: "transferApproved", id: 1, owner: CHARLIE, destination: ALICE, amount: 1n },
        signed(DAVE),
      );
      expect(out.result).toEqual(assetErr(10, "Unapproved"));
    });

    it("destruction is owner-only and freezes the asset", () => {
      expect(sb.dispatch({ module: "Assets", call: "startDestroy", id: 1 }, signed(BOB)).result).toEqual(
        assetErr(2, "NoPermission"),
      );
      expect(sb.startDestroyAsset(1).ok).toBe(true);
      expect(sb.mintAsset(1, BOB, 100n)).toEqual(assetErr(16, "AssetNotLive"));
      expect(sb.assetExists(1)).toBe(true);
    });

    it("metadata strings are bounded", () => {
      expect(sb.setAssetMetadata(1, "x".repeat(51), "X", 2)).toEqual(assetErr(9, "BadMetadata"));
      expect(sb.setAssetMetadata(1, "Token", "TKN", 12).ok).toBe(true);
      expect(sb.assetMetadata(1)).toEqual({ name: "Token", symbol: "TKN", decimals: 12 });
    });

    it("asset calls need a signed origin", () => {
      expect(sb.dispatch({ module: "Assets", call: "startDestroy", id: 1 }, ROOT).result).toEqual({
        ok: false,
        error: { kind: "BadOrigin" },
      });
    });
  });
});

describe("runtime call encoding", () => {
  it("prefixes module and call index", () => {
    const call: RuntimeCall = { module: "Balances", call: "transferKeepAlive", dest: BOB, value: 7n };
    const bytes = encodeRuntimeCall(call);
    expect([...bytes.subarray(0, 2)]).toEqual([2, 3]);
    expect(bytes).toHaveLength(50);
    expect(decodeRuntimeCall(bytes)).toEqual(call);
  });

  it("reads back every supported call", () => {
    const calls: RuntimeCall[] = [
      { module: "System", call: "remark", remark: utf8("x") },
      { module: "System", call: "remarkWithEvent", remark: utf8("y") },
      { module: "Assets", call: "create", id: 4, admin: BOB, minBalance: 1n },
      { module: "Assets", call: "startDestroy", id: 4 },
      { module: "Assets", call: "setMetadata", id: 4, name: "A", symbol: "B", decimals: 3 },
      { module: "Assets", call: "transferApproved", id: 4, owner: BOB, destination: ALICE, amount: 2n },
      { module: "Balances", call: "forceSetBalance", who: BOB, newFree: 9n },
      { module: "Timestamp", call: "set", now: 12n },
    ];
    for (const call of calls) expect(decodeRuntimeCall(encodeRuntimeCall(call))).toEqual(call);
  });

  it("rejects unknown and truncated calls", () => {
    expect(() => decodeRuntimeCall(Uint8Array.of(2, 9))).toThrow("unknown runtime call 2.9");
    expect(() => decodeRuntimeCall(Uint8Array.of(4, 0))).toThrow("unknown runtime call 4.0");
    expect(() => decodeRuntimeCall(Uint8Array.of(2))).toThrow(CodecError);
    expect(() => decodeRuntimeCall(Uint8Array.of(2, 0, 1))).toThrow(CodecError);
  });
});
