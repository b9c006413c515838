import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { encodeValue, selectorOf } from "../src/codec/abi";
import type { Result } from "../src/core/result";
import type { SandboxConfig } from "../src/config";
import { type DispatchError, ROOT, signed } from "../src/core/types";
import { codeHashOf, contractAddress } from "../src/engine/address";
import { contractsErr, describeDispatchError } from "../src/runtime/errors";
import { Sandbox } from "../src/sandbox";
import type { Address } from "../src/types/brands";
import { addressToBytes, bytesToUint, concatBytes, hexToBytes, utf8 } from "../src/utils/bytes";
import { type FixtureName, fixtureCode } from "./helpers/contracts";
import { ALICE, BOB, CHARLIE, quietLog } from "./helpers/actors";

const newSandbox = (overrides: Partial<SandboxConfig> = {}) => new Sandbox({ ...quietLog, ...overrides }, {});

const valueOf = <T>(r: Result<T, DispatchError>): T => {
  if (!r.ok) throw new Error(`unexpected failure: ${describeDispatchError(r.error)}`);
  return r.value;
};

const errorOf = (r: Result<unknown, DispatchError>): DispatchError | undefined => (r.ok ? undefined : r.error);

const trapOf = (r: Result<unknown, DispatchError>) => {
  const e = errorOf(r);
  return e?.kind === "Module" ? e.trap : undefined;
};

const deploy = (
  sb: Sandbox,
  name: FixtureName,
  input = new Uint8Array(0),
  endowment = 0n,
  salt?: Uint8Array,
): Address => {
  const selector = name === "recurse" || name === "relay" ? Uint8Array.of(0, 0, 0, 0) : selectorOf("new");
  return valueOf(sb.instantiate(fixtureCode(name), selector, input, undefined, endowment, salt).result).address;
};

/** relay exports its entry points at selectors 0x00000000..0x00000006 */
const relayCall = (sb: Sandbox, at: Address, entry: number, input = new Uint8Array(0)) =>
  sb.invoke(at, Uint8Array.of(0, 0, 0, entry), input);

const call = (sb: Sandbox, at: Address, label: string, input = new Uint8Array(0)) =>
  sb.invoke(at, selectorOf(label), input);

const FALSE = encodeValue("bool", false);

describe("ContractEngine", () => {
  describe("code upload", () => {
    it("stores code under its hash once", () => {
      const sb = newSandbox();
      const code = fixtureCode("flipper");
      expect(sb.uploadCode(code)).toEqual({ ok: true, value: codeHashOf(code) });
      expect(sb.uploadCode(code)).toEqual({ ok: true, value: codeHashOf(code) });
      expect(sb.events().map((e) => e.event.name)).toEqual(["CodeStored"]);
      expect(sb.ledger.codeInfo(codeHashOf(code))).toEqual({ owner: ALICE, refcount: 0n, codeLen: code.length });
    });

    it("rejects malformed and oversized code", () => {
      expect(errorOf(newSandbox().uploadCode(Uint8Array.of(1, 2, 3)))).toEqual(contractsErr("CodeRejected"));
      expect(errorOf(newSandbox({ maxCodeLen: 10 }).uploadCode(fixtureCode("flipper")))).toEqual(
        contractsErr("CodeTooLarge"),
      );
    });

    it("requires a signed origin", () => {
      expect(errorOf(newSandbox().uploadCode(fixtureCode("flipper"), ROOT))).toEqual({ kind: "BadOrigin" });
    });
  });

  describe("instantiate", () => {
    it("derives the address from deployer, code hash and salt", () => {
      const sb = newSandbox();
      const code = fixtureCode("flipper");
      const out = sb.instantiate(code, selectorOf("new"), FALSE);
      const expected = contractAddress(ALICE, codeHashOf(code), new Uint8Array(0));
      expect(valueOf(out.result)).toEqual({ flags: 0, data: new Uint8Array(0), address: expected });
      expect(sb.ledger.contractInfo(expected)).toEqual({ codeHash: codeHashOf(code), deployer: ALICE });
      expect(out.events.map((e) => `${e.event.module}.${e.event.name}`)).toEqual([
        "Contracts.CodeStored",
        "System.NewAccount",
        "Contracts.Instantiated",
      ]);
    });

    it("refuses a second contract at the same address, but not with another salt", () => {
      const sb = newSandbox();
      const code = fixtureCode("flipper");
      deploy(sb, "flipper", FALSE);
      expect(errorOf(sb.instantiate(code, selectorOf("new"), FALSE).result)).toEqual(
        contractsErr("DuplicateContract"),
      );
      const salted = sb.instantiate(code, selectorOf("new"), FALSE, signed(ALICE), 0n, Uint8Array.of(1));
      expect(valueOf(salted.result).address).toBe(contractAddress(ALICE, codeHashOf(code), Uint8Array.of(1)));
    });

    it("instantiates from an uploaded code hash and fails on an unknown one", () => {
      const sb = newSandbox();
      const hash = valueOf(sb.uploadCode(fixtureCode("looper")));
      expect(sb.instantiate(hash, selectorOf("new"), new Uint8Array(0)).result.ok).toBe(true);
      expect(sb.ledger.codeInfo(hash)?.refcount).toBe(1n);
      const missing = codeHashOf(Uint8Array.of(9));
      expect(errorOf(sb.instantiate(missing, selectorOf("new"), new Uint8Array(0)).result)).toEqual(
        contractsErr("CodeNotFound"),
      );
    });

    it("moves the endowment into the new account", () => {
      const sb = newSandbox();
      const before = sb.freeBalance(ALICE);
      const vault = deploy(sb, "vault", new Uint8Array(0), 1_000n);
      expect(sb.freeBalance(vault)).toBe(1_000n);
      expect(sb.freeBalance(ALICE)).toBe(before - 1_000n);
    });

    it("leaves no trace when the constructor traps", () => {
      const sb = newSandbox();
      const out = sb.instantiate(fixtureCode("flipper"), selectorOf("new"), new Uint8Array(0));
      // new() copies one input byte; an empty input traps in input_copy
      expect(trapOf(out.result)?.kind).toBe("HostError");
      expect(out.events).toEqual([]);
      expect(sb.events()).toEqual([]);
      expect(sb.ledger.extrinsicCount()).toBe(0);
    });
  });

  describe("calls", () => {
    it("flip stores, emits and reports", () => {
      const sb = newSandbox();
      const flipper = deploy(sb, "flipper", FALSE);
      const out = call(sb, flipper, "flip");
      expect(valueOf(out.result)).toEqual({ flags: 0, data: new Uint8Array(0) });
      expect(out.debugMessages).toEqual(["flipped"]);
      expect(out.events.map((e) => e.event)).toEqual([
        { module: "Contracts", name: "ContractEmitted", contract: flipper, topics: [], data: Uint8Array.of(0, 1) },
        { module: "Contracts", name: "Called", caller: ALICE, contract: flipper },
      ]);
      expect(valueOf(call(sb, flipper, "get").result).data).toEqual(Uint8Array.of(1));
    });

    it("fails on a missing contract or a non-signed origin", () => {
      const sb = newSandbox();
      expect(errorOf(call(sb, CHARLIE, "flip").result)).toEqual(contractsErr("ContractNotFound"));
      const flipper = deploy(sb, "flipper", FALSE);
      expect(errorOf(sb.invoke(flipper, selectorOf("flip"), new Uint8Array(0), ROOT).result)).toEqual({
        kind: "BadOrigin",
      });
    });

    it("turns traps into ContractTrapped carrying the faulting instruction", () => {
      const sb = newSandbox();
      const looper = deploy(sb, "looper");
      const boom = call(sb, looper, "boom").result;
      expect(errorOf(boom)).toMatchObject({ kind: "Module", index: 4, error: 12, message: "ContractTrapped" });
      expect(trapOf(boom)).toEqual({ kind: "Unreachable", message: "unreachable instruction executed", pc: 6 });
      expect(trapOf(call(sb, looper, "divzero").result)).toEqual({
        kind: "DivisionByZero",
        message: "div by zero",
        pc: 11,
      });
      expect(trapOf(call(sb, looper, "oob").result)).toEqual({
        kind: "MemoryOutOfBounds",
        message: "access [70000, +1) outside 4096 bytes",
        pc: 18,
      });
      expect(trapOf(call(sb, looper, "nope").result)?.kind).toBe("EntryPointNotFound");
    });

    it("rolls back storage and events of a trapped call", () => {
      const sb = newSandbox();
      const looper = deploy(sb, "looper");
      const eventsBefore = sb.events().length;
      const out = call(sb, looper, "write_then_trap");
      expect(trapOf(out.result)?.kind).toBe("Unreachable");
      expect(out.events).toEqual([]);
      expect(sb.events()).toHaveLength(eventsBefore);
      expect(valueOf(call(sb, looper, "stored").result).data).toEqual(Uint8Array.of(0));
    });
  });

  describe("gas", () => {
    it("aborts with OutOfGas at the limit and reports the charge that did not fit", () => {
      const sb = newSandbox();
      const looper = deploy(sb, "looper");
      const out = sb.invoke(looper, selectorOf("spin"), new Uint8Array(0), undefined, 0n, {
        refTime: 1_000_000n,
        proofSize: 1_000_000n,
      });
      expect(errorOf(out.result)).toEqual(contractsErr("OutOfGas"));
      expect(out.gasConsumed).toEqual({ refTime: 1_000_000n, proofSize: 0n });
      expect(out.gasRequired).toEqual({ refTime: 1_001_000n, proofSize: 0n });
      expect(out.events).toEqual([]);
    });

    it("charges proof size for storage access", () => {
      const sb = newSandbox();
      const flipper = deploy(sb, "flipper", FALSE);
      // storage_get "flag" -> 0x00, storage_set "flag" = 0x01: 2 * (64 + 4 + 1)
      expect(call(sb, flipper, "flip").gasConsumed.proofSize).toBe(138n);
    });
  });

  describe("nested calls", () => {
    it("stops runaway recursion at the depth limit", () => {
      const sb = newSandbox();
      const recurse = deploy(sb, "recurse");
      const out = sb.invoke(recurse, Uint8Array.of(0, 0, 0, 1), new Uint8Array(0));
      expect(errorOf(out.result)).toEqual(contractsErr("MaxCallDepthReached"));
      expect(out.events).toEqual([]);
    });

    it("hands the callee's failure back to the caller as a return code", () => {
      const sb = newSandbox();
      const recurse = deploy(sb, "recurse");
      const flipper = deploy(sb, "flipper", FALSE);
      const ping = (target: Address) =>
        bytesToUint(valueOf(sb.invoke(recurse, Uint8Array.of(0, 0, 0, 2), addressToBytes(target)).result).data);
      expect(ping(CHARLIE)).toBe(8n);
      expect(ping(flipper)).toBe(1n);
    });
  });

  describe("nested frames", () => {
    const pair = () => {
      const sb = newSandbox();
      const outer = deploy(sb, "relay");
      const inner = deploy(sb, "relay", undefined, 0n, Uint8Array.of(1));
      return { sb, outer, inner };
    };

    it("reports the calling contract as the caller", () => {
      const { sb, outer, inner } = pair();
      expect(valueOf(relayCall(sb, outer, 1).result).data).toEqual(addressToBytes(ALICE));
      expect(valueOf(relayCall(sb, outer, 2, addressToBytes(inner)).result).data).toEqual(addressToBytes(outer));
    });

    it("rolls back a trapped callee but keeps the caller's writes", () => {
      const { sb, outer, inner } = pair();
      const out = relayCall(sb, outer, 4, addressToBytes(inner));
      expect(valueOf(out.result).data).toEqual(Uint8Array.of(0, 0, 0, 1));
      expect(sb.ledger.contractStorage(outer, utf8("m"))).toEqual(Uint8Array.of(1));
      expect(sb.ledger.contractStorage(inner, utf8("s"))).toBeUndefined();
      expect(out.events.map((e) => e.event)).toEqual([
        { module: "Contracts", name: "Called", caller: ALICE, contract: outer },
      ]);
    });

    it("instantiates from a running contract, which becomes the deployer", () => {
      const { sb, outer } = pair();
      const hash = codeHashOf(fixtureCode("relay"));
      const child = contractAddress(outer, hash, new Uint8Array(0));

      const first = relayCall(sb, outer, 5, hexToBytes(hash));
      expect(valueOf(first.result).data).toEqual(concatBytes(Uint8Array.of(0, 0, 0, 0), addressToBytes(child)));
      expect(sb.ledger.contractInfo(child)).toEqual({ codeHash: hash, deployer: outer });
      expect(first.events.map((e) => e.event.name)).toEqual(["NewAccount", "Instantiated", "Called"]);

      const again = relayCall(sb, outer, 5, hexToBytes(hash));
      expect(trapOf(again.result)).toMatchObject({
        kind: "HostError",
        message: "a contract already exists at the derived address",
      });
    });

    it("reads the block number and timestamp of the open block", () => {
      const sb = newSandbox({ genesisTimestamp: 1_000n, blockTimeMs: 6_000n });
      const relay = deploy(sb, "relay");
      const clock = () => {
        const { data } = valueOf(relayCall(sb, relay, 6).result);
        return [bytesToUint(data.subarray(0, 8)), bytesToUint(data.subarray(8))];
      };
      expect(clock()).toEqual([1n, 1_000n]);
      sb.buildBlocks(2);
      expect(clock()).toEqual([3n, 13_000n]);
    });
  });

  describe("balance moves", () => {
    it("lets a contract pay out but never below the existential deposit", () => {
      const sb = newSandbox();
      const vault = deploy(sb, "vault", new Uint8Array(0), 1_000n);
      const transferTo = (amount: bigint) =>
        valueOf(
          call(sb, vault, "transfer_to", concatBytes(addressToBytes(BOB), encodeValue("u128", amount))).result,
        ).data;

      expect(transferTo(100n)).toEqual(Uint8Array.of(0, 0, 0, 0));
      expect(sb.freeBalance(BOB)).toBe(100n);
      expect(sb.freeBalance(vault)).toBe(900n);

      expect(transferTo(900n)).toEqual(Uint8Array.of(0, 0, 0, 5));
      expect(sb.freeBalance(vault)).toBe(900n);
      expect(valueOf(call(sb, vault, "balance").result).data).toEqual(encodeValue("u128", 900n));
    });
  });

  describe("dryRun", () => {
    it("runs against the live state and then discards it", () => {
      const sb = newSandbox();
      const flipper = deploy(sb, "flipper", FALSE);
      const inside = sb.dryRun((s) => {
        call(s, flipper, "flip");
        return valueOf(call(s, flipper, "get").result).data;
      });
      expect(inside).toEqual(Uint8Array.of(1));
      expect(valueOf(call(sb, flipper, "get").result).data).toEqual(Uint8Array.of(0));
    });
  });

  it("gives distinct salts distinct addresses", () => {
    const hash = codeHashOf(fixtureCode("looper"));
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 8 }), fc.uint8Array({ maxLength: 8 }), (a, b) => {
        fc.pre(a.length !== b.length || a.some((x, i) => x !== b[i]));
        expect(contractAddress(ALICE, hash, a)).not.toBe(contractAddress(ALICE, hash, b));
        expect(contractAddress(ALICE, hash, a)).toBe(contractAddress(ALICE, hash, a));
      }),
    );
  });
});
