import { describe, it, expect } from "vitest";
import { ConfigError } from "../src/errors";
import { balancesErr, contractsErr, statusCode, toStatusCode } from "../src/runtime/errors";
import { ErrorTable, SessionError, moduleError, unknownError } from "../src/session/errors";

const table = ErrorTable.default();

describe("ErrorTable", () => {
  it("maps module status codes to pallet error names", () => {
    expect(table.classify(131588)).toEqual(moduleError("Balances", "InsufficientBalance"));
    expect(table.classify(statusCode(4, 1, 16))).toEqual(moduleError("Assets", "AssetNotLive"));
    expect(table.classify(toStatusCode(contractsErr("CodeRejected")))).toEqual(
      moduleError("Contracts", "CodeRejected"),
    );
  });

  it("names token, arithmetic and plain variants", () => {
    expect(table.classify(8)).toEqual({ kind: "Api", code: 8, name: "Token.FundsUnavailable" });
    expect(table.classify(265)).toEqual({ kind: "Api", code: 265, name: "Arithmetic.Overflow" });
    expect(table.classify(266)).toEqual({ kind: "Api", code: 266, name: "Transactional.NoLayer" });
    expect(table.classify(3)).toEqual({ kind: "Api", code: 3, name: "BadOrigin" });
  });

  it("falls back to Unknown for codes it cannot place", () => {
    expect(table.classify(99)).toEqual(unknownError(99));
    expect(table.classify(statusCode(4, 9, 0))).toEqual(unknownError(2308));
    expect(table.classify(statusCode(4, 2, 200))).toEqual(unknownError(statusCode(4, 2, 200)));
    expect(table.classify(259)).toEqual(unknownError(259));
    expect(table.classify(statusCode(8, 0, 2))).toEqual(unknownError(131080));
    expect(table.classify(0x1000000)).toEqual(unknownError(0x1000000));
  });

  it("singles out traps and exhausted resources", () => {
    const trap = { kind: "Unreachable" as const, message: "unreachable instruction executed", pc: 6 };
    expect(table.classifyDispatch(contractsErr("ContractTrapped", { trap }))).toEqual({
      kind: "Trap",
      trap: "Unreachable",
      message: "unreachable instruction executed",
    });
    expect(table.classifyDispatch(contractsErr("OutOfGas"))).toEqual({ kind: "ResourceExhausted", resource: "gas" });
    expect(table.classifyDispatch(contractsErr("MaxCallDepthReached"))).toEqual({
      kind: "ResourceExhausted",
      resource: "callDepth",
    });
    expect(table.classifyDispatch(balancesErr("Expendability"))).toEqual(moduleError("Balances", "Expendability"));
    expect(table.classifyDispatch({ kind: "Token", error: "BelowMinimum" })).toEqual({
      kind: "Api",
      code: 520,
      name: "Token.BelowMinimum",
    });
  });

  it("rejects a malformed table with ConfigError", () => {
    expect(table.version).toBe(1);
    expect(() => ErrorTable.parse({ version: 2 })).toThrow(ConfigError);
    const custom = ErrorTable.parse({
      version: 1,
      modules: [{ index: 7, name: "Custom", errors: ["Nope"] }],
      variants: [{ index: 4, name: "Module" }],
      token: [],
      arithmetic: [],
      transactional: [],
    });
    expect(custom.classify(statusCode(4, 7, 0))).toEqual(moduleError("Custom", "Nope"));
    expect(custom.moduleName(7)).toBe("Custom");
  });
});

describe("SessionError", () => {
  it("describes its classification in the message", () => {
    expect(new SessionError(moduleError("Balances", "InsufficientBalance")).message).toBe(
      "Balances.InsufficientBalance",
    );
    expect(new SessionError({ kind: "ResourceExhausted", resource: "gas" }).message).toBe("gas exhausted");
    expect(new SessionError(unknownError(99)).message).toBe("unknown status code 99");
  });
});
