import { describe, it, expect } from "vitest";
import { DEFAULT_ACCOUNT, INIT_AMOUNT, defaultConfig, resolveConfig } from "../src/config";
import { ConfigError } from "../src/errors";
import { makeLogger } from "../src/logging";
import { Sandbox } from "../src/sandbox";

const issuesOf = (fn: () => unknown): string[] => {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) return e.issues;
    throw e;
  }
  return [];
};

describe("resolveConfig", () => {
  it("starts from the defaults", () => {
    const config = resolveConfig({}, {});
    expect(config).toEqual(defaultConfig());
    expect(config.genesisBalances).toEqual([[DEFAULT_ACCOUNT, INIT_AMOUNT]]);
    expect(config.maxCallDepth).toBe(5);
  });

  it("reads the environment and lets explicit overrides win", () => {
    const env = { SANDBOX_BLOCK_TIME_MS: "1000", LOG_LEVEL: "debug", SANDBOX_LOG_PRETTY: "1" };
    const config = resolveConfig({}, env);
    expect(config.blockTimeMs).toBe(1_000n);
    expect(config.logLevel).toBe("debug");
    expect(config.logPretty).toBe(true);
    expect(resolveConfig({ blockTimeMs: 5n }, env).blockTimeMs).toBe(5n);
  });

  it("lists every invalid setting in one ConfigError", () => {
    expect(issuesOf(() => resolveConfig({}, { SANDBOX_GENESIS_TIMESTAMP: "soon" }))).toEqual([
      "SANDBOX_GENESIS_TIMESTAMP: not an integer (soon)",
    ]);
    const issues = issuesOf(() => resolveConfig({ maxCallDepth: 0, defaultActor: "0x01" }, {}));
    expect(issues).toHaveLength(2);
    expect(issues).toContain("defaultActor: expected a 32-byte lowercase hex address");
    expect(issues.some((i) => i.startsWith("maxCallDepth: "))).toBe(true);
    expect(issuesOf(() => resolveConfig({}, { LOG_LEVEL: "loud" }))[0]).toMatch(/^logLevel: /);
  });

  it("configures the sandbox it is handed to", () => {
    const sb = new Sandbox({}, { SANDBOX_GENESIS_TIMESTAMP: "42", LOG_LEVEL: "silent" });
    expect(sb.timestamp()).toBe(42n);
    expect(sb.freeBalance(DEFAULT_ACCOUNT)).toBe(INIT_AMOUNT);
    expect(() => new Sandbox({ existentialDeposit: -1n }, {})).toThrow(ConfigError);
  });
});

describe("makeLogger", () => {
  it("builds child loggers that honour the level", () => {
    const logger = makeLogger("silent").child({ component: "test" });
    expect(() => logger.info({ n: 1 }, "ignored")).not.toThrow();
  });
});
