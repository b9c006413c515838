import * as v from "valibot";
import { ConfigError } from "./errors";
import type { Address } from "./types/brands";
import { filledAddress, isAddress } from "./utils/bytes";

/** Unit base for balances. */
export const UNIT = 10_000_000_000n;
/** Default initial balance for the default account. */
export const INIT_AMOUNT = 100_000_000n * UNIT;
/** Default actor: 32 bytes of 0x01. */
export const DEFAULT_ACCOUNT: Address = filledAddress(1);

const AddressSchema = v.custom<Address>(
  (input) => typeof input === "string" && isAddress(input),
  "expected a 32-byte lowercase hex address",
);
const Amount = v.pipe(v.bigint(), v.minValue(0n));
const Count = v.pipe(v.number(), v.integer(), v.minValue(1));

const WeightSchema = v.object({
  refTime: Amount,
  proofSize: Amount,
});

const ConfigSchema = v.object({
  defaultActor: AddressSchema,
  genesisBalances: v.array(v.tuple([AddressSchema, Amount])),
  genesisTimestamp: Amount,
  blockTimeMs: v.pipe(v.bigint(), v.minValue(1n)),
  existentialDeposit: Amount,
  gasLimit: WeightSchema,
  maxCallDepth: Count,
  maxCodeLen: Count,
  maxStorageKeyLen: Count,
  maxDebugBufferLen: Count,
  maxMemoryPages: v.pipe(Count, v.maxValue(255)),
  assetStringLimit: Count,
  logLevel: v.picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  logPretty: v.boolean(),
});

export type SandboxConfig = v.InferOutput<typeof ConfigSchema>;

export const defaultConfig = (): SandboxConfig => ({
  defaultActor: DEFAULT_ACCOUNT,
  genesisBalances: [[DEFAULT_ACCOUNT, INIT_AMOUNT]],
  genesisTimestamp: 0n,
  blockTimeMs: 6_000n,
  existentialDeposit: 1n,
  gasLimit: { refTime: 100_000_000_000n, proofSize: 3n * 1024n * 1024n },
  maxCallDepth: 5,
  maxCodeLen: 123 * 1024,
  maxStorageKeyLen: 128,
  maxDebugBufferLen: 2 * 1024 * 1024,
  maxMemoryPages: 16,
  assetStringLimit: 50,
  logLevel: "warn",
  logPretty: false,
});

type Env = Record<string, string | undefined>;

const fromEnv = (env: Env, issues: string[]): Record<string, unknown> => {
  const out: Record<string, unknown> = {};
  const big = (name: string, key: string) => {
    const raw = env[name];
    if (raw === undefined || raw === "") return;
    try {
      out[key] = BigInt(raw);
    } catch {
      issues.push(`${name}: not an integer (${raw})`);
    }
  };
  if (env.LOG_LEVEL) out.logLevel = env.LOG_LEVEL;
  if (env.SANDBOX_LOG_PRETTY) out.logPretty = env.SANDBOX_LOG_PRETTY === "1";
  big("SANDBOX_BLOCK_TIME_MS", "blockTimeMs");
  big("SANDBOX_GENESIS_TIMESTAMP", "genesisTimestamp");
  return out;
};

/**
 * Defaults, then environment, then explicit overrides. Throws ConfigError
 * listing every invalid path.
 */
export const resolveConfig = (
  overrides: Partial<SandboxConfig> = {},
  env: Env = process.env,
): SandboxConfig => {
  const issues: string[] = [];
  const merged = { ...defaultConfig(), ...fromEnv(env, issues), ...overrides };
  const parsed = v.safeParse(ConfigSchema, merged);
  if (!parsed.success) {
    for (const issue of parsed.issues) {
      issues.push(`${v.getDotPath(issue) ?? "config"}: ${issue.message}`);
    }
  }
  if (issues.length > 0 || !parsed.success) throw new ConfigError(issues);
  return parsed.output;
};
