import * as v from "valibot";
import type { AbiValue } from "../codec/abi";
import type { DispatchError, TrapKind } from "../core/types";
import { ConfigError, SandboxError } from "../errors";
import { isContractsErr, toStatusCode } from "../runtime/errors";
import defaultTable from "./error-table.json";

/* ── classification ──────────────────────────────────────── */
export type UsageReason =
  | "BundleNotFound"
  | "ConstructorNotFound"
  | "MessageNotFound"
  | "ContractNotFound"
  | "LabelInUse"
  | "EncodingFailed";

export type SessionErrorKind =
  | { kind: "Module"; module: string; reason: string }
  | { kind: "Api"; code: number; name: string }
  | { kind: "Trap"; trap: TrapKind; message: string }
  | { kind: "ResourceExhausted"; resource: "gas" | "callDepth" }
  | { kind: "Reverted"; data: Uint8Array; value?: AbiValue }
  | { kind: "Decode"; message: string }
  | { kind: "Unknown"; code: number }
  | { kind: "Usage"; reason: UsageReason; message: string };

export const moduleError = (module: string, reason: string): SessionErrorKind => ({
  kind: "Module",
  module,
  reason,
});

export const unknownError = (code: number): SessionErrorKind => ({ kind: "Unknown", code });

const describe = (k: SessionErrorKind): string => {
  switch (k.kind) {
    case "Module":
      return `${k.module}.${k.reason}`;
    case "Api":
      return `${k.name} (status ${k.code})`;
    case "Trap":
      return `contract trapped: ${k.trap} (${k.message})`;
    case "ResourceExhausted":
      return `${k.resource} exhausted`;
    case "Reverted":
      return `contract reverted with ${k.data.length} byte(s)`;
    case "Decode":
      return `decode failed: ${k.message}`;
    case "Unknown":
      return `unknown status code ${k.code}`;
    case "Usage":
      return `${k.reason}: ${k.message}`;
  }
};

/**
 * Failure surfaced by the Session. `kind` is the comparable classification;
 * `dispatchError` keeps the raw ledger error when there was one.
 */
export class SessionError extends SandboxError {
  constructor(
    readonly kind: SessionErrorKind,
    readonly dispatchError?: DispatchError,
  ) {
    super(describe(kind));
  }
}

/* ── error table ─────────────────────────────────────────── */
const Named = v.object({ index: v.pipe(v.number(), v.integer()), name: v.string() });

const TableSchema = v.object({
  version: v.literal(1),
  modules: v.array(v.object({ ...Named.entries, errors: v.array(v.string()) })),
  variants: v.array(Named),
  token: v.array(v.string()),
  arithmetic: v.array(v.string()),
  transactional: v.array(v.string()),
});

type TableData = v.InferOutput<typeof TableSchema>;

/** Maps numeric status codes to module / API error names. */
export class ErrorTable {
  private constructor(private readonly data: TableData) {}

  static parse(json: unknown): ErrorTable {
    const parsed = v.safeParse(TableSchema, json);
    if (!parsed.success) {
      throw new ConfigError(parsed.issues.map((i) => `errorTable.${v.getDotPath(i) ?? ""}: ${i.message}`));
    }
    return new ErrorTable(parsed.output);
  }

  static default(): ErrorTable {
    return ErrorTable.parse(defaultTable);
  }

  get version(): number {
    return this.data.version;
  }

  moduleName(index: number): string | undefined {
    return this.data.modules.find((m) => m.index === index)?.name;
  }

  moduleError(index: number, error: number): { module: string; reason: string } | undefined {
    const mod = this.data.modules.find((m) => m.index === index);
    const reason = mod?.errors[error];
    return mod && reason ? { module: mod.name, reason } : undefined;
  }

  /** Classifies a u32 status code: byte 0 variant, byte 1 index, byte 2 error. */
  classify(code: number): SessionErrorKind {
    const variant = code & 0xff;
    const index = (code >>> 8) & 0xff;
    const error = (code >>> 16) & 0xff;
    if (!Number.isInteger(code) || code < 0 || code > 0xff_ff_ff) return unknownError(code);

    const name = this.data.variants.find((x) => x.index === variant)?.name;
    if (!name) return unknownError(code);

    const nested = (names: string[]): SessionErrorKind => {
      const sub = names[index];
      return sub && error === 0 ? { kind: "Api", code, name: `${name}.${sub}` } : unknownError(code);
    };
    switch (name) {
      case "Module": {
        const found = this.moduleError(index, error);
        return found ? { kind: "Module", ...found } : unknownError(code);
      }
      case "Token":
        return nested(this.data.token);
      case "Arithmetic":
        return nested(this.data.arithmetic);
      case "Transactional":
        return nested(this.data.transactional);
      default:
        return index === 0 && error === 0 ? { kind: "Api", code, name } : unknownError(code);
    }
  }

  /** Classifies a ledger error, singling out traps and resource exhaustion. */
  classifyDispatch(e: DispatchError): SessionErrorKind {
    if (e.kind === "Module" && e.trap && isContractsErr(e, "ContractTrapped")) {
      return { kind: "Trap", trap: e.trap.kind, message: e.trap.message };
    }
    if (isContractsErr(e, "OutOfGas")) return { kind: "ResourceExhausted", resource: "gas" };
    if (isContractsErr(e, "MaxCallDepthReached")) {
      return { kind: "ResourceExhausted", resource: "callDepth" };
    }
    return this.classify(toStatusCode(e));
  }
}
