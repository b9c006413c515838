import * as v from "valibot";
import { type AbiType, type ScalarType, selectorOf } from "../codec/abi";
import { BundleError } from "../errors";
import type { Hex } from "../types/brands";
import { bytesToHex, hexToBytes } from "../utils/bytes";

/* ── schema ──────────────────────────────────────────────── */
const SCALARS: ScalarType[] = [
  "bool",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "i32",
  "i64",
  "address",
  "string",
  "bytes",
  "status",
];

const AbiTypeSchema: v.GenericSchema<AbiType> = v.lazy(() =>
  v.union([
    v.picklist(SCALARS),
    v.strictObject({ vec: AbiTypeSchema }),
    v.strictObject({ option: AbiTypeSchema }),
    v.strictObject({ result: v.strictObject({ ok: AbiTypeSchema, err: AbiTypeSchema }) }),
  ]),
);

const SelectorSchema = v.pipe(
  v.string(),
  v.regex(/^0x[0-9a-fA-F]{8}$/, "selector must be 4 bytes of hex"),
  v.transform((s): Hex => bytesToHex(hexToBytes(s))),
);

const ArgSchema = v.object({ label: v.string(), type: AbiTypeSchema });

const ConstructorSchema = v.object({
  label: v.pipe(v.string(), v.minLength(1)),
  selector: v.optional(SelectorSchema),
  args: v.optional(v.array(ArgSchema), []),
  payable: v.optional(v.boolean(), false),
  errorType: v.optional(AbiTypeSchema),
});

const MessageSchema = v.object({
  ...ConstructorSchema.entries,
  mutates: v.optional(v.boolean(), false),
  returnType: v.optional(AbiTypeSchema),
});

const EventSchema = v.object({
  label: v.string(),
  fields: v.optional(v.array(ArgSchema), []),
});

const MetadataSchema = v.object({
  name: v.pipe(v.string(), v.minLength(1)),
  version: v.optional(v.string(), "0.0.0"),
  constructors: v.array(ConstructorSchema),
  messages: v.array(MessageSchema),
  events: v.optional(v.array(EventSchema), []),
});

/* ── resolved types ──────────────────────────────────────── */
export type ArgSpec = { label: string; type: AbiType };

export type ConstructorSpec = {
  label: string;
  selector: Hex;
  args: ArgSpec[];
  payable: boolean;
  /** Declared error payload of a reverted call; `status` means a u32 API code. */
  errorType?: AbiType;
};

export type MessageSpec = ConstructorSpec & {
  mutates: boolean;
  returnType?: AbiType;
};

/** Event data starts with the event's index in this list, then its fields. */
export type EventSpec = { label: string; fields: ArgSpec[] };

export type ContractMetadata = {
  name: string;
  version: string;
  constructors: ConstructorSpec[];
  messages: MessageSpec[];
  events: EventSpec[];
};

const withSelector = <T extends { label: string; selector?: Hex }>(
  entry: T,
): T & { selector: Hex } => ({ ...entry, selector: entry.selector ?? bytesToHex(selectorOf(entry.label)) });

/**
 * Validates metadata JSON. A constructor or message without a selector gets
 * the first four bytes of keccak-256 over its label.
 */
export const parseMetadata = (json: unknown): ContractMetadata => {
  const parsed = v.safeParse(MetadataSchema, json);
  if (!parsed.success) {
    const issues = parsed.issues.map((i) => `${v.getDotPath(i) ?? "metadata"}: ${i.message}`);
    throw new BundleError(`invalid contract metadata: ${issues.join("; ")}`);
  }
  const meta = parsed.output;
  const constructors = meta.constructors.map(withSelector);
  const messages = meta.messages.map(withSelector);

  const seen = new Set<Hex>();
  for (const entry of [...constructors, ...messages]) {
    if (seen.has(entry.selector)) {
      throw new BundleError(`${meta.name}: duplicate selector ${entry.selector} (${entry.label})`);
    }
    seen.add(entry.selector);
  }
  return { ...meta, constructors, messages };
};

export const findConstructor = (meta: ContractMetadata, label: string): ConstructorSpec | undefined =>
  meta.constructors.find((c) => c.label === label);

export const findMessage = (meta: ContractMetadata, label: string): MessageSpec | undefined =>
  meta.messages.find((m) => m.label === label);
