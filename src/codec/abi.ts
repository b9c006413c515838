import { CodecError } from "../errors";
import { keccak } from "../core/hash";
import {
  addressToBytes,
  bytesToUint,
  concatBytes,
  fromUtf8Strict,
  isAddress,
  toAddress,
  uintToBytes,
  utf8,
} from "../utils/bytes";

/* ── types ───────────────────────────────────────────────── */
export type ScalarType =
  | "bool"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "u128"
  | "i32"
  | "i64"
  | "address"
  | "string"
  | "bytes"
  | "status";

export type AbiType =
  | ScalarType
  | { vec: AbiType }
  | { option: AbiType }
  | { result: { ok: AbiType; err: AbiType } };

/**
 * Native values. Options decode to `null` or the inner value; results to
 * `{ ok }` / `{ err }`. Integers up to 32 bits decode as `number`, wider
 * ones as `bigint`.
 */
export type AbiValue =
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | null
  | AbiValue[]
  | { ok: AbiValue }
  | { err: AbiValue };

const WIDTH = {
  u8: 1,
  u16: 2,
  u32: 4,
  u64: 8,
  u128: 16,
  i32: 4,
  i64: 8,
  status: 4,
} as const;

type IntType = keyof typeof WIDTH;

const isInt = (t: ScalarType): t is IntType => t in WIDTH;
const isSigned = (t: IntType) => t === "i32" || t === "i64";
const asBigint = (t: IntType) => WIDTH[t] > 4;

export const typeName = (type: AbiType): string => {
  if (typeof type === "string") return type;
  if ("vec" in type) return `Vec<${typeName(type.vec)}>`;
  if ("option" in type) return `Option<${typeName(type.option)}>`;
  return `Result<${typeName(type.result.ok)}, ${typeName(type.result.err)}>`;
};

/** First four bytes of keccak-256 over the label. */
export const selectorOf = (label: string): Uint8Array => keccak(label).slice(0, 4);

/* ── encoding ────────────────────────────────────────────── */
const fail = (path: string, msg: string): never => {
  throw new CodecError(`${path}: ${msg}`);
};

const isRecord = (value: AbiValue): value is { ok: AbiValue } | { err: AbiValue } =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Uint8Array);

const encodeInt = (type: IntType, value: AbiValue, path: string): Uint8Array => {
  let n: bigint;
  if (typeof value === "bigint") n = value;
  else if (typeof value === "number" && Number.isInteger(value)) n = BigInt(value);
  else return fail(path, `expected an integer for ${type}`);

  const bits = BigInt(WIDTH[type] * 8);
  if (isSigned(type)) {
    const half = 1n << (bits - 1n);
    if (n < -half || n >= half) fail(path, `${n} out of range for ${type}`);
    if (n < 0n) n += 1n << bits;
  } else if (n < 0n || n >= 1n << bits) {
    fail(path, `${n} out of range for ${type}`);
  }
  return uintToBytes(n, WIDTH[type]);
};

const lengthPrefixed = (body: Uint8Array, path: string): Uint8Array => {
  if (body.length > 0xffff_ffff) fail(path, "too long");
  return concatBytes(uintToBytes(BigInt(body.length), 4), body);
};

const encodeAt = (type: AbiType, value: AbiValue, path: string): Uint8Array => {
  if (typeof type === "string") {
    if (isInt(type)) return encodeInt(type, value, path);
    switch (type) {
      case "bool":
        if (typeof value !== "boolean") return fail(path, "expected a boolean");
        return Uint8Array.of(value ? 1 : 0);
      case "address":
        if (typeof value === "string" && isAddress(value.toLowerCase())) {
          return addressToBytes(toAddress(value));
        }
        if (value instanceof Uint8Array && value.length === 32) return value.slice();
        return fail(path, "expected a 32-byte address");
      case "string":
        if (typeof value !== "string") return fail(path, "expected a string");
        return lengthPrefixed(utf8(value), path);
      case "bytes":
        if (!(value instanceof Uint8Array)) return fail(path, "expected bytes");
        return lengthPrefixed(value, path);
    }
  }
  if ("vec" in type) {
    if (!Array.isArray(value)) return fail(path, `expected an array for ${typeName(type)}`);
    const items = value.map((item, i) => encodeAt(type.vec, item, `${path}[${i}]`));
    return concatBytes(uintToBytes(BigInt(value.length), 4), ...items);
  }
  if ("option" in type) {
    if (value === null) return Uint8Array.of(0);
    return concatBytes(Uint8Array.of(1), encodeAt(type.option, value, `${path}?`));
  }
  if (!isRecord(value)) return fail(path, "expected { ok } or { err }");
  if ("ok" in value) return concatBytes(Uint8Array.of(0), encodeAt(type.result.ok, value.ok, `${path}.ok`));
  return concatBytes(Uint8Array.of(1), encodeAt(type.result.err, value.err, `${path}.err`));
};

export const encodeValue = (type: AbiType, value: AbiValue): Uint8Array =>
  encodeAt(type, value, "value");

export const encodeArgs = (types: readonly AbiType[], values: readonly AbiValue[]): Uint8Array => {
  if (types.length !== values.length) {
    throw new CodecError(`expected ${types.length} arguments, got ${values.length}`);
  }
  return concatBytes(...types.map((t, i) => encodeAt(t, values[i], `arg${i}`)));
};

/* ── decoding ────────────────────────────────────────────── */
class Reader {
  private pos = 0;

  constructor(private readonly buf: Uint8Array) {}

  take(n: number, path: string): Uint8Array {
    if (this.pos + n > this.buf.length) fail(path, "unexpected end of input");
    const out = this.buf.slice(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  byte(path: string): number {
    return this.take(1, path)[0];
  }

  u32(path: string): number {
    return Number(bytesToUint(this.take(4, path)));
  }

  finish(): void {
    const rest = this.buf.length - this.pos;
    if (rest !== 0) throw new CodecError(`${rest} trailing byte(s) after decoding`);
  }
}

const decodeAt = (type: AbiType, r: Reader, path: string): AbiValue => {
  if (typeof type === "string") {
    if (isInt(type)) {
      const width = WIDTH[type];
      let n = bytesToUint(r.take(width, path));
      if (isSigned(type) && n >= 1n << BigInt(width * 8 - 1)) n -= 1n << BigInt(width * 8);
      return asBigint(type) ? n : Number(n);
    }
    switch (type) {
      case "bool": {
        const b = r.byte(path);
        if (b > 1) fail(path, `invalid bool byte ${b}`);
        return b === 1;
      }
      case "address":
        return toAddress(r.take(32, path));
      case "string": {
        const text = fromUtf8Strict(r.take(r.u32(path), path));
        return text ?? fail(path, "invalid utf-8");
      }
      case "bytes":
        return r.take(r.u32(path), path);
    }
  }
  if ("vec" in type) {
    const count = r.u32(path);
    const out: AbiValue[] = [];
    for (let i = 0; i < count; i++) out.push(decodeAt(type.vec, r, `${path}[${i}]`));
    return out;
  }
  const tag = r.byte(path);
  if ("option" in type) {
    if (tag === 0) return null;
    if (tag === 1) return decodeAt(type.option, r, `${path}?`);
    return fail(path, `invalid option tag ${tag}`);
  }
  if (tag === 0) return { ok: decodeAt(type.result.ok, r, `${path}.ok`) };
  if (tag === 1) return { err: decodeAt(type.result.err, r, `${path}.err`) };
  return fail(path, `invalid result tag ${tag}`);
};

/** Decodes one value; the buffer must be consumed exactly. */
export const decodeValue = (type: AbiType, bytes: Uint8Array): AbiValue => {
  const r = new Reader(bytes);
  const value = decodeAt(type, r, "value");
  r.finish();
  return value;
};

export const decodeArgs = (types: readonly AbiType[], bytes: Uint8Array): AbiValue[] => {
  const r = new Reader(bytes);
  const values = types.map((t, i) => decodeAt(t, r, `arg${i}`));
  r.finish();
  return values;
};
