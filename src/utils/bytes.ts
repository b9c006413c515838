import { concat, equals, fromString, toString } from "uint8arrays";
import type { Address, Hex } from "../types/brands";

export const ADDRESS_LENGTH = 32;

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toString(bytes, "base16")}`;

export const hexToBytes = (hex: string): Uint8Array => {
  const body = hex.startsWith("0x") ? hex.slice(2) : hex;
  if (body.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(body)) {
    throw new TypeError(`invalid hex string: ${hex}`);
  }
  return fromString(body.toLowerCase(), "base16");
};

export const isAddress = (value: string): value is Address =>
  /^0x[0-9a-f]{64}$/.test(value);

export const toAddress = (value: string | Uint8Array): Address => {
  const hex = typeof value === "string" ? value.toLowerCase() : bytesToHex(value);
  if (!isAddress(hex)) throw new TypeError(`not a 32-byte address: ${hex}`);
  return hex;
};

export const addressToBytes = (address: Address): Uint8Array => hexToBytes(address);

/** Account whose 32 bytes are all `fill`; handy for well-known test actors. */
export const filledAddress = (fill: number): Address =>
  bytesToHex(new Uint8Array(ADDRESS_LENGTH).fill(fill));

export const utf8 = (s: string): Uint8Array => fromString(s, "utf8");
export const fromUtf8 = (b: Uint8Array): string => toString(b, "utf8");

/** Like fromUtf8, but undefined when `b` is not well-formed UTF-8. */
export const fromUtf8Strict = (b: Uint8Array): string | undefined => {
  const text = fromUtf8(b);
  return equals(utf8(text), b) ? text : undefined;
};

export const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean => equals(a, b);
export const concatBytes = (...parts: Uint8Array[]): Uint8Array => concat(parts);

/** Unsigned big-endian encoding padded to `width` bytes. */
export const uintToBytes = (value: bigint, width: number): Uint8Array => {
  if (value < 0n || value >= 1n << BigInt(width * 8)) {
    throw new RangeError(`${value} does not fit in ${width} bytes`);
  }
  const out = new Uint8Array(width);
  let v = value;
  for (let i = width - 1; i >= 0; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
};

export const bytesToUint = (bytes: Uint8Array): bigint =>
  bytes.reduce((acc, b) => (acc << 8n) | BigInt(b), 0n);
