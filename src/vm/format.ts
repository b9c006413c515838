import { err, ok, type Result } from "../core/result";
import type { Hex } from "../types/brands";
import { bytesEqual, bytesToHex, bytesToUint, concatBytes, uintToBytes } from "../utils/bytes";
import { immediateSize } from "./opcodes";

/*
 * Program blob layout
 *
 *   magic "\0ctr" | version u8 | memory pages u8
 *   export count u8 | { selector [4] | code offset u32 } * count
 *   data length u32 | data
 *   code
 *
 * All multi-byte integers are big-endian.
 */

export const MAGIC = Uint8Array.of(0x00, 0x63, 0x74, 0x72);
export const VERSION = 1;
export const PAGE_SIZE = 4096;

export type ExportEntry = { selector: Uint8Array; offset: number };

export type Program = {
  memoryPages: number;
  exports: ReadonlyMap<Hex, number>;
  data: Uint8Array;
  code: Uint8Array;
  /** 1 at every offset where an instruction starts. */
  boundaries: Uint8Array;
};

export type ProgramSource = {
  memoryPages: number;
  exports: readonly ExportEntry[];
  data: Uint8Array;
  code: Uint8Array;
};

export const encodeProgram = (p: ProgramSource): Uint8Array =>
  concatBytes(
    MAGIC,
    Uint8Array.of(VERSION, p.memoryPages, p.exports.length),
    ...p.exports.map((e) => concatBytes(e.selector, uintToBytes(BigInt(e.offset), 4))),
    uintToBytes(BigInt(p.data.length), 4),
    p.data,
    p.code,
  );

/** Marks instruction starts; undefined when an immediate is truncated. */
export const scanBoundaries = (code: Uint8Array): Uint8Array | undefined => {
  const marks = new Uint8Array(code.length);
  let pc = 0;
  while (pc < code.length) {
    const imm = immediateSize(code, pc);
    if (imm === undefined) return undefined;
    marks[pc] = 1;
    pc += 1 + imm;
  }
  return marks;
};

/** Validates a blob. The error string says what is wrong with it. */
export const parseProgram = (blob: Uint8Array, maxMemoryPages: number): Result<Program, string> => {
  let pos = 0;
  const take = (n: number): Uint8Array | undefined => {
    if (pos + n > blob.length) return undefined;
    const out = blob.subarray(pos, pos + n);
    pos += n;
    return out;
  };

  const magic = take(4);
  if (!magic || !bytesEqual(magic, MAGIC)) return err("bad magic");
  const head = take(3);
  if (!head) return err("truncated header");
  const [version, memoryPages, exportCount] = head;
  if (version !== VERSION) return err(`unsupported version ${version}`);
  if (memoryPages === 0 || memoryPages > maxMemoryPages) {
    return err(`memory pages ${memoryPages} outside 1..${maxMemoryPages}`);
  }

  const entries: ExportEntry[] = [];
  for (let i = 0; i < exportCount; i++) {
    const raw = take(8);
    if (!raw) return err("truncated export table");
    entries.push({ selector: raw.slice(0, 4), offset: Number(bytesToUint(raw.subarray(4))) });
  }

  const lenRaw = take(4);
  if (!lenRaw) return err("truncated data segment");
  const data = take(Number(bytesToUint(lenRaw)));
  if (!data) return err("truncated data segment");
  if (data.length > memoryPages * PAGE_SIZE) return err("data segment larger than memory");

  const code = blob.slice(pos);
  const boundaries = scanBoundaries(code);
  if (!boundaries) return err("truncated instruction");

  const exports = new Map<Hex, number>();
  for (const { selector, offset } of entries) {
    const key = bytesToHex(selector);
    if (exports.has(key)) return err(`duplicate export ${key}`);
    if (offset >= code.length || boundaries[offset] !== 1) {
      return err(`export ${key} does not point at an instruction`);
    }
    exports.set(key, offset);
  }

  return ok({ memoryPages, exports, data: data.slice(), code, boundaries });
};
