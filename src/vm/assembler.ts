import { selectorOf } from "../codec/abi";
import { AssemblyError } from "../errors";
import { hexToBytes, uintToBytes, utf8 } from "../utils/bytes";
import { type ExportEntry, PAGE_SIZE, encodeProgram } from "./format";
import { Op, WORD_MASK, hostId, opcodeOf } from "./opcodes";

/*
 * Text form of a program, one statement per line, `;` starts a comment.
 *
 *   .memory 2                   memory pages (default 1)
 *   .data NAME "text"           data segments, laid out from address 0
 *   .data NAME 0xc0ffee
 *   .data NAME zero 32
 *   .export flip LABEL          selector = keccak("flip")[0..4]
 *   .export 0x9bae9d5e LABEL    explicit selector
 *   .byte 0xff                  raw byte in the code stream
 *   LABEL:
 *   push 42 | push @NAME | push #NAME | push LABEL
 *   jump LABEL | jumpi LABEL
 *   dup N | swap N | mload W | mstore W | host NAME
 *   pop stop unreachable add sub mul div mod lt gt eq iszero and or xor
 */

type Operand =
  | { kind: "none" }
  | { kind: "imm"; value: bigint }
  | { kind: "label"; name: string }
  | { kind: "raw" };

type Stmt = { line: number; op: number; operand: Operand; size: number };

type DataSeg = { offset: number; bytes: Uint8Array };

const BYTE_OPERAND = new Set<number>([Op.DUP, Op.SWAP, Op.MLOAD, Op.MSTORE]);
const NO_OPERAND = new Set<number>([
  Op.UNREACHABLE,
  Op.STOP,
  Op.POP,
  Op.ADD,
  Op.SUB,
  Op.MUL,
  Op.DIV,
  Op.MOD,
  Op.LT,
  Op.GT,
  Op.EQ,
  Op.ISZERO,
  Op.AND,
  Op.OR,
  Op.XOR,
]);

const LABEL_RE = /^[A-Za-z_][A-Za-z0-9_.]*$/;

const stripComment = (line: string): string => {
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (c === '"' && line[i - 1] !== "\\") quoted = !quoted;
    if (c === ";" && !quoted) return line.slice(0, i);
  }
  return line;
};

const parseInt256 = (tok: string, line: number): bigint => {
  if (!/^(0x[0-9a-fA-F]+|[0-9]+)$/.test(tok)) throw new AssemblyError(`bad number ${tok}`, line);
  const v = BigInt(tok);
  if (v > WORD_MASK) throw new AssemblyError(`${tok} does not fit in a word`, line);
  return v;
};

const byteLength = (v: bigint): number => {
  let n = 1;
  while (v >> BigInt(8 * n) > 0n) n++;
  return n;
};

const pushSize = (v: bigint): number => (v < 0x100n ? 2 : v <= 0xffff_ffffn ? 5 : 2 + byteLength(v));

const parseData = (rest: string, line: number): Uint8Array => {
  if (rest.startsWith('"')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rest);
    } catch {
      throw new AssemblyError(`bad string literal ${rest}`, line);
    }
    if (typeof parsed !== "string") throw new AssemblyError(`bad string literal ${rest}`, line);
    return utf8(parsed);
  }
  const zero = /^zero\s+(\d+)$/.exec(rest);
  if (zero) return new Uint8Array(Number(zero[1]));
  if (/^0x([0-9a-fA-F]{2})*$/.test(rest)) return hexToBytes(rest);
  throw new AssemblyError(`bad data value ${rest}`, line);
};

/** Assembles source text into a program blob. Throws AssemblyError. */
export const assemble = (source: string): Uint8Array => {
  let memoryPages = 1;
  const data = new Map<string, DataSeg>();
  let dataEnd = 0;
  const exportsDecl: { line: number; selector: Uint8Array; label: string }[] = [];
  const labels = new Map<string, number>();
  const stmts: Stmt[] = [];

  /* ── pass 1: directives, data layout ───────────────────── */
  const lines = source.split(/\r?\n/);
  const body: { line: number; text: string }[] = [];
  lines.forEach((raw, i) => {
    const line = i + 1;
    const text = stripComment(raw).trim();
    if (text === "") return;
    if (!text.startsWith(".")) {
      body.push({ line, text });
      return;
    }
    const [directive, ...args] = text.split(/\s+/);
    switch (directive) {
      case ".memory": {
        const n = Number(args[0]);
        if (!Number.isInteger(n) || n < 1 || n > 255) {
          throw new AssemblyError(`bad page count ${args[0]}`, line);
        }
        memoryPages = n;
        break;
      }
      case ".data": {
        const m = /^\.data\s+(\S+)\s+(.+)$/.exec(text);
        const name = m?.[1];
        if (!m || !name || !LABEL_RE.test(name)) throw new AssemblyError("bad data name", line);
        if (data.has(name)) throw new AssemblyError(`duplicate data ${name}`, line);
        const bytes = parseData(m[2], line);
        data.set(name, { offset: dataEnd, bytes });
        dataEnd += bytes.length;
        break;
      }
      case ".export": {
        const [sel, label] = args;
        if (!sel || !label || args.length !== 2) {
          throw new AssemblyError(".export takes a selector and a label", line);
        }
        const selector = /^0x[0-9a-fA-F]{8}$/.test(sel) ? hexToBytes(sel) : selectorOf(sel);
        exportsDecl.push({ line, selector, label });
        break;
      }
      case ".byte":
        body.push({ line, text });
        break;
      default:
        throw new AssemblyError(`unknown directive ${directive}`, line);
    }
  });
  if (dataEnd > memoryPages * PAGE_SIZE) {
    throw new AssemblyError(`data needs more than ${memoryPages} page(s)`, lines.length);
  }

  const dataRef = (tok: string, line: number): bigint => {
    const seg = data.get(tok.slice(1));
    if (!seg) throw new AssemblyError(`unknown data ${tok.slice(1)}`, line);
    return BigInt(tok.startsWith("@") ? seg.offset : seg.bytes.length);
  };

  /* ── pass 2: sizes and label addresses ─────────────────── */
  let pc = 0;
  for (const { line, text } of body) {
    let stmt = text;
    const labelled = /^([A-Za-z_][A-Za-z0-9_.]*):\s*(.*)$/.exec(stmt);
    if (labelled) {
      const name = labelled[1];
      if (labels.has(name)) throw new AssemblyError(`duplicate label ${name}`, line);
      labels.set(name, pc);
      stmt = labelled[2];
      if (stmt === "") continue;
    }
    const [mnemonic, ...ops] = stmt.split(/\s+/);
    const operandTok = ops[0];
    if (ops.length > 1) throw new AssemblyError(`too many operands for ${mnemonic}`, line);

    if (mnemonic === ".byte") {
      if (!operandTok) throw new AssemblyError(".byte needs a value", line);
      const v = parseInt256(operandTok, line);
      if (v > 0xffn) throw new AssemblyError(`${operandTok} is not a byte`, line);
      stmts.push({ line, op: Number(v), operand: { kind: "raw" }, size: 1 });
      pc += 1;
      continue;
    }

    const lower = mnemonic.toLowerCase();
    if (lower === "push") {
      if (!operandTok) throw new AssemblyError("push needs an operand", line);
      if (operandTok.startsWith("@") || operandTok.startsWith("#")) {
        const value = dataRef(operandTok, line);
        stmts.push({ line, op: Op.PUSH, operand: { kind: "imm", value }, size: pushSize(value) });
      } else if (LABEL_RE.test(operandTok)) {
        stmts.push({ line, op: Op.PUSH32, operand: { kind: "label", name: operandTok }, size: 5 });
      } else {
        const value = parseInt256(operandTok, line);
        stmts.push({ line, op: Op.PUSH, operand: { kind: "imm", value }, size: pushSize(value) });
      }
      pc += stmts[stmts.length - 1].size;
      continue;
    }

    const op = opcodeOf(lower);
    if (op === undefined || op === Op.PUSH || op === Op.PUSH8 || op === Op.PUSH32) {
      throw new AssemblyError(`unknown instruction ${mnemonic}`, line);
    }
    if (op === Op.JUMP || op === Op.JUMPI) {
      if (!operandTok || !LABEL_RE.test(operandTok)) throw new AssemblyError(`${lower} needs a label`, line);
      stmts.push({ line, op, operand: { kind: "label", name: operandTok }, size: 5 });
      pc += 5;
    } else if (op === Op.HOST) {
      const id = operandTok === undefined ? undefined : hostId(operandTok);
      if (id === undefined) throw new AssemblyError(`unknown host function ${operandTok ?? ""}`, line);
      stmts.push({ line, op, operand: { kind: "imm", value: BigInt(id) }, size: 2 });
      pc += 2;
    } else if (BYTE_OPERAND.has(op)) {
      if (!operandTok) throw new AssemblyError(`${lower} needs an operand`, line);
      const v = parseInt256(operandTok, line);
      if (v > 0xffn) throw new AssemblyError(`${operandTok} is not a byte`, line);
      stmts.push({ line, op, operand: { kind: "imm", value: v }, size: 2 });
      pc += 2;
    } else if (NO_OPERAND.has(op)) {
      if (operandTok) throw new AssemblyError(`${lower} takes no operand`, line);
      stmts.push({ line, op, operand: { kind: "none" }, size: 1 });
      pc += 1;
    } else {
      throw new AssemblyError(`unsupported instruction ${mnemonic}`, line);
    }
  }

  /* ── pass 3: emit ──────────────────────────────────────── */
  const resolve = (name: string, line: number): number => {
    const addr = labels.get(name);
    if (addr === undefined) throw new AssemblyError(`unknown label ${name}`, line);
    return addr;
  };

  const code = new Uint8Array(pc);
  let at = 0;
  for (const s of stmts) {
    const { operand } = s;
    switch (operand.kind) {
      case "raw":
      case "none":
        code[at] = s.op;
        break;
      case "label":
        code[at] = s.op;
        code.set(uintToBytes(BigInt(resolve(operand.name, s.line)), 4), at + 1);
        break;
      case "imm":
        if (s.op !== Op.PUSH) {
          code[at] = s.op;
          code[at + 1] = Number(operand.value);
        } else if (s.size === 2) {
          code[at] = Op.PUSH8;
          code[at + 1] = Number(operand.value);
        } else if (s.size === 5) {
          code[at] = Op.PUSH32;
          code.set(uintToBytes(operand.value, 4), at + 1);
        } else {
          const len = s.size - 2;
          code[at] = Op.PUSH;
          code[at + 1] = len;
          code.set(uintToBytes(operand.value, len), at + 2);
        }
        break;
    }
    at += s.size;
  }

  const exports: ExportEntry[] = exportsDecl.map((e) => ({
    selector: e.selector,
    offset: resolve(e.label, e.line),
  }));
  const image = new Uint8Array(dataEnd);
  for (const seg of data.values()) image.set(seg.bytes, seg.offset);

  return encodeProgram({ memoryPages, exports, data: image, code });
};
