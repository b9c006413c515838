import type { DispatchError, TrapInfo } from "../core/types";
import type { Hex } from "../types/brands";
import { VmAbort, VmTrap } from "./faults";
import { PAGE_SIZE, type Program } from "./format";
import type { GasMeter } from "./gas";
import { Memory } from "./memory";
import { Cost, HOST_FUNCTIONS, type HostName, MAX_STACK, Op, WORD_MASK } from "./opcodes";

export type Exit =
  | { kind: "return"; flags: number; data: Uint8Array }
  | { kind: "trap"; trap: TrapInfo }
  | { kind: "abort"; error: DispatchError };

export type HostResult =
  | { results: bigint[] }
  | { halt: { flags: number; data: Uint8Array } };

/** Environment functions reachable through the `host` instruction. */
export interface Host {
  invoke(name: HostName, args: bigint[], memory: Memory): HostResult;
}

const EMPTY_RETURN: Exit = { kind: "return", flags: 0, data: new Uint8Array(0) };

const readImm = (code: Uint8Array, from: number, len: number): bigint => {
  let v = 0n;
  for (let i = 0; i < len; i++) v = (v << 8n) | BigInt(code[from + i]);
  return v;
};

const binary: Partial<Record<number, (a: bigint, b: bigint) => bigint>> = {
  [Op.ADD]: (a, b) => a + b,
  [Op.SUB]: (a, b) => a - b,
  [Op.MUL]: (a, b) => a * b,
  [Op.LT]: (a, b) => (a < b ? 1n : 0n),
  [Op.GT]: (a, b) => (a > b ? 1n : 0n),
  [Op.EQ]: (a, b) => (a === b ? 1n : 0n),
  [Op.AND]: (a, b) => a & b,
  [Op.OR]: (a, b) => a | b,
  [Op.XOR]: (a, b) => a ^ b,
};

/**
 * Runs the export registered under `selector` until it returns, traps or
 * aborts. Every instruction is charged before it executes.
 */
export const execute = (program: Program, selector: Hex, gas: GasMeter, host: Host): Exit => {
  const entry = program.exports.get(selector);
  if (entry === undefined) {
    return {
      kind: "trap",
      trap: { kind: "EntryPointNotFound", message: `no export for selector ${selector}`, pc: 0 },
    };
  }

  const { code, boundaries } = program;
  const memory = new Memory(program.memoryPages * PAGE_SIZE, program.data);
  const stack: bigint[] = [];

  const pop = (): bigint => {
    const v = stack.pop();
    if (v === undefined) throw new VmTrap("StackUnderflow", "pop from an empty stack");
    return v;
  };
  const push = (v: bigint): void => {
    if (stack.length >= MAX_STACK) throw new VmTrap("StackOverflow", `stack exceeds ${MAX_STACK}`);
    stack.push(v & WORD_MASK);
  };
  const jumpTarget = (target: bigint): number => {
    if (target >= BigInt(code.length) || boundaries[Number(target)] !== 1) {
      throw new VmTrap("InvalidJump", `jump to ${target} is not an instruction boundary`);
    }
    return Number(target);
  };
  const width = (w: number): number => {
    if (w < 1 || w > 32) throw new VmTrap("InvalidOpcode", `memory width ${w} outside 1..32`);
    return w;
  };

  let pc = entry;
  let at = entry;
  try {
    for (;;) {
      if (pc >= code.length) return EMPTY_RETURN;
      at = pc;
      gas.charge(Cost.instruction);
      const op = code[pc];

      const fn = binary[op];
      if (fn) {
        const b = pop();
        const a = pop();
        push(fn(a, b));
        pc += 1;
        continue;
      }

      switch (op) {
        case Op.UNREACHABLE:
          throw new VmTrap("Unreachable", "unreachable instruction executed");
        case Op.STOP:
          return EMPTY_RETURN;
        case Op.PUSH8:
          push(BigInt(code[pc + 1]));
          pc += 2;
          break;
        case Op.PUSH32:
          push(readImm(code, pc + 1, 4));
          pc += 5;
          break;
        case Op.PUSH: {
          const len = code[pc + 1];
          push(readImm(code, pc + 2, len));
          pc += 2 + len;
          break;
        }
        case Op.POP:
          pop();
          pc += 1;
          break;
        case Op.DUP: {
          const n = code[pc + 1];
          if (n < 1) throw new VmTrap("InvalidOpcode", "dup 0");
          const v = stack[stack.length - n];
          if (v === undefined) throw new VmTrap("StackUnderflow", `dup ${n} on ${stack.length} items`);
          push(v);
          pc += 2;
          break;
        }
        case Op.SWAP: {
          const n = code[pc + 1];
          if (n < 1) throw new VmTrap("InvalidOpcode", "swap 0");
          const top = stack.length - 1;
          const other = top - n;
          if (other < 0) throw new VmTrap("StackUnderflow", `swap ${n} on ${stack.length} items`);
          [stack[top], stack[other]] = [stack[other], stack[top]];
          pc += 2;
          break;
        }
        case Op.DIV:
        case Op.MOD: {
          const b = pop();
          const a = pop();
          if (b === 0n) throw new VmTrap("DivisionByZero", op === Op.DIV ? "div by zero" : "mod by zero");
          push(op === Op.DIV ? a / b : a % b);
          pc += 1;
          break;
        }
        case Op.ISZERO:
          push(pop() === 0n ? 1n : 0n);
          pc += 1;
          break;
        case Op.JUMP:
          pc = jumpTarget(readImm(code, pc + 1, 4));
          break;
        case Op.JUMPI: {
          const target = readImm(code, pc + 1, 4);
          pc = pop() !== 0n ? jumpTarget(target) : pc + 5;
          break;
        }
        case Op.MLOAD: {
          const w = width(code[pc + 1]);
          push(memory.load(pop(), w));
          pc += 2;
          break;
        }
        case Op.MSTORE: {
          const w = width(code[pc + 1]);
          const value = pop();
          memory.store(pop(), w, value);
          pc += 2;
          break;
        }
        case Op.HOST: {
          const fn = HOST_FUNCTIONS[code[pc + 1]];
          if (!fn) throw new VmTrap("HostError", `unknown host function ${code[pc + 1]}`);
          gas.charge(Cost.hostBase);
          const args: bigint[] = [];
          for (let i = 0; i < fn.args; i++) args.unshift(pop());
          const out = host.invoke(fn.name, args, memory);
          if ("halt" in out) return { kind: "return", ...out.halt };
          for (const r of out.results) push(r);
          pc += 2;
          break;
        }
        default:
          throw new VmTrap("InvalidOpcode", `invalid opcode 0x${op.toString(16).padStart(2, "0")}`);
      }
    }
  } catch (e) {
    if (e instanceof VmTrap) return { kind: "trap", trap: { kind: e.kind, message: e.message, pc: at } };
    if (e instanceof VmAbort) return { kind: "abort", error: e.error };
    throw e;
  }
};
