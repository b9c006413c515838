/* ── instruction set ─────────────────────────────────────── */
export const Op = {
  UNREACHABLE: 0x00,
  STOP: 0x01,
  PUSH8: 0x02,
  PUSH32: 0x03,
  PUSH: 0x04,
  POP: 0x05,
  DUP: 0x06,
  SWAP: 0x07,
  ADD: 0x10,
  SUB: 0x11,
  MUL: 0x12,
  DIV: 0x13,
  MOD: 0x14,
  LT: 0x15,
  GT: 0x16,
  EQ: 0x17,
  ISZERO: 0x18,
  AND: 0x19,
  OR: 0x1a,
  XOR: 0x1b,
  JUMP: 0x20,
  JUMPI: 0x21,
  MLOAD: 0x30,
  MSTORE: 0x31,
  HOST: 0x40,
} as const;

export type OpName = keyof typeof Op;

const isOpName = (s: string): s is OpName => s in Op;

/** Opcode for an assembler mnemonic such as `push8` or `jumpi`. */
export const opcodeOf = (mnemonic: string): number | undefined => {
  const name = mnemonic.toUpperCase();
  return isOpName(name) ? Op[name] : undefined;
};

/**
 * Immediate bytes following the opcode at `pc`, or undefined when the
 * immediate runs past the end of `code`.
 */
export const immediateSize = (code: Uint8Array, pc: number): number | undefined => {
  let size: number;
  switch (code[pc]) {
    case Op.PUSH8:
    case Op.DUP:
    case Op.SWAP:
    case Op.MLOAD:
    case Op.MSTORE:
    case Op.HOST:
      size = 1;
      break;
    case Op.PUSH32:
    case Op.JUMP:
    case Op.JUMPI:
      size = 4;
      break;
    case Op.PUSH: {
      if (pc + 1 >= code.length) return undefined;
      size = 1 + code[pc + 1];
      break;
    }
    default:
      size = 0;
  }
  return pc + 1 + size <= code.length ? size : undefined;
};

export const WORD_BITS = 256n;
export const WORD_MASK = (1n << WORD_BITS) - 1n;
export const MAX_STACK = 1024;

/* ── host functions ──────────────────────────────────────── */
export const HOST_FUNCTIONS = [
  { name: "input_size", args: 0, results: 1 },
  { name: "input_copy", args: 3, results: 0 },
  { name: "return", args: 3, results: 0 },
  { name: "storage_get", args: 4, results: 1 },
  { name: "storage_set", args: 4, results: 1 },
  { name: "storage_clear", args: 2, results: 1 },
  { name: "storage_contains", args: 2, results: 1 },
  { name: "caller", args: 1, results: 0 },
  { name: "address", args: 1, results: 0 },
  { name: "value_transferred", args: 0, results: 1 },
  { name: "balance", args: 0, results: 1 },
  { name: "balance_of", args: 1, results: 1 },
  { name: "block_number", args: 0, results: 1 },
  { name: "now", args: 0, results: 1 },
  { name: "deposit_event", args: 4, results: 0 },
  { name: "debug_message", args: 2, results: 0 },
  { name: "transfer", args: 2, results: 1 },
  { name: "call", args: 7, results: 2 },
  { name: "instantiate", args: 8, results: 1 },
  { name: "call_runtime", args: 2, results: 1 },
  { name: "hash_keccak_256", args: 3, results: 0 },
] as const;

export type HostName = (typeof HOST_FUNCTIONS)[number]["name"];

export const hostId = (name: string): number | undefined => {
  const id = HOST_FUNCTIONS.findIndex((f) => f.name === name);
  return id < 0 ? undefined : id;
};

/** Returned by storage lookups when the key is absent. */
export const SENTINEL_NONE = 0xffff_ffffn;

/** Codes a nested call or instantiate hands back to its caller. */
export const ReturnCode = {
  Success: 0,
  CalleeTrapped: 1,
  CalleeReverted: 2,
  TransferFailed: 5,
  CodeNotFound: 7,
  NotCallable: 8,
} as const;

/* ── gas schedule ────────────────────────────────────────── */
export const Cost = {
  instruction: 1_000n,
  hostBase: 10_000n,
  hostPerByte: 100n,
  nestedBase: 200_000n,
  proofPerStorageItem: 64n,
} as const;
