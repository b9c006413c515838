import { VmTrap } from "./faults";

/** Byte-addressed linear memory. Out-of-range access traps. */
export class Memory {
  readonly bytes: Uint8Array;

  constructor(size: number, init: Uint8Array = new Uint8Array(0)) {
    this.bytes = new Uint8Array(size);
    this.bytes.set(init);
  }

  get size(): number {
    return this.bytes.length;
  }

  private range(ptr: bigint, len: bigint): [number, number] {
    if (ptr < 0n || len < 0n || ptr + len > BigInt(this.bytes.length)) {
      throw new VmTrap("MemoryOutOfBounds", `access [${ptr}, +${len}) outside ${this.bytes.length} bytes`);
    }
    return [Number(ptr), Number(ptr + len)];
  }

  read(ptr: bigint, len: bigint): Uint8Array {
    const [start, end] = this.range(ptr, len);
    return this.bytes.slice(start, end);
  }

  write(ptr: bigint, data: Uint8Array): void {
    const [start] = this.range(ptr, BigInt(data.length));
    this.bytes.set(data, start);
  }

  /** Big-endian unsigned load of `width` bytes. */
  load(ptr: bigint, width: number): bigint {
    return this.read(ptr, BigInt(width)).reduce((acc, b) => (acc << 8n) | BigInt(b), 0n);
  }

  /** Big-endian store of the low `width` bytes of `value`. */
  store(ptr: bigint, width: number, value: bigint): void {
    const out = new Uint8Array(width);
    let v = value;
    for (let i = width - 1; i >= 0; i--) {
      out[i] = Number(v & 0xffn);
      v >>= 8n;
    }
    this.write(ptr, out);
  }
}
