import type { Address, DispatchError, TrapInfo } from "../core/types";
import type { ILogger } from "../logging";
import type { GasMeter } from "../vm/gas";

/** Chain limits the engine enforces. */
export type EngineLimits = {
  maxCallDepth: number;
  maxCodeLen: number;
  maxStorageKeyLen: number;
  maxDebugBufferLen: number;
  maxMemoryPages: number;
};

/** One activation on the call stack. */
export type Frame = {
  address: Address;
  caller: Address;
  value: bigint;
  input: Uint8Array;
  depth: number;
};

/**
 * How a frame ended. `fail` means the frame never ran (missing contract,
 * failed endowment); `abort` tears down every frame above it too.
 */
export type FrameResult =
  | { kind: "return"; flags: number; data: Uint8Array }
  | { kind: "trap"; trap: TrapInfo }
  | { kind: "abort"; error: DispatchError }
  | { kind: "fail"; error: DispatchError };

/** Debug output of one top-level call, capped in total bytes. */
export class DebugBuffer {
  readonly messages: string[] = [];
  private bytes = 0;

  constructor(
    private readonly limit: number,
    private readonly logger?: ILogger,
  ) {}

  push(message: string, size: number): void {
    if (this.bytes + size > this.limit) {
      this.logger?.warn({ limit: this.limit }, "debug buffer full, message dropped");
      return;
    }
    this.bytes += size;
    this.messages.push(message);
    this.logger?.debug({ message }, "contract debug message");
  }
}

/** Everything shared by the frames of one top-level call. */
export type CallStack = { gas: GasMeter; debug: DebugBuffer };
