import { type BlockHeader, encBlockHeader } from "../codec/rlp";
import { StateError } from "../errors";
import type { ILogger } from "../logging";
import type { Hex } from "../types/brands";
import { bytesToHex } from "../utils/bytes";
import { keccak } from "./hash";
import type { Ledger } from "./ledger";
import type { BlockContext } from "./types";

export const ZERO_HASH: Hex = bytesToHex(new Uint8Array(32));

/**
 * Advances the simulated chain. A block is "open" while operations run in
 * it; `buildBlock` seals it and opens the next one.
 */
export class BlockBuilder {
  constructor(
    private readonly ledger: Ledger,
    private readonly blockTimeMs: bigint,
    private readonly logger?: ILogger,
  ) {}

  /** Seals the open block and opens the next. Returns the new block number. */
  buildBlock(): bigint {
    const { store } = this.ledger;
    if (store.transactionDepth > 0) {
      throw new StateError("cannot build a block inside a transaction");
    }
    const header = this.openHeader();
    const hash = keccak(encBlockHeader(header));

    this.ledger.setBlockHash(header.number, hash);
    this.ledger.setBlockNumber(header.number + 1n);
    this.ledger.setTimestamp(header.timestamp + this.blockTimeMs);
    this.ledger.clearExtrinsics();
    store.resetEvents();

    this.logger?.debug(
      { block: header.number, hash: bytesToHex(hash), events: header.eventCount },
      "block sealed",
    );
    return header.number + 1n;
  }

  buildBlocks(count: number): bigint {
    let n = this.ledger.blockNumber();
    for (let i = 0; i < count; i++) n = this.buildBlock();
    return n;
  }

  blockContext(): BlockContext {
    return this.ledger.blockContext();
  }

  /** Hash of a sealed block; undefined for the open block and beyond. */
  blockHash(n: bigint): Hex | undefined {
    return this.ledger.blockHash(n);
  }

  private openHeader(): BlockHeader {
    const { number, timestamp } = this.ledger.blockContext();
    return {
      number,
      timestamp,
      parentHash: (number > 1n ? this.ledger.blockHash(number - 1n) : undefined) ?? ZERO_HASH,
      stateRoot: bytesToHex(this.ledger.store.stateRoot()),
      eventCount: this.ledger.store.eventCount,
      extrinsicCount: this.ledger.extrinsicCount(),
    };
  }
}
