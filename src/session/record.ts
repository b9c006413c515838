import type { AbiValue } from "../codec/abi";
import type {
  Address,
  EventRecord,
  ExecutionOutcome,
  Hex,
  InstantiateReturnValue,
} from "../core/types";

/** A `Contracts.ContractEmitted` event, decoded against the emitter's metadata when possible. */
export type ContractEvent = {
  block: bigint;
  contract: Address;
  topics: Hex[];
  data: Uint8Array;
  label?: string;
  fields?: Record<string, AbiValue>;
};

export type EventBatch = { events: EventRecord[]; contractEvents: ContractEvent[] };

/** Everything a Session did, in order. Raw outcomes are kept as produced. */
export class SessionRecord {
  readonly deployResults: ExecutionOutcome<InstantiateReturnValue>[] = [];
  readonly callResults: ExecutionOutcome[] = [];
  readonly callReturns: AbiValue[] = [];
  readonly eventBatches: EventBatch[] = [];
  private readonly debug: string[] = [];

  pushDeploy(outcome: ExecutionOutcome<InstantiateReturnValue>, batch: EventBatch): void {
    this.deployResults.push(outcome);
    this.eventBatches.push(batch);
    this.debug.push(...outcome.debugMessages);
  }

  pushCall(outcome: ExecutionOutcome, batch: EventBatch): void {
    this.callResults.push(outcome);
    this.eventBatches.push(batch);
    this.debug.push(...outcome.debugMessages);
  }

  pushCallReturn(value: AbiValue): void {
    this.callReturns.push(value);
  }

  pushDispatch(batch: EventBatch): void {
    this.eventBatches.push(batch);
  }

  lastDeployResult(): ExecutionOutcome<InstantiateReturnValue> | undefined {
    return this.deployResults.at(-1);
  }

  lastCallResult(): ExecutionOutcome | undefined {
    return this.callResults.at(-1);
  }

  /** Decoded value of the last successful call, `undefined` before any. */
  lastCallReturn(): AbiValue | undefined {
    return this.callReturns.at(-1);
  }

  lastEventBatch(): EventBatch | undefined {
    return this.eventBatches.at(-1);
  }

  /** Contract events of every batch, oldest first. */
  contractEvents(): ContractEvent[] {
    return this.eventBatches.flatMap((b) => b.contractEvents);
  }

  debugMessages(): string[] {
    return [...this.debug];
  }
}
