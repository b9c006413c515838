import { compare } from "uint8arrays";
import { StateError } from "../errors";
import type { ILogger } from "../logging";
import { asSnapshotId, type SnapshotId } from "../types/brands";
import { bytesToHex, hexToBytes } from "../utils/bytes";
import { entriesRoot } from "./hash";
import type { Result } from "./result";
import type { Address, EventRecord } from "./types";

/** Writes the genesis accounts and block context into a freshly cleared store. */
export type GenesisWriter = (store: StateStore, balances: ReadonlyArray<[Address, bigint]>) => void;

type Snapshot = {
  readonly entries: ReadonlyMap<string, Uint8Array>;
  readonly events: readonly EventRecord[];
};

/* One open storage transaction: the first value seen for every key it
   touched (undefined = key was absent) plus the event log length. */
type Layer = { journal: Map<string, Uint8Array | undefined>; eventCount: number };

const detach = (record: EventRecord): EventRecord => {
  const { event } = record;
  if (event.module === "Contracts" && event.name === "ContractEmitted") {
    return { ...record, event: { ...event, topics: [...event.topics], data: event.data.slice() } };
  }
  return { ...record, event: { ...event } };
};

/**
 * In-memory externalities: the ledger's key/value state plus the pending
 * event log. Values are copied on the way in and on the way out, so a
 * captured snapshot can never be mutated through a returned buffer.
 */
export class StateStore {
  private entries = new Map<string, Uint8Array>();
  private log: EventRecord[] = [];
  private layers: Layer[] = [];
  private readonly snapshots = new Map<SnapshotId, Snapshot>();
  private nextSnapshot = 1;

  constructor(
    private readonly genesis: GenesisWriter,
    private readonly logger?: ILogger,
  ) {}

  /* ── key/value ─────────────────────────────────────────── */
  read(key: Uint8Array): Uint8Array | undefined {
    return this.entries.get(bytesToHex(key))?.slice();
  }

  has(key: Uint8Array): boolean {
    return this.entries.has(bytesToHex(key));
  }

  write(key: Uint8Array, value: Uint8Array): void {
    const k = bytesToHex(key);
    this.note(k);
    this.entries.set(k, value.slice());
  }

  remove(key: Uint8Array): void {
    const k = bytesToHex(key);
    if (!this.entries.has(k)) return;
    this.note(k);
    this.entries.delete(k);
  }

  /** Keys under `prefix`, in byte order. */
  keys(prefix: Uint8Array = new Uint8Array(0)): Uint8Array[] {
    const p = bytesToHex(prefix);
    return [...this.entries.keys()]
      .filter((k) => k.startsWith(p))
      .map(hexToBytes)
      .sort(compare);
  }

  get size(): number {
    return this.entries.size;
  }

  stateRoot(): Uint8Array {
    // lowercase hex keys sort in the same order as their bytes
    const sorted = [...this.entries]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, val]): [Uint8Array, Uint8Array] => [hexToBytes(k), val]);
    return entriesRoot(sorted);
  }

  /* ── pending events ────────────────────────────────────── */
  depositEvent(record: Omit<EventRecord, "index">): EventRecord {
    const full = detach({ ...record, index: this.log.length });
    this.log.push(full);
    return detach(full);
  }

  /** Copies; mutating them never reaches the log or a snapshot. */
  events(): EventRecord[] {
    return this.log.map(detach);
  }

  eventsSince(index: number): EventRecord[] {
    return this.log.slice(index).map(detach);
  }

  get eventCount(): number {
    return this.log.length;
  }

  resetEvents(): void {
    if (this.layers.length > 0) throw new StateError("cannot reset events inside a transaction");
    this.log = [];
  }

  /* ── transactions ──────────────────────────────────────── */
  get transactionDepth(): number {
    return this.layers.length;
  }

  startTransaction(): void {
    this.layers.push({ journal: new Map(), eventCount: this.log.length });
  }

  commitTransaction(): void {
    const top = this.layers.pop();
    if (!top) throw new StateError("commit without an open transaction");
    const parent = this.layers.at(-1);
    if (!parent) return;
    for (const [k, prev] of top.journal) {
      if (!parent.journal.has(k)) parent.journal.set(k, prev);
    }
  }

  rollbackTransaction(): void {
    const top = this.layers.pop();
    if (!top) throw new StateError("rollback without an open transaction");
    for (const [k, prev] of top.journal) {
      if (prev === undefined) this.entries.delete(k);
      else this.entries.set(k, prev);
    }
    this.log.length = top.eventCount;
  }

  /**
   * Runs `fn` in its own transaction: an ok result commits, an error result
   * or a throw rolls back.
   */
  transactional<T, E>(fn: () => Result<T, E>): Result<T, E> {
    this.startTransaction();
    let result: Result<T, E>;
    try {
      result = fn();
    } catch (e) {
      this.rollbackTransaction();
      throw e;
    }
    if (result.ok) this.commitTransaction();
    else this.rollbackTransaction();
    return result;
  }

  /* ── snapshots ─────────────────────────────────────────── */
  snapshot(): SnapshotId {
    const id = asSnapshotId(this.nextSnapshot++);
    this.snapshots.set(id, { entries: new Map(this.entries), events: [...this.log] });
    return id;
  }

  restore(id: SnapshotId): void {
    const snap = this.snapshots.get(id);
    if (!snap) {
      this.logger?.error({ snapshot: id }, "unknown snapshot");
      throw new StateError(`unknown snapshot ${id}`);
    }
    if (this.layers.length > 0) throw new StateError("cannot restore a snapshot inside a transaction");
    this.entries = new Map(snap.entries);
    this.log = [...snap.events];
    this.logger?.info({ snapshot: id }, "snapshot restored");
  }

  dropSnapshot(id: SnapshotId): void {
    if (!this.snapshots.delete(id)) throw new StateError(`unknown snapshot ${id}`);
  }

  /* ── genesis ───────────────────────────────────────────── */
  resetToGenesis(initialBalances: ReadonlyArray<[Address, bigint]>): void {
    this.entries.clear();
    this.log = [];
    this.layers = [];
    this.genesis(this, initialBalances);
    this.logger?.info({ accounts: initialBalances.length }, "state reset to genesis");
  }

  private note(k: string): void {
    const top = this.layers.at(-1);
    if (top && !top.journal.has(k)) top.journal.set(k, this.entries.get(k));
  }
}
