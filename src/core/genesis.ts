import { Ledger } from "./ledger";
import type { GenesisWriter } from "./store";

/** Genesis: seeded accounts, block 1 opened at `timestamp`, empty event log. */
export const makeGenesis =
  (timestamp: bigint): GenesisWriter =>
  (store, balances) => {
    const ledger = new Ledger(store);
    for (const [who, free] of balances) {
      ledger.setAccount(who, { nonce: 0n, free: (ledger.account(who)?.free ?? 0n) + free });
    }
    ledger.setBlockNumber(1n);
    ledger.setTimestamp(timestamp);
  };
