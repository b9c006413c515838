import type { Weight } from "../core/types";
import { contractsErr } from "../runtime/errors";
import { VmAbort } from "./faults";

/**
 * One meter per top-level call, shared by every nested frame. Charging past
 * either dimension of the limit aborts the whole stack.
 */
export class GasMeter {
  private refTime = 0n;
  private proofSize = 0n;
  private peak: Weight = { refTime: 0n, proofSize: 0n };

  constructor(readonly limit: Weight) {}

  charge(refTime: bigint, proofSize = 0n): void {
    const nextRef = this.refTime + refTime;
    const nextProof = this.proofSize + proofSize;
    this.peak = {
      refTime: nextRef > this.peak.refTime ? nextRef : this.peak.refTime,
      proofSize: nextProof > this.peak.proofSize ? nextProof : this.peak.proofSize,
    };
    if (nextRef > this.limit.refTime || nextProof > this.limit.proofSize) {
      throw new VmAbort(contractsErr("OutOfGas"));
    }
    this.refTime = nextRef;
    this.proofSize = nextProof;
  }

  consumed(): Weight {
    return { refTime: this.refTime, proofSize: this.proofSize };
  }

  /** Largest amount ever asked for, including a charge that did not fit. */
  required(): Weight {
    return { ...this.peak };
  }
}
