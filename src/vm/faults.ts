import type { DispatchError, TrapKind } from "../core/types";

/*
 * Control flow inside one execution. Both are caught by the interpreter
 * loop and turned into an Exit value; neither escapes to callers.
 */

/** The contract did something illegal. Ends the current frame only. */
export class VmTrap extends Error {
  constructor(
    readonly kind: TrapKind,
    message: string,
  ) {
    super(message);
    this.name = "VmTrap";
  }
}

/** Fails every frame on the stack (gas exhausted, depth exceeded). */
export class VmAbort extends Error {
  constructor(readonly error: DispatchError) {
    super(error.kind === "Module" ? (error.message ?? "aborted") : error.kind);
    this.name = "VmAbort";
  }
}
