/* ── throwable faults ─────────────────────────────────────
   Expected ledger failures travel as values (DispatchError,
   SessionError); these classes mark defects in the caller
   or in the harness itself. */

export class SandboxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unknown snapshot, corrupt record, unbalanced transaction. Fatal. */
export class StateError extends SandboxError {}

export class CodecError extends SandboxError {}

export class ConfigError extends SandboxError {
  constructor(readonly issues: string[]) {
    super(`invalid sandbox config: ${issues.join("; ")}`);
  }
}

export class BundleError extends SandboxError {}

export class AssemblyError extends SandboxError {
  constructor(
    message: string,
    readonly line: number,
  ) {
    super(`line ${line}: ${message}`);
  }
}
