export { Sandbox } from "./sandbox";
export { DEFAULT_ACCOUNT, INIT_AMOUNT, UNIT, type SandboxConfig, defaultConfig, resolveConfig } from "./config";
export { type ILogger, type LogLevel, makeLogger } from "./logging";
export {
  AssemblyError,
  BundleError,
  CodecError,
  ConfigError,
  SandboxError,
  StateError,
} from "./errors";

export { err, ok, type Result } from "./core/result";
export { StateStore } from "./core/store";
export { Ledger } from "./core/ledger";
export { BlockBuilder, ZERO_HASH } from "./core/block";
export * from "./core/types";
export type { CodeHash, SnapshotId } from "./types/brands";
export { bytesToHex, filledAddress, hexToBytes, toAddress, utf8 } from "./utils/bytes";

export { type RuntimeCall, decodeRuntimeCall, encodeRuntimeCall } from "./runtime/call";
export { Dispatcher, dispatchWeight } from "./runtime/dispatcher";
export {
  AssetsError,
  BalancesError,
  ContractsError,
  MODULE,
  describeDispatchError,
  toStatusCode,
} from "./runtime/errors";

export { ContractEngine } from "./engine/engine";
export { codeHashOf, contractAddress } from "./engine/address";
export { assemble } from "./vm/assembler";
export { HOST_FUNCTIONS, ReturnCode } from "./vm/opcodes";

export {
  type AbiType,
  type AbiValue,
  decodeArgs,
  decodeValue,
  encodeArgs,
  encodeValue,
  selectorOf,
} from "./codec/abi";
export {
  type ContractMetadata,
  type MessageSpec,
  findConstructor,
  findMessage,
  parseMetadata,
} from "./bundle/metadata";
export {
  type BundleRegistry,
  type ContractBundle,
  InMemoryBundleRegistry,
  makeBundle,
} from "./bundle/registry";

export {
  type CallArg,
  type CallOptions,
  type ContractHandle,
  type DeployOptions,
  EncodedArg,
  Session,
  encoded,
} from "./session/session";
export {
  ErrorTable,
  SessionError,
  type SessionErrorKind,
  moduleError,
  unknownError,
} from "./session/errors";
export { type ContractEvent, type EventBatch, SessionRecord } from "./session/record";
