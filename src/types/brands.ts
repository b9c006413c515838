// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;
export type Address = Hex;
export type CodeHash = Brand<Hex, "CodeHash">;
export type SnapshotId = Brand<number, "SnapshotId">;

export const asCodeHash = (h: Hex): CodeHash => h as CodeHash;
export const asSnapshotId = (n: number): SnapshotId => n as SnapshotId;
