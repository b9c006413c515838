import { BundleError } from "../errors";
import { type ContractMetadata, parseMetadata } from "./metadata";

/** Deployable unit: code blob plus the ABI needed to talk to it. */
export type ContractBundle = {
  name: string;
  code: Uint8Array;
  metadata: ContractMetadata;
};

export interface BundleRegistry {
  get(label: string): ContractBundle | undefined;
  labels(): string[];
}

export const makeBundle = (name: string, code: Uint8Array, metadata: unknown): ContractBundle => ({
  name,
  code: code.slice(),
  metadata: parseMetadata(metadata),
});

/** Registry filled by explicit `register` calls. */
export class InMemoryBundleRegistry implements BundleRegistry {
  private readonly bundles = new Map<string, ContractBundle>();

  register(bundle: ContractBundle): this {
    if (this.bundles.has(bundle.name)) throw new BundleError(`bundle ${bundle.name} already registered`);
    this.bundles.set(bundle.name, bundle);
    return this;
  }

  get(label: string): ContractBundle | undefined {
    return this.bundles.get(label);
  }

  labels(): string[] {
    return [...this.bundles.keys()].sort();
  }
}
