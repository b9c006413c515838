import { describe, it, expect } from "vitest";
import { selectorOf } from "../src/codec/abi";
import { findConstructor, findMessage, parseMetadata } from "../src/bundle/metadata";
import { InMemoryBundleRegistry, makeBundle } from "../src/bundle/registry";
import { BundleError } from "../src/errors";
import { bytesToHex } from "../src/utils/bytes";
import { fixtureBundle, fixtureRegistry } from "./helpers/contracts";

describe("parseMetadata", () => {
  it("fills in defaults and derives selectors from labels", () => {
    const meta = parseMetadata({
      name: "counter",
      constructors: [{ label: "new" }],
      messages: [{ label: "inc", args: [{ label: "by", type: "u32" }] }],
    });
    expect(meta).toEqual({
      name: "counter",
      version: "0.0.0",
      constructors: [{ label: "new", selector: bytesToHex(selectorOf("new")), args: [], payable: false }],
      messages: [
        {
          label: "inc",
          selector: bytesToHex(selectorOf("inc")),
          args: [{ label: "by", type: "u32" }],
          payable: false,
          mutates: false,
        },
      ],
      events: [],
    });
  });

  it("lowercases explicit selectors and accepts nested types", () => {
    const meta = parseMetadata({
      name: "m",
      constructors: [{ label: "new", selector: "0xDEADBEEF" }],
      messages: [{ label: "all", returnType: { vec: { option: "u128" } } }],
    });
    expect(meta.constructors[0]?.selector).toBe("0xdeadbeef");
    expect(meta.messages[0]?.returnType).toEqual({ vec: { option: "u128" } });
  });

  it("rejects selectors shared between entries", () => {
    expect(() =>
      parseMetadata({
        name: "m",
        constructors: [{ label: "new", selector: "0x00000001" }],
        messages: [{ label: "a", selector: "0x00000001" }],
      }),
    ).toThrow("m: duplicate selector 0x00000001 (a)");
  });

  it("reports schema violations as BundleError", () => {
    expect(() => parseMetadata({ name: "", constructors: [], messages: [] })).toThrow(BundleError);
    expect(() =>
      parseMetadata({
        name: "m",
        constructors: [],
        messages: [{ label: "x", args: [{ label: "n", type: "u256" }] }],
      }),
    ).toThrow(/^invalid contract metadata: /);
    expect(() => parseMetadata({ name: "m", constructors: [{ label: "new", selector: "0x01" }], messages: [] })).toThrow(
      BundleError,
    );
  });

  it("finds constructors and messages by label", () => {
    const { metadata } = fixtureBundle("flipper");
    expect(findConstructor(metadata, "new")?.args).toEqual([{ label: "init", type: "bool" }]);
    expect(findMessage(metadata, "get")?.returnType).toBe("bool");
    expect(findMessage(metadata, "new")).toBeUndefined();
    expect(metadata.events).toEqual([{ label: "Flipped", fields: [{ label: "value", type: "bool" }] }]);
    expect(findConstructor(fixtureBundle("relay").metadata, "refuse")?.errorType).toBe("status");
  });
});

describe("InMemoryBundleRegistry", () => {
  it("lists labels sorted", () => {
    expect(fixtureRegistry().labels()).toEqual(["flipper", "looper", "recurse", "relay", "vault"]);
  });

  it("refuses to register a label twice", () => {
    const registry = new InMemoryBundleRegistry().register(fixtureBundle("flipper"));
    expect(() => registry.register(fixtureBundle("flipper"))).toThrow("bundle flipper already registered");
    expect(registry.get("vault")).toBeUndefined();
  });

  it("keeps its own copy of the code", () => {
    const code = Uint8Array.of(1, 2, 3);
    const bundle = makeBundle("b", code, { name: "b", constructors: [], messages: [] });
    code[0] = 9;
    expect(bundle.code).toEqual(Uint8Array.of(1, 2, 3));
  });
});
