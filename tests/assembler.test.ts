import { describe, it, expect } from "vitest";
import { selectorOf } from "../src/codec/abi";
import { AssemblyError } from "../src/errors";
import { bytesToHex } from "../src/utils/bytes";
import { assemble } from "../src/vm/assembler";
import { parseProgram } from "../src/vm/format";
import { FIXTURES, fixtureCode } from "./helpers/contracts";

const HEADER = "0063747201"; // magic + version

describe("assemble", () => {
  it("emits the header, export table, data and code", () => {
    const blob = assemble(`
      .export 0x01020304 main
      main:
        push 5     ; PUSH8
        push 300   ; PUSH32
        add
        stop
    `);
    expect(bytesToHex(blob)).toBe(
      `0x${HEADER}0101` + "0102030400000000" + "00000000" + "0205" + "030000012c" + "10" + "01",
    );
  });

  it("lays data out from address zero and resolves @ and #", () => {
    const blob = assemble(`
      .memory 2
      .data A "hi"
      .data B 0xc0ffee
      .export 0x00000001 main
      main:
        push @B
        push #B
    `);
    expect(bytesToHex(blob)).toBe(
      `0x${HEADER}0201` + "0000000100000000" + "00000005" + "6869c0ffee" + "0202" + "0203",
    );
  });

  it("sizes pushes by value and always gives labels four bytes", () => {
    const blob = assemble(`
      .export 0x00000001 top
      top:
        push 0x100000000
        push top
        jumpi top
    `);
    const code = blob.subarray(blob.length - 17);
    expect(bytesToHex(code)).toBe("0x" + "04050100000000" + "0300000000" + "2100000000");
  });

  it("derives export selectors from names", () => {
    const blob = assemble(`
      .export flip go
      go: stop
    `);
    expect(blob.subarray(7, 11)).toEqual(selectorOf("flip"));
  });

  it("encodes operand bytes for dup, swap, memory and host instructions", () => {
    const blob = assemble(`
      .export 0x00000001 main
      main:
        dup 1
        swap 2
        mload 32
        mstore 4
        host storage_get
        .byte 0xfe
    `);
    expect(bytesToHex(blob.subarray(blob.length - 11))).toBe("0x0601" + "0702" + "3020" + "3104" + "4003" + "fe");
  });

  it("reports errors with their line numbers", () => {
    const fail = (src: string) => {
      try {
        assemble(src);
      } catch (e) {
        if (e instanceof AssemblyError) return e.message;
        throw e;
      }
      return "assembled";
    };
    expect(fail("main:\n  frob")).toBe("line 2: unknown instruction frob");
    expect(fail("jump nowhere")).toBe("line 1: unknown label nowhere");
    expect(fail("a:\na:")).toBe("line 2: duplicate label a");
    expect(fail("host nope")).toBe("line 1: unknown host function nope");
    expect(fail("dup 256")).toBe("line 1: 256 is not a byte");
    expect(fail("stop 1")).toBe("line 1: stop takes no operand");
    expect(fail(".data X zero 5000")).toBe("line 1: data needs more than 1 page(s)");
    expect(fail(".memory 0")).toBe("line 1: bad page count 0");
    expect(fail(".export flip")).toBe("line 1: .export takes a selector and a label");
    expect(fail(".bogus")).toBe("line 1: unknown directive .bogus");
  });

  it("assembles every fixture into a valid program", () => {
    for (const name of FIXTURES) {
      expect(parseProgram(fixtureCode(name), 16).ok).toBe(true);
    }
  });
});
