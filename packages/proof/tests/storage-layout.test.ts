import { describe, it, expect } from "vitest";
import { concat, encodeAbiParameters, hexToBigInt, keccak256, pad } from "viem";
import {
  arrayElementSlot,
  computeOutputRoot,
  decodeBlockHeader,
  mappingSlot,
  offsetSlot,
  readPacked,
  slotKey,
  wordToAddress,
} from "../src/storage-layout.js";
import { encodeHeader, word } from "./trie-builder.js";
import { HASH_A, SOLVER } from "./fixtures.js";

describe("slot arithmetic", () => {
  it("encodes a slot number as 32 bytes", () => {
    expect(slotKey(3n)).toBe(`0x${"0".repeat(63)}3`);
  });

  it("derives mapping slots as keccak256(key ‖ slot)", () => {
    const expected = keccak256(concat([HASH_A, word(4n)]));
    expect(mappingSlot(HASH_A, 4n)).toBe(expected);
  });

  it("left-pads short mapping keys", () => {
    expect(mappingSlot("0x05", 1n)).toBe(
      keccak256(encodeAbiParameters([{ type: "uint256" }, { type: "uint256" }], [5n, 1n])),
    );
  });

  it("places array elements after keccak256(slot)", () => {
    const base = hexToBigInt(keccak256(word(3n)));
    expect(arrayElementSlot(3n, 0n)).toBe(word(base));
    expect(arrayElementSlot(3n, 5n, 2n)).toBe(word(base + 10n));
  });

  it("offsets a slot", () => {
    expect(offsetSlot(word(7n), 2n)).toBe(word(9n));
  });
});

describe("packed words", () => {
  it("reads fields from the low end up", () => {
    const packed = word((2n << 128n) | (500n << 64n) | 100n);
    expect(readPacked(packed, 0, 64)).toBe(100n);
    expect(readPacked(packed, 64, 64)).toBe(500n);
    expect(readPacked(packed, 128, 8)).toBe(2n);
  });

  it("reads the low 20 bytes as an address", () => {
    expect(wordToAddress(pad(SOLVER, { size: 32 }))).toBe(SOLVER);
  });
});

describe("computeOutputRoot", () => {
  it("hashes the four preimage fields in order", () => {
    const output = {
      version: word(0n),
      stateRoot: word(1n),
      messagePasserStorageRoot: word(2n),
      latestBlockHash: word(3n),
    };
    expect(computeOutputRoot(output)).toBe(keccak256(concat([word(0n), word(1n), word(2n), word(3n)])));
  });
});

describe("decodeBlockHeader", () => {
  it("extracts the fields the provers read", () => {
    const rlp = encodeHeader({ stateRoot: HASH_A, number: 1234n, timestamp: 99n, extraData: "0xabcd" });
    const header = decodeBlockHeader(rlp);
    expect(header.hash).toBe(keccak256(rlp));
    expect(header.stateRoot).toBe(HASH_A);
    expect(header.number).toBe(1234n);
    expect(header.timestamp).toBe(99n);
    expect(header.extraData).toBe("0xabcd");
  });

  it("rejects a short list", () => {
    expect(() => decodeBlockHeader("0xc3010203")).toThrow(/at least 13 fields/);
  });
});
