/**
 * @intentvault/proof — Storage layout helpers.
 *
 * Slot arithmetic for the contracts the provers read: mappings,
 * dynamic arrays, packed words, output roots and block headers.
 */

import {
  concat,
  encodeAbiParameters,
  getAddress,
  hexToBigInt,
  keccak256,
  numberToHex,
  pad,
  slice,
} from "viem";
import type { Address, Bytes32, Hex } from "@intentvault/types";
import type { OutputRootPreimage } from "./types.js";
import { ProofError } from "./types.js";
import type { RlpItem } from "./trie.js";
import { decodeRlp } from "./trie.js";

// =============================================================================
// Slots
// =============================================================================

export function slotKey(slot: bigint): Bytes32 {
  return numberToHex(slot, { size: 32 });
}

/**
 * Slot of `mapping[key]` for a mapping declared at `slot`.
 */
export function mappingSlot(key: Hex, slot: bigint): Bytes32 {
  return keccak256(
    encodeAbiParameters([{ type: "bytes32" }, { type: "uint256" }], [pad(key, { size: 32 }), slot]),
  );
}

/**
 * First slot of element `index` of a dynamic array declared at `slot`
 * whose elements span `elementSlots` slots each.
 */
export function arrayElementSlot(slot: bigint, index: bigint, elementSlots: bigint = 1n): Bytes32 {
  const base = hexToBigInt(keccak256(slotKey(slot)));
  return numberToHex(base + index * elementSlots, { size: 32 });
}

export function offsetSlot(slot: Bytes32, offset: bigint): Bytes32 {
  return numberToHex(hexToBigInt(slot) + offset, { size: 32 });
}

// =============================================================================
// Words
// =============================================================================

export function wordToAddress(word: Bytes32): Address {
  return getAddress(slice(word, 12));
}

/**
 * Read `bits` bits starting `offset` bits above the least significant end.
 * Packed contract fields fill a slot from the low end up.
 */
export function readPacked(word: Bytes32, offset: number, bits: number): bigint {
  const mask = (1n << BigInt(bits)) - 1n;
  return (hexToBigInt(word) >> BigInt(offset)) & mask;
}

// =============================================================================
// Output Roots
// =============================================================================

/**
 * keccak256(version ‖ stateRoot ‖ messagePasserStorageRoot ‖ latestBlockHash)
 */
export function computeOutputRoot(output: OutputRootPreimage): Bytes32 {
  return keccak256(
    concat([output.version, output.stateRoot, output.messagePasserStorageRoot, output.latestBlockHash]),
  );
}

// =============================================================================
// Block Headers
// =============================================================================

export interface BlockHeader {
  readonly hash: Bytes32;
  readonly stateRoot: Bytes32;
  readonly number: bigint;
  readonly timestamp: bigint;
  readonly extraData: Hex;
}

const HEADER_STATE_ROOT = 3;
const HEADER_NUMBER = 8;
const HEADER_TIMESTAMP = 11;
const HEADER_EXTRA_DATA = 12;

function headerField(fields: readonly RlpItem[], index: number): Hex {
  const field = fields[index];
  if (field === undefined || typeof field !== "string") {
    throw new ProofError("INVALID_PROOF", `Block header field ${index} is missing`);
  }
  return field;
}

/**
 * Decode the fields the provers need from an RLP block header.
 * The hash is keccak256 of the encoding as given.
 */
export function decodeBlockHeader(rlpHeader: Hex): BlockHeader {
  const fields = decodeRlp(rlpHeader, "Block header");
  if (typeof fields === "string" || fields.length < 13) {
    throw new ProofError("INVALID_PROOF", "Block header is not a list of at least 13 fields");
  }
  const number = headerField(fields, HEADER_NUMBER);
  const timestamp = headerField(fields, HEADER_TIMESTAMP);
  return {
    hash: keccak256(rlpHeader),
    stateRoot: headerField(fields, HEADER_STATE_ROOT),
    number: number === "0x" ? 0n : hexToBigInt(number),
    timestamp: timestamp === "0x" ? 0n : hexToBigInt(timestamp),
    extraData: headerField(fields, HEADER_EXTRA_DATA),
  };
}
