/**
 * @intentvault/proof — Merkle-Patricia trie proofs.
 *
 * Verifies `eth_getProof`-style proofs against a state or storage root.
 *
 * Design:
 * - Keys are secure-trie keys: the path is keccak256(key), as nibbles
 * - Each proof node referenced by hash must hash to that reference
 * - Child nodes shorter than 32 bytes are embedded inline, not hashed
 * - A proof that ends on a diverging path proves absence (null)
 */

import { fromRlp, hexToBigInt, keccak256, pad, size } from "viem";
import type { Address, Bytes32, Hex } from "@intentvault/types";
import { ProofError } from "./types.js";

// =============================================================================
// Types
// =============================================================================

/** A decoded RLP item: a byte string or a list of items */
export type RlpItem = Hex | readonly RlpItem[];

/** Root of a trie with no entries: keccak256(rlp("")) */
export const EMPTY_TRIE_ROOT: Bytes32 =
  "0x56e81f171bcc55a6ff8345e692c0f86e5b48e01b996cadc001622fb5e363b421";

export interface AccountState {
  readonly nonce: bigint;
  readonly balance: bigint;
  readonly storageRoot: Bytes32;
  readonly codeHash: Bytes32;
}

// =============================================================================
// Internal Helpers
// =============================================================================

function isList(item: RlpItem): item is readonly RlpItem[] {
  return typeof item !== "string";
}

function toNibbles(hex: Hex): number[] {
  return [...hex.slice(2)].map((c) => parseInt(c, 16));
}

function invalid(message: string): ProofError {
  return new ProofError("INVALID_PROOF", message);
}

/**
 * RLP-decode `encoded`, reporting malformed input as INVALID_PROOF.
 */
export function decodeRlp(encoded: Hex, what: string): RlpItem {
  try {
    return fromRlp(encoded, "hex");
  } catch (err) {
    throw invalid(`${what} is not valid RLP: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function asBytes(item: RlpItem | undefined, what: string): Hex {
  if (item === undefined || isList(item)) {
    throw invalid(`Expected bytes for ${what}`);
  }
  return item;
}

/**
 * Decode a hex-prefix encoded path.
 * High nibble of the first byte: bit 1 = leaf, bit 0 = odd length.
 */
function decodeCompactPath(encoded: Hex): { nibbles: number[]; leaf: boolean } {
  const all = toNibbles(encoded);
  const flag = all[0];
  if (flag === undefined || flag > 3) {
    throw invalid(`Bad path prefix in ${encoded}`);
  }
  const odd = (flag & 1) === 1;
  return { nibbles: all.slice(odd ? 1 : 2), leaf: flag >= 2 };
}

function bytesToQuantity(value: Hex): bigint {
  return value === "0x" ? 0n : hexToBigInt(value);
}

// =============================================================================
// Proof Verification
// =============================================================================

/**
 * Walk a proof from `root` along keccak256(`key`).
 *
 * @returns the raw value stored at the key, or null when the proof shows
 *   the key is absent
 * @throws {ProofError} INVALID_PROOF when a node does not match its reference
 */
export function verifyTrieProof(root: Bytes32, key: Hex, proof: readonly Hex[]): Hex | null {
  const path = toNibbles(keccak256(key));
  let reference: RlpItem = root;
  let proofIndex = 0;
  let pathIndex = 0;

  for (;;) {
    let node: readonly RlpItem[];

    if (isList(reference)) {
      node = reference;
    } else {
      if (reference === "0x") return null;
      if (proofIndex === 0 && reference.toLowerCase() === EMPTY_TRIE_ROOT && proof.length === 0) {
        return null;
      }
      const encoded = proof[proofIndex];
      if (encoded === undefined) {
        throw invalid(`Proof ends after ${proofIndex} nodes`);
      }
      if (keccak256(encoded) !== reference.toLowerCase()) {
        throw invalid(`Proof node ${proofIndex} does not match its reference`);
      }
      proofIndex++;
      const decoded = decodeRlp(encoded, `Proof node ${proofIndex - 1}`);
      if (!isList(decoded)) {
        throw invalid(`Proof node ${proofIndex - 1} is not a list`);
      }
      node = decoded;
    }

    if (node.length === 17) {
      if (pathIndex === path.length) {
        const value = asBytes(node[16], "branch value");
        return value === "0x" ? null : value;
      }
      const child = node[path[pathIndex] ?? 0];
      if (child === undefined) throw invalid("Branch node is truncated");
      pathIndex++;
      reference = child;
      continue;
    }

    if (node.length === 2) {
      const { nibbles, leaf } = decodeCompactPath(asBytes(node[0], "node path"));
      const remaining = path.slice(pathIndex, pathIndex + nibbles.length);
      if (remaining.length !== nibbles.length || remaining.some((n, i) => n !== nibbles[i])) {
        return null;
      }
      pathIndex += nibbles.length;

      const next = node[1];
      if (next === undefined) throw invalid("Short node is truncated");
      if (leaf) {
        return pathIndex === path.length ? asBytes(next, "leaf value") : null;
      }
      reference = next;
      continue;
    }

    throw invalid(`Unexpected node with ${node.length} items`);
  }
}

/**
 * Prove an account's state under a state root.
 *
 * @throws {ProofError} INVALID_PROOF if the proof is bad or the account is absent
 */
export function proveAccount(stateRoot: Bytes32, address: Address, proof: readonly Hex[]): AccountState {
  const raw = verifyTrieProof(stateRoot, address, proof);
  if (raw === null) {
    throw invalid(`Account ${address} is not in state ${stateRoot}`);
  }
  const decoded = decodeRlp(raw, `Account ${address}`);
  if (!isList(decoded) || decoded.length !== 4) {
    throw invalid(`Account ${address} does not decode to four fields`);
  }
  return {
    nonce: bytesToQuantity(asBytes(decoded[0], "nonce")),
    balance: bytesToQuantity(asBytes(decoded[1], "balance")),
    storageRoot: asBytes(decoded[2], "storageRoot"),
    codeHash: asBytes(decoded[3], "codeHash"),
  };
}

/**
 * Prove a storage word under an account's storage root.
 *
 * @returns the 32-byte slot value; absent slots read as zero
 */
export function proveStorageSlot(storageRoot: Bytes32, slot: Bytes32, proof: readonly Hex[]): Bytes32 {
  const raw = verifyTrieProof(storageRoot, slot, proof);
  if (raw === null) {
    return pad("0x", { size: 32 });
  }
  const decoded = decodeRlp(raw, `Storage value at ${slot}`);
  if (isList(decoded) || size(decoded) > 32) {
    throw invalid(`Storage value at ${slot} is not a word`);
  }
  return pad(decoded, { size: 32 });
}
