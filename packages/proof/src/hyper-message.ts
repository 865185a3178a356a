/**
 * @intentvault/proof — Relay message codec.
 *
 * A relayed proof carries abi.encode(bytes32[] intentHashes, address[] claimants).
 * Relay options carry abi.encode(bytes32 sourceChainProver, bytes metadata, address hook).
 */

import { decodeAbiParameters, encodeAbiParameters, getAddress, hexToBigInt, numberToHex, slice } from "viem";
import type { Address, Bytes32, Hex } from "@intentvault/types";
import { ProofError } from "./types.js";

const PROOF_MESSAGE_ABI = [{ type: "bytes32[]" }, { type: "address[]" }] as const;

const RELAY_OPTIONS_ABI = [
  { type: "bytes32", name: "sourceChainProver" },
  { type: "bytes", name: "metadata" },
  { type: "address", name: "hook" },
] as const;

export interface ProofMessage {
  readonly intentHashes: readonly Bytes32[];
  readonly claimants: readonly Address[];
}

export interface RelayOptions {
  /** Prover on the source chain that should receive the message, as bytes32 */
  readonly sourceChainProver: Bytes32;
  readonly metadata: Hex;
  readonly hook: Address;
}

export function addressToBytes32(address: Address): Bytes32 {
  return numberToHex(hexToBigInt(address), { size: 32 });
}

export function bytes32ToAddress(value: Bytes32): Address {
  return getAddress(slice(value, 12));
}

function assertSameLength(message: ProofMessage): void {
  if (message.intentHashes.length !== message.claimants.length) {
    throw new ProofError(
      "ARRAY_LENGTH_MISMATCH",
      `${message.intentHashes.length} intent hashes but ${message.claimants.length} claimants`,
    );
  }
}

export function encodeProofMessage(message: ProofMessage): Hex {
  assertSameLength(message);
  return encodeAbiParameters(PROOF_MESSAGE_ABI, [message.intentHashes, message.claimants]);
}

/**
 * @throws {ProofError} INVALID_PROOF if the body does not decode,
 *   ARRAY_LENGTH_MISMATCH if the arrays differ in length
 */
export function decodeProofMessage(body: Hex): ProofMessage {
  let decoded: readonly [readonly Hex[], readonly Address[]];
  try {
    decoded = decodeAbiParameters(PROOF_MESSAGE_ABI, body);
  } catch (err) {
    throw new ProofError("INVALID_PROOF", `Message body does not decode: ${err instanceof Error ? err.message : String(err)}`);
  }
  const message: ProofMessage = { intentHashes: decoded[0], claimants: decoded[1] };
  assertSameLength(message);
  return message;
}

export function encodeRelayOptions(options: RelayOptions): Hex {
  return encodeAbiParameters(RELAY_OPTIONS_ABI, [options.sourceChainProver, options.metadata, options.hook]);
}

export function decodeRelayOptions(data: Hex): RelayOptions {
  try {
    const [sourceChainProver, metadata, hook] = decodeAbiParameters(RELAY_OPTIONS_ABI, data);
    return { sourceChainProver, metadata, hook };
  } catch (err) {
    throw new ProofError("INVALID_PROOF", `Relay options do not decode: ${err instanceof Error ? err.message : String(err)}`);
  }
}
