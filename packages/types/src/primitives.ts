/**
 * Primitive Types
 *
 * Hex-encoded identifiers as they appear on an EVM ledger.
 * The aliases are structurally identical to viem's, so values flow
 * between this package and viem without conversion.
 */

/** Arbitrary `0x`-prefixed hex data */
export type Hex = `0x${string}`;

/** 20-byte account identifier */
export type Address = `0x${string}`;

/** 32-byte word (hashes, salts, storage keys) */
export type Bytes32 = `0x${string}`;

/** Unix time in seconds, as carried on the ledger (uint64) */
export type Timestamp = bigint;

/** Chain identifier (uint64 in intent hashing) */
export type ChainId = bigint;

/** Sentinel that stands for the native currency wherever a token is named */
export const NATIVE_ASSET: Address = "0x0000000000000000000000000000000000000000";

export const UINT64_MAX = (1n << 64n) - 1n;
export const UINT256_MAX = (1n << 256n) - 1n;
