/**
 * Vault Deriver — Deterministic escrow address per intent.
 *
 * A vault lives at the CREATE2 address
 *
 *   keccak256(prefix ‖ deployer ‖ intentHash ‖ initCodeHash)[12:]
 *
 * so anyone can compute it before the vault exists and fund it ahead of
 * deployment. The prefix is 0xff on EVM chains; Tron's deployer uses 0x41.
 */

import { concat, getAddress, keccak256, size, slice } from "viem";
import type { Address, Bytes32, Hex, Intent } from "@intentvault/types";
import { isAddress, isBytes32, isHex } from "@intentvault/types";
import { hashIntent } from "./intent-hasher.js";
import { EncodingError } from "./errors.js";

export const EVM_CREATE2_PREFIX: Hex = "0xff";
export const TRON_CREATE2_PREFIX: Hex = "0x41";

/**
 * Fixed deployment template shared by every vault.
 */
export interface VaultTemplate {
  /** Contract that deploys vaults (the portal on the source chain) */
  readonly deployer: Address;

  /** keccak256 of the vault creation code */
  readonly initCodeHash: Bytes32;

  /** One-byte CREATE2 prefix. Default: 0xff */
  readonly create2Prefix?: Hex | undefined;
}

export function computeInitCodeHash(creationCode: Hex): Bytes32 {
  return keccak256(creationCode);
}

export function assertVaultTemplate(template: VaultTemplate): void {
  if (!isAddress(template.deployer)) {
    throw new EncodingError("INVALID_TEMPLATE", `Invalid deployer '${template.deployer}'`);
  }
  if (!isBytes32(template.initCodeHash)) {
    throw new EncodingError("INVALID_TEMPLATE", "initCodeHash must be 32 bytes");
  }
  const prefix = template.create2Prefix ?? EVM_CREATE2_PREFIX;
  if (!isHex(prefix) || size(prefix) !== 1) {
    throw new EncodingError("INVALID_TEMPLATE", `CREATE2 prefix must be one byte, got '${prefix}'`);
  }
}

/**
 * Compute the vault address for an intent hash without deploying it.
 */
export function deriveVaultAddress(intentHash: Bytes32, template: VaultTemplate): Address {
  const digest = keccak256(
    concat([
      template.create2Prefix ?? EVM_CREATE2_PREFIX,
      template.deployer,
      intentHash,
      template.initCodeHash,
    ]),
  );
  return getAddress(slice(digest, 12));
}

export function intentVaultAddress(intent: Intent, template: VaultTemplate): Address {
  return deriveVaultAddress(hashIntent(intent).intentHash, template);
}
