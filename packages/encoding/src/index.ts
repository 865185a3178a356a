/**
 * @intentvault/encoding — Intent hashing and vault derivation.
 *
 * @packageDocumentation
 */

export { EncodingError } from "./errors.js";
export type { EncodingErrorCode } from "./errors.js";

export {
  ROUTE_ABI,
  REWARD_ABI,
  encodeRoute,
  encodeReward,
  hashRoute,
  hashReward,
  computeIntentHash,
  hashIntent,
  zipTokenAmounts,
  assertIntent,
} from "./intent-hasher.js";

export {
  EVM_CREATE2_PREFIX,
  TRON_CREATE2_PREFIX,
  computeInitCodeHash,
  assertVaultTemplate,
  deriveVaultAddress,
  intentVaultAddress,
} from "./vault-deriver.js";
export type { VaultTemplate } from "./vault-deriver.js";
