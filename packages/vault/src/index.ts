/**
 * @intentvault/vault — Per-intent escrow state.
 *
 * Two pieces, both keyed by intent hash:
 * - IntentRegistry: which reward each vault escrows, and where the vault lives
 * - ClaimStateMachine: initiated → claimed | refunded, exactly once
 *
 * Design rules:
 * - Vault addresses are derived, never stored as pointers
 * - Terminal claim states are never left
 * - All state is snapshot-able and restorable
 */

export { IntentRegistry, VaultError } from "./intent-registry.js";
export type { VaultErrorCode } from "./intent-registry.js";
export { ClaimStateMachine, ClaimError } from "./claim-state-machine.js";
export type { ClaimErrorCode } from "./claim-state-machine.js";
export type {
  IntentRecord,
  ClaimOutcome,
  ClaimRecord,
  IntentRegistrySnapshot,
  ClaimSnapshot,
  RecordOptions,
} from "./types.js";
