/**
 * @intentvault/ledger — Source-chain asset ledger.
 *
 * Provides:
 * - AssetLedger: the interface the settlement core moves value through
 * - InMemoryAssetLedger: balances, allowances, atomic scopes, journal
 *
 * @packageDocumentation
 */

export { InMemoryAssetLedger } from "./ledger.js";
export { LedgerError } from "./types.js";
export type {
  AssetLedger,
  LedgerErrorCode,
  LedgerSnapshot,
  TransferEntry,
  TransferFilter,
} from "./types.js";
