/**
 * @intentvault/ledger — Types
 *
 * The asset ledger is the source chain's view of balances as the
 * settlement core sees it: native currency plus fungible tokens, with
 * ERC-20 style allowances. The core never holds balances itself.
 */

import type { Address } from "@intentvault/types";

// ─── Transfer Journal ────────────────────────────────────────────────────

/**
 * A single asset movement. `asset` is a token address, or NATIVE_ASSET
 * for the native currency.
 */
export interface TransferEntry {
  readonly sequence: number;
  readonly asset: Address;
  readonly from: Address | null;
  readonly to: Address;
  readonly amount: bigint;
  readonly memo?: string | undefined;
}

/**
 * Filter criteria for querying the transfer journal.
 */
export interface TransferFilter {
  readonly asset?: Address | undefined;
  readonly account?: Address | undefined;
}

// ─── Ledger Interface ────────────────────────────────────────────────────

/**
 * Balances, allowances and transfers on the source chain.
 *
 * Every mutating call either completes or throws with no effect.
 * `atomic` extends that guarantee across several calls: if `work`
 * throws, every mutation it made is undone.
 */
export interface AssetLedger {
  /** Balance of `asset` (NATIVE_ASSET for native currency) held by `account` */
  balanceOf(asset: Address, account: Address): bigint;

  allowance(token: Address, owner: Address, spender: Address): bigint;

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void;

  /** Move `amount` of `asset` from `from` to `to` */
  transfer(asset: Address, from: Address, to: Address, amount: bigint, memo?: string): void;

  /** Move tokens on behalf of `from`, consuming `spender`'s allowance */
  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
    memo?: string,
  ): void;

  atomic<T>(work: () => T): T;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_AMOUNT";

/**
 * Structured error from the asset ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire ledger state.
 * Balance and allowance amounts are decimal strings.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly balances: readonly { readonly asset: Address; readonly account: Address; readonly amount: string }[];
  readonly allowances: readonly {
    readonly token: Address;
    readonly owner: Address;
    readonly spender: Address;
    readonly amount: string;
  }[];
  readonly journal: readonly TransferEntry[];
}
