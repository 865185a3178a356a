/**
 * @intentvault/ledger — In-memory asset ledger.
 *
 * Holds balances and allowances in maps keyed by lower-cased addresses,
 * so checksummed and lower-case spellings of one account agree.
 *
 * API surface:
 * - balanceOf() / allowance() — reads
 * - mint() — credit an account from nothing (seeding, tests)
 * - approve() / transfer() / transferFrom() — writes
 * - atomic() — all-or-nothing scope across several writes
 * - getTransfers() — append-only journal of movements
 * - snapshot() / fromSnapshot() — persistence
 */

import type { Address } from "@intentvault/types";
import { NATIVE_ASSET } from "@intentvault/types";
import type { AssetLedger, LedgerSnapshot, TransferEntry, TransferFilter } from "./types.js";
import { LedgerError } from "./types.js";

function key(...parts: readonly string[]): string {
  return parts.map((p) => p.toLowerCase()).join(":");
}

function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function assetLabel(asset: Address): string {
  return sameAddress(asset, NATIVE_ASSET) ? "native" : asset;
}

interface BalanceRecord {
  readonly asset: Address;
  readonly account: Address;
  amount: bigint;
}

interface AllowanceRecord {
  readonly token: Address;
  readonly owner: Address;
  readonly spender: Address;
  amount: bigint;
}

interface SavedState {
  readonly balances: Map<string, BalanceRecord>;
  readonly allowances: Map<string, AllowanceRecord>;
  readonly journalLength: number;
}

export class InMemoryAssetLedger implements AssetLedger {
  private _balances = new Map<string, BalanceRecord>();
  private _allowances = new Map<string, AllowanceRecord>();
  private readonly _journal: TransferEntry[] = [];
  private _atomicDepth = 0;

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(asset: Address, account: Address): bigint {
    return this._balances.get(key(asset, account))?.amount ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this._allowances.get(key(token, owner, spender))?.amount ?? 0n;
  }

  getTransfers(filter?: TransferFilter): readonly TransferEntry[] {
    return this._journal.filter((entry) => {
      if (filter?.asset !== undefined && !sameAddress(entry.asset, filter.asset)) {
        return false;
      }
      if (filter?.account !== undefined) {
        const { account } = filter;
        const touches =
          sameAddress(entry.to, account) || (entry.from !== null && sameAddress(entry.from, account));
        if (!touches) return false;
      }
      return true;
    });
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  mint(asset: Address, to: Address, amount: bigint): void {
    this._assertAmount(amount);
    this._credit(asset, to, amount);
    this._record(asset, null, to, amount, "mint");
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this._assertAmount(amount);
    const k = key(token, owner, spender);
    const existing = this._allowances.get(k);
    if (existing !== undefined) {
      existing.amount = amount;
    } else {
      this._allowances.set(k, { token, owner, spender, amount });
    }
  }

  transfer(asset: Address, from: Address, to: Address, amount: bigint, memo?: string): void {
    this._assertAmount(amount);
    this._debit(asset, from, amount);
    this._credit(asset, to, amount);
    this._record(asset, from, to, amount, memo);
  }

  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
    memo?: string,
  ): void {
    this._assertAmount(amount);
    if (sameAddress(token, NATIVE_ASSET)) {
      throw new LedgerError("INVALID_AMOUNT", "Native currency has no allowances");
    }
    const allowed = this.allowance(token, from, spender);
    if (allowed < amount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Allowance of ${spender} over ${from}'s ${token} is ${allowed}, needs ${amount}`,
      );
    }
    this._debit(token, from, amount);
    this.approve(token, from, spender, allowed - amount);
    this._credit(token, to, amount);
    this._record(token, from, to, amount, memo);
  }

  // ─── Atomicity ───────────────────────────────────────────────────────

  /**
   * Run `work` so that either all its writes land or none do.
   * Nested scopes fold into the outermost one.
   */
  atomic<T>(work: () => T): T {
    if (this._atomicDepth > 0) {
      return work();
    }
    const saved = this._save();
    this._atomicDepth++;
    try {
      return work();
    } catch (err) {
      this._restore(saved);
      throw err;
    } finally {
      this._atomicDepth--;
    }
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      balances: [...this._balances.values()].map((b) => ({
        asset: b.asset,
        account: b.account,
        amount: b.amount.toString(),
      })),
      allowances: [...this._allowances.values()].map((a) => ({
        token: a.token,
        owner: a.owner,
        spender: a.spender,
        amount: a.amount.toString(),
      })),
      journal: [...this._journal],
    };
  }

  static fromSnapshot(snapshot: LedgerSnapshot): InMemoryAssetLedger {
    const ledger = new InMemoryAssetLedger();
    for (const b of snapshot.balances) {
      ledger._balances.set(key(b.asset, b.account), {
        asset: b.asset,
        account: b.account,
        amount: BigInt(b.amount),
      });
    }
    for (const a of snapshot.allowances) {
      ledger.approve(a.token, a.owner, a.spender, BigInt(a.amount));
    }
    ledger._journal.push(...snapshot.journal);
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount}`);
    }
  }

  private _credit(asset: Address, account: Address, amount: bigint): void {
    const k = key(asset, account);
    const existing = this._balances.get(k);
    if (existing !== undefined) {
      existing.amount += amount;
    } else {
      this._balances.set(k, { asset, account, amount });
    }
  }

  private _debit(asset: Address, account: Address, amount: bigint): void {
    if (amount === 0n) return;
    const existing = this._balances.get(key(asset, account));
    const held = existing?.amount ?? 0n;
    if (existing === undefined || held < amount) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `${account} holds ${held} of ${assetLabel(asset)}, needs ${amount}`,
      );
    }
    existing.amount -= amount;
  }

  private _record(
    asset: Address,
    from: Address | null,
    to: Address,
    amount: bigint,
    memo: string | undefined,
  ): void {
    this._journal.push({ sequence: this._journal.length + 1, asset, from, to, amount, memo });
  }

  private _save(): SavedState {
    const balances = new Map<string, BalanceRecord>();
    for (const [k, v] of this._balances) balances.set(k, { ...v });
    const allowances = new Map<string, AllowanceRecord>();
    for (const [k, v] of this._allowances) allowances.set(k, { ...v });
    return { balances, allowances, journalLength: this._journal.length };
  }

  private _restore(saved: SavedState): void {
    this._balances = saved.balances;
    this._allowances = saved.allowances;
    this._journal.length = saved.journalLength;
  }
}
