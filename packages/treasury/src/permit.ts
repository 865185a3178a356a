/**
 * Ledger-backed permit delegate.
 *
 * Funders approve the delegate once on each token, then grant per-spender
 * permits here; the delegate moves tokens straight from the funder to
 * the vault without the vault ever being approved directly.
 */

import type { Address } from "@intentvault/types";
import type { AssetLedger } from "@intentvault/ledger";
import type { PermitDelegate } from "./types.js";

export class PermitError extends Error {
  public readonly code = "INSUFFICIENT_PERMIT";
  constructor(message: string) {
    super(message);
    this.name = "PermitError";
  }
}

function permitKey(token: Address, owner: Address, spender: Address): string {
  return [token, owner, spender].map((a) => a.toLowerCase()).join(":");
}

export class LedgerPermitDelegate implements PermitDelegate {
  readonly address: Address;
  private readonly ledger: AssetLedger;
  private readonly permits = new Map<string, bigint>();

  constructor(ledger: AssetLedger, address: Address) {
    this.ledger = ledger;
    this.address = address;
  }

  /**
   * Let this delegate move up to `amount` of `owner`'s `token` to `spender`.
   */
  permit(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this.permits.set(permitKey(token, owner, spender), amount);
  }

  /**
   * The permit, capped by the owner's token approval to the delegate.
   */
  allowance(token: Address, owner: Address, spender: Address): bigint {
    const permitted = this.permits.get(permitKey(token, owner, spender)) ?? 0n;
    const approved = this.ledger.allowance(token, owner, this.address);
    return permitted < approved ? permitted : approved;
  }

  transferFrom(token: Address, owner: Address, to: Address, amount: bigint): void {
    const key = permitKey(token, owner, to);
    const permitted = this.permits.get(key) ?? 0n;
    if (permitted < amount) {
      throw new PermitError(`${owner} permits ${permitted} of ${token} to ${to}, needs ${amount}`);
    }
    this.ledger.transferFrom(token, this.address, owner, to, amount, "permit");
    this.permits.set(key, permitted - amount);
  }
}
