/**
 * Funding Manager — Moves reward assets into intent vaults.
 *
 * The vault address is derived from the intent hash, so a vault can be
 * funded before anything exists at that address.
 *
 * Rules:
 * - Each asset is topped up to its declared amount, never beyond
 * - Every transfer is planned before any is made; with allowPartial
 *   off, a single shortfall aborts the whole call
 * - Transfers run inside one ledger.atomic block
 * - A fully funded vault cannot be funded again
 * - Terminal intents (claimed, refunded) cannot be funded
 */

import { NATIVE_ASSET } from "@intentvault/types";
import type { Address, Bytes32, ChainId, FundingStatus, Intent, Reward, TokenAmount } from "@intentvault/types";
import { hashIntent } from "@intentvault/encoding";
import type { AssetLedger } from "@intentvault/ledger";
import type { ClaimStateMachine, IntentRecord, IntentRegistry } from "@intentvault/vault";
import { holdsReward, requiredAssets, sameAddress } from "./assets.js";
import type { FundingOptions, FundingResult, PermitDelegate } from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class FundingError extends Error {
  public readonly code: FundingErrorCode;
  constructor(code: FundingErrorCode, message: string) {
    super(message);
    this.name = "FundingError";
    this.code = code;
  }
}

export type FundingErrorCode =
  | "DUPLICATE_INTENT"
  | "ALREADY_FUNDED"
  | "ALREADY_CLAIMED"
  | "ALREADY_REFUNDED"
  | "TRANSFER_FAILED"
  | "INVALID_DELEGATED_APPROVAL";

// =============================================================================
// Funding Manager
// =============================================================================

interface PlannedTransfer {
  readonly asset: Address;
  readonly amount: bigint;
}

export interface FundingManagerDeps {
  readonly ledger: AssetLedger;
  readonly registry: IntentRegistry;
  readonly claims: ClaimStateMachine;
  /** Account funders approve for direct (non-delegated) token funding */
  readonly spender: Address;
}

export class FundingManager {
  private readonly ledger: AssetLedger;
  private readonly registry: IntentRegistry;
  private readonly claims: ClaimStateMachine;
  private readonly spender: Address;

  constructor(deps: FundingManagerDeps) {
    this.ledger = deps.ledger;
    this.registry = deps.registry;
    this.claims = deps.claims;
    this.spender = deps.spender;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Funding
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Fund the vault of (destination, routeHash, reward) from `funder`.
   *
   * @throws {FundingError} ALREADY_FUNDED, ALREADY_CLAIMED, ALREADY_REFUNDED,
   *   TRANSFER_FAILED, INVALID_DELEGATED_APPROVAL
   */
  fundFor(
    destination: ChainId,
    routeHash: Bytes32,
    reward: Reward,
    funder: Address,
    options: FundingOptions = {},
  ): FundingResult {
    const { intentHash, vault } = this.registry.locate(destination, routeHash, reward);
    this.assertFundable(intentHash, vault, reward);

    const plan = this.plan(vault, reward, funder, options);

    const transferred = this.ledger.atomic(() => {
      const moved: TokenAmount[] = [];
      for (const step of plan) {
        this.execute(step, funder, vault, intentHash, options.permitDelegate);
        moved.push({ token: step.asset, amount: step.amount });
      }
      return moved;
    });

    this.registry.recordFunding(destination, routeHash, reward);
    return { intentHash, vault, transferred, complete: holdsReward(this.ledger, vault, reward) };
  }

  /**
   * Record a full intent so solvers can discover it.
   *
   * @throws {VaultError} DUPLICATE_INTENT
   */
  publish(intent: Intent): IntentRecord {
    return this.registry.publish(intent);
  }

  /**
   * Fund and publish in one call. Nothing is recorded if funding fails.
   *
   * @throws {FundingError} DUPLICATE_INTENT if the hash is already known,
   *   or anything fundFor throws
   */
  publishAndFundFor(intent: Intent, funder: Address, options: FundingOptions = {}): FundingResult {
    const { intentHash, routeHash } = hashIntent(intent);
    if (this.registry.has(intentHash)) {
      throw new FundingError("DUPLICATE_INTENT", `Intent ${intentHash} already exists`);
    }
    const result = this.fundFor(intent.destination, routeHash, intent.reward, funder, options);
    this.registry.publish(intent);
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isIntentFunded(intent: Intent): boolean {
    const { intentHash } = hashIntent(intent);
    return holdsReward(this.ledger, this.registry.vaultOf(intentHash), intent.reward);
  }

  /**
   * Funding completeness of a vault, from its balances alone.
   */
  fundingStatus(vault: Address, reward: Reward): FundingStatus {
    if (holdsReward(this.ledger, vault, reward)) return "funded";
    const anyHeld = requiredAssets(reward).some(
      ({ token, amount }) => amount > 0n && this.ledger.balanceOf(token, vault) > 0n,
    );
    return anyHeld ? "partial" : "unfunded";
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private assertFundable(intentHash: Bytes32, vault: Address, reward: Reward): void {
    const status = this.claims.getStatus(intentHash);
    if (status === "claimed") {
      throw new FundingError("ALREADY_CLAIMED", `Intent ${intentHash} is already claimed`);
    }
    if (status === "refunded") {
      throw new FundingError("ALREADY_REFUNDED", `Intent ${intentHash} was already refunded`);
    }
    // A vault that already holds the reward before its first funding call
    // (zero reward, pre-sent tokens) still gets recorded once.
    if (this.registry.get(intentHash)?.funded === true && holdsReward(this.ledger, vault, reward)) {
      throw new FundingError("ALREADY_FUNDED", `Vault ${vault} already holds the full reward`);
    }
  }

  private plan(vault: Address, reward: Reward, funder: Address, options: FundingOptions): PlannedTransfer[] {
    const plan: PlannedTransfer[] = [];

    for (const { token, amount } of requiredAssets(reward)) {
      const held = this.ledger.balanceOf(token, vault);
      if (held >= amount) continue;
      const needed = amount - held;
      const available = this.available(token, funder, vault, options.permitDelegate);
      const move = available < needed ? available : needed;

      if (move < needed && options.allowPartial !== true) {
        throw new FundingError(
          "TRANSFER_FAILED",
          `Cannot move ${needed} of ${assetLabel(token)} from ${funder}: ${available} available`,
        );
      }
      if (move > 0n) plan.push({ asset: token, amount: move });
    }
    return plan;
  }

  /**
   * What can be moved from `funder`: its balance, capped by the
   * allowance covering the path the transfer will take.
   */
  private available(token: Address, funder: Address, vault: Address, delegate?: PermitDelegate): bigint {
    const balance = this.ledger.balanceOf(token, funder);
    if (sameAddress(token, NATIVE_ASSET)) return balance;

    const allowance =
      delegate !== undefined
        ? delegate.allowance(token, funder, vault)
        : this.ledger.allowance(token, funder, this.spender);
    return balance < allowance ? balance : allowance;
  }

  private execute(
    step: PlannedTransfer,
    funder: Address,
    vault: Address,
    intentHash: Bytes32,
    delegate?: PermitDelegate,
  ): void {
    const memo = `fund ${intentHash}`;
    if (sameAddress(step.asset, NATIVE_ASSET)) {
      this.ledger.transfer(NATIVE_ASSET, funder, vault, step.amount, memo);
      return;
    }
    if (delegate === undefined) {
      this.ledger.transferFrom(step.asset, this.spender, funder, vault, step.amount, memo);
      return;
    }

    // The delegate is outside our control: trust only the vault balance
    const before = this.ledger.balanceOf(step.asset, vault);
    try {
      delegate.transferFrom(step.asset, funder, vault, step.amount);
    } catch (err) {
      throw new FundingError(
        "INVALID_DELEGATED_APPROVAL",
        `Permit delegate ${delegate.address} failed to move ${step.amount} of ${step.asset}: ${
          err instanceof Error ? err.message : String(err)
        }`,
      );
    }
    const received = this.ledger.balanceOf(step.asset, vault) - before;
    if (received < step.amount) {
      throw new FundingError(
        "INVALID_DELEGATED_APPROVAL",
        `Permit delegate ${delegate.address} delivered ${received} of ${step.amount} ${step.asset}`,
      );
    }
  }
}

function assetLabel(asset: Address): string {
  return sameAddress(asset, NATIVE_ASSET) ? "native" : asset;
}
